import { loadServerConfig, loadAgentConfig } from "../server/config.js";
import { AzureDevOpsClient } from "../server/azure-devops-client.js";
import { toErrorResponse } from "../server/errors.js";
import { analyzerConfigFrom, LogAnalyzer } from "./log-analyzer.js";
import { createProviders } from "./providers/index.js";
import { parseArgs } from "./cli-args.js";

function printHelp(): void {
  console.log(`
Azure DevOps Log Analyst
========================

Usage:
  npx tsx src/agent/index.ts --url <build-url> [options]

Options:
  --url, -u <url>            Build results (or release) URL to analyze
  --query, -q <question>     Question about the run (default: why did it fail)
  --provider, -p <name>      AI provider: openai | gemini | openrouter
  --model, -m <model>        Model id (default: provider's configured model)
  --quiet                    Do not print progress to stderr
  --help, -h                 Show this help message

Examples:
  npx tsx src/agent/index.ts -u "https://dev.azure.com/org/project/_build/results?buildId=123"
  npx tsx src/agent/index.ts -u "<url>" -q "Which test failed?" -p gemini
  npx tsx src/agent/index.ts -u "<url>" -p openrouter -m anthropic/claude-3-sonnet
`);
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    printHelp();
    return;
  }

  if (!args.url) {
    printHelp();
    console.error("\nError: Please specify --url");
    process.exit(1);
  }

  const serverConfig = loadServerConfig();
  const agentConfig = loadAgentConfig();

  const analyzer = new LogAnalyzer({
    logSource: new AzureDevOpsClient(serverConfig),
    providers: createProviders(agentConfig),
    config: analyzerConfigFrom(agentConfig),
    verbose: !args.quiet,
  });

  try {
    const result = await analyzer.analyze({
      url: args.url,
      query: args.query ?? "",
      provider: args.provider,
      model: args.model,
    });
    console.log(result.answer);
  } catch (error) {
    const { status, body } = toErrorResponse(error);
    console.error(`Error (${status}): ${body.error}`);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
