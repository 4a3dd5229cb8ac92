import { createServer } from "node:http";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { loadAgentConfig, loadGuiConfig, loadServerConfig } from "../server/config.js";
import { AzureDevOpsClient } from "../server/azure-devops-client.js";
import { analyzerConfigFrom, LogAnalyzer } from "../agent/log-analyzer.js";
import { createProviders, describeProviders } from "../agent/providers/index.js";
import { createRequestHandler } from "./app.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const publicDir = resolve(__dirname, "public");

async function main(): Promise<void> {
  const serverConfig = loadServerConfig();
  const agentConfig = loadAgentConfig();
  const { port } = loadGuiConfig();

  const analyzer = new LogAnalyzer({
    logSource: new AzureDevOpsClient(serverConfig),
    providers: createProviders(agentConfig),
    config: analyzerConfigFrom(agentConfig),
    verbose: true,
  });

  const requestHandler = createRequestHandler({
    analyzer,
    catalog: describeProviders(agentConfig),
    publicDir,
  });

  const server = createServer((req, res) => {
    requestHandler(req, res).catch((error) => {
      const message = error instanceof Error ? error.message : "Unknown error";
      res.statusCode = 500;
      res.setHeader("Content-Type", "application/json; charset=utf-8");
      res.end(JSON.stringify({ error: message }));
    });
  });

  server.listen(port, () => {
    console.log(`GUI available at http://localhost:${port}`);
    console.log(`Default provider: ${agentConfig.defaultProvider}`);
  });
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
