import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadAgentConfig, loadServerConfig } from "./config.js";
import { AzureDevOpsClient } from "./azure-devops-client.js";
import { registerAnalysisTools } from "./tools/analysis.js";
import { registerBuildLogTools } from "./tools/build-logs.js";
import { analyzerConfigFrom, LogAnalyzer } from "../agent/log-analyzer.js";
import { createProviders, describeProviders } from "../agent/providers/index.js";

async function main() {
  const serverConfig = loadServerConfig();
  const agentConfig = loadAgentConfig();

  // stdout carries the MCP protocol; progress goes to stderr via verbose logging
  const analyzer = new LogAnalyzer({
    logSource: new AzureDevOpsClient(serverConfig),
    providers: createProviders(agentConfig),
    config: analyzerConfigFrom(agentConfig),
    verbose: true,
  });

  const server = new McpServer({
    name: "devops-log-analyst",
    version: "1.0.0",
  });

  registerAnalysisTools(server, analyzer, describeProviders(agentConfig));
  registerBuildLogTools(server, analyzer);

  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
