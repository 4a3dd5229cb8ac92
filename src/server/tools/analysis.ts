import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LogAnalyzer } from "../../agent/log-analyzer.js";
import type { ProviderCatalog } from "../../agent/providers/index.js";
import { PROVIDER_NAMES } from "../config.js";
import { toolError } from "./results.js";

export function registerAnalysisTools(
  server: McpServer,
  analyzer: LogAnalyzer,
  catalog: ProviderCatalog
): void {
  server.tool(
    "analyze_build_logs",
    "Fetch the logs of an Azure DevOps build or release and ask an AI provider a question about them.",
    {
      url: z.string().describe("Build results or release URL"),
      query: z.string().optional().describe("Question about the run (default: why did it fail and how to fix it)"),
      provider: z.string().optional().describe(`AI provider: ${PROVIDER_NAMES.join(" | ")} (default: ${catalog.defaultProvider})`),
      model: z.string().optional().describe("Model id; the provider's default model when omitted"),
    },
    async ({ url, query, provider, model }) => {
      try {
        const result = await analyzer.analyze({ url, query: query ?? "", provider, model });
        return {
          content: [{ type: "text" as const, text: result.answer }],
        };
      } catch (error) {
        return toolError(error);
      }
    }
  );

  server.tool(
    "list_providers",
    "List the AI providers and their known models.",
    async () => {
      return {
        content: [{ type: "text" as const, text: JSON.stringify(catalog, null, 2) }],
      };
    }
  );
}
