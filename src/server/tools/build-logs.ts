import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { LogAnalyzer } from "../../agent/log-analyzer.js";
import { boundLogText } from "../../agent/prompts/analysis-prompt.js";
import { normalizeInputUrl, parsePipelineUrl } from "../url-parser.js";
import { toolError } from "./results.js";

const ERROR_LINE_REGEX = /(##\[error\])|(^|\s)error(\s|:)|exception|(^|\s)failed(\s|:)|fatal/i;
const WARNING_ONLY_REGEX = /(^|\s)warning(\s|:)/i;
const MAX_PREVIEW_ERRORS = 8;
const MAX_LINE_CHARS = 220;
const DEFAULT_MAX_CHARS = 20_000;
const MAX_MAX_CHARS = 200_000;

function shortenLine(line: string, maxChars = MAX_LINE_CHARS): string {
  const clean = line.replace(/\r$/, "");
  if (clean.length <= maxChars) return clean;
  return `${clean.slice(0, maxChars)} ... [line truncated]`;
}

export function isErrorLine(line: string): boolean {
  if (!ERROR_LINE_REGEX.test(line)) return false;
  if (WARNING_ONLY_REGEX.test(line) && !/error/i.test(line)) return false;
  return true;
}

export function extractErrorLines(
  text: string,
  limit = MAX_PREVIEW_ERRORS
): Array<{ lineNumber: number; text: string }> {
  const errors: Array<{ lineNumber: number; text: string }> = [];
  const lines = text.split("\n");
  for (let idx = 0; idx < lines.length && errors.length < limit; idx++) {
    const line = lines[idx];
    if (!line.trim()) continue;
    if (isErrorLine(line)) {
      errors.push({ lineNumber: idx + 1, text: shortenLine(line) });
    }
  }
  return errors;
}

export function registerBuildLogTools(server: McpServer, analyzer: LogAnalyzer): void {
  server.tool(
    "get_build_logs",
    "Fetch the logs of an Azure DevOps build (or release) from its web URL. Returns the first error lines and the log text, bounded to maxChars.",
    {
      url: z.string().describe("Build results URL, e.g. https://dev.azure.com/org/project/_build/results?buildId=123"),
      maxChars: z.number().optional().describe(`Maximum log characters to return (default: ${DEFAULT_MAX_CHARS}, max: ${MAX_MAX_CHARS}).`),
    },
    async ({ url, maxChars }) => {
      try {
        const reference = parsePipelineUrl(normalizeInputUrl(url));
        const bundle = await analyzer.fetchLogs(reference);
        const limit = Math.max(1, Math.min(MAX_MAX_CHARS, Math.floor(maxChars ?? DEFAULT_MAX_CHARS)));

        return {
          content: [
            {
              type: "text" as const,
              text: JSON.stringify(
                {
                  title: bundle.title,
                  status: bundle.status,
                  result: bundle.result,
                  sections: bundle.sections.map((section) => ({ id: section.id, name: section.name })),
                  totalChars: bundle.text.length,
                  errorLines: extractErrorLines(bundle.text),
                  text: boundLogText(bundle.text, limit),
                },
                null,
                2
              ),
            },
          ],
        };
      } catch (error) {
        return toolError(error);
      }
    }
  );
}
