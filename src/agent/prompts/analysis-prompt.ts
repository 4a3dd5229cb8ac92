export const DEFAULT_QUERY = "What caused this build to fail and how can I fix it?";

const HEAD_SHARE = 0.3;

/**
 * Keeps the start and, with a larger share, the end of an oversized log:
 * setup context lives at the top, the failure is usually near the bottom.
 */
export function boundLogText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const headLen = Math.floor(maxChars * HEAD_SHARE);
  const tailLen = maxChars - headLen;
  return `${text.slice(0, headLen)}\n\n... [log truncated from ${text.length} to ${maxChars} chars] ...\n\n${text.slice(-tailLen)}`;
}

export function buildAnalysisPrompt(logs: string, query: string, maxLogChars: number): string {
  const question = query.trim() || DEFAULT_QUERY;

  return `You are an expert in Azure DevOps build and release pipelines.
I will give you build or release logs, and I need your help to understand what went wrong.

Analyze the logs carefully and provide:
1. A clear explanation of what the error is
2. The most likely cause of the failure
3. Specific steps to fix the issue

Answer from the log content; say so when the logs do not contain enough information.

## Question
${question}

## Logs
${boundLogText(logs, maxLogChars)}
`;
}
