import { toErrorResponse } from "../errors.js";

export function toolError(error: unknown) {
  const { status, body } = toErrorResponse(error);
  return {
    content: [{ type: "text" as const, text: `Error (${status}): ${body.error}` }],
    isError: true,
  };
}
