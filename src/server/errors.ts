export type AnalysisErrorCode =
  | "parse_error"
  | "validation_error"
  | "payload_too_large"
  | "auth_error"
  | "not_found"
  | "unknown_provider"
  | "provider_error"
  | "transient_error";

/**
 * Base class for every failure the analysis pipeline surfaces to a caller.
 * `statusCode` is the HTTP status the web surface answers with.
 */
export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ParseError extends AnalysisError {
  readonly code = "parse_error";
  readonly statusCode = 400;
}

export class ValidationError extends AnalysisError {
  readonly code = "validation_error";
  readonly statusCode = 400;
}

export class PayloadTooLargeError extends AnalysisError {
  readonly code = "payload_too_large";
  readonly statusCode = 413;
}

export class AuthError extends AnalysisError {
  readonly code = "auth_error";
  readonly statusCode: number;

  constructor(message: string, upstreamStatus: 401 | 403 = 401) {
    super(message);
    this.statusCode = upstreamStatus;
  }
}

export class NotFoundError extends AnalysisError {
  readonly code = "not_found";
  readonly statusCode = 404;
}

export class UnknownProviderError extends AnalysisError {
  readonly code = "unknown_provider";
  readonly statusCode = 400;

  constructor(readonly provider: string, known: readonly string[]) {
    super(`Unknown provider "${provider}". Expected one of: ${known.join(", ")}`);
  }
}

export class ProviderError extends AnalysisError {
  readonly code = "provider_error";
  readonly statusCode = 502;

  constructor(
    readonly provider: string,
    readonly status: number | null,
    readonly providerMessage: string
  ) {
    super(
      status === null
        ? `${provider} request failed: ${providerMessage}`
        : `${provider} API error ${status}: ${providerMessage}`
    );
  }
}

export class TransientError extends AnalysisError {
  readonly code = "transient_error";
  readonly statusCode = 502;

  constructor(message: string, readonly status: number | null = null) {
    super(message);
  }
}

export interface ErrorResponse {
  status: number;
  body: { error: string };
}

export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof AnalysisError) {
    return { status: error.statusCode, body: { error: error.message } };
  }

  const message = error instanceof Error ? error.message : "Unknown error";
  return { status: 500, body: { error: message } };
}
