import type { ProviderName, ProviderSettings } from "../../server/config.js";
import { ProviderError } from "../../server/errors.js";
import type { CompletionProvider, ProviderDiagnosticsEvent, ProviderOptions } from "./types.js";

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_ERROR_MESSAGE_CHARS = 500;

function diagnosticsFromEnv(): boolean {
  const raw = (process.env.PROVIDER_DIAGNOSTICS ?? "").toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

/**
 * Pulls the human-readable message out of an error body. OpenAI, OpenRouter
 * and Gemini all answer with `{ "error": { "message": ... } }`.
 */
export function extractErrorMessage(body: string, fallback: string): string {
  const trimmed = body.trim();
  if (!trimmed) return fallback;

  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (typeof parsed === "object" && parsed !== null) {
      const error = "error" in parsed ? parsed.error : undefined;
      if (typeof error === "string" && error) return error;
      if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
      }
      if ("message" in parsed && typeof parsed.message === "string") return parsed.message;
    }
  } catch {
    // Not JSON; use the raw body below
  }

  return trimmed.slice(0, MAX_ERROR_MESSAGE_CHARS);
}

/**
 * Shared request plumbing for the adapters: JSON POST with a timeout,
 * status/body to {@link ProviderError} translation and optional diagnostics.
 */
export abstract class HttpProvider implements CompletionProvider {
  protected readonly timeoutMs: number;
  private readonly diagnosticsEnabled: boolean;
  private readonly diagnosticsListener?: (event: ProviderDiagnosticsEvent) => void;

  constructor(
    readonly name: ProviderName,
    protected readonly settings: ProviderSettings,
    options: ProviderOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.diagnosticsEnabled = diagnosticsFromEnv();
    this.diagnosticsListener = options.onDiagnostics;
  }

  abstract complete(prompt: string, model: string): Promise<string>;

  protected emitDiagnostics(event: ProviderDiagnosticsEvent): void {
    this.diagnosticsListener?.(event);
    if (!this.diagnosticsEnabled) return;
    console.error(`[PROVIDER_DIAGNOSTICS] ${JSON.stringify(event)}`);
  }

  protected fail(model: string, startedAt: number, status: number | null, message: string): ProviderError {
    this.emitDiagnostics({
      provider: this.name,
      model,
      stage: "failed",
      status,
      durationMs: Date.now() - startedAt,
      message,
    });
    return new ProviderError(this.name, status, message);
  }

  /** Sends the request and returns the decoded JSON body of a 2xx response. */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: unknown,
    model: string,
    startedAt: number
  ): Promise<{ status: number; data: unknown }> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          ...headers,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw this.fail(model, startedAt, null, reason);
    }

    this.emitDiagnostics({
      provider: this.name,
      model,
      stage: "response",
      status: response.status,
      durationMs: Date.now() - startedAt,
    });

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw this.fail(model, startedAt, response.status, `Response body could not be read: ${reason}`);
    }

    if (!response.ok) {
      throw this.fail(
        model,
        startedAt,
        response.status,
        extractErrorMessage(text, response.statusText || "Unknown error")
      );
    }

    try {
      const data: unknown = JSON.parse(text);
      return { status: response.status, data };
    } catch {
      throw this.fail(model, startedAt, response.status, "Response body is not valid JSON");
    }
  }

  protected succeed(model: string, startedAt: number, status: number, answer: string): string {
    this.emitDiagnostics({
      provider: this.name,
      model,
      stage: "parsed",
      status,
      durationMs: Date.now() - startedAt,
      outputChars: answer.length,
    });
    return answer;
  }
}
