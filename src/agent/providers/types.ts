import type { ProviderName } from "../../server/config.js";

/** The one capability every AI backend offers the analyzer. */
export interface CompletionProvider {
  readonly name: ProviderName;
  complete(prompt: string, model: string): Promise<string>;
}

export interface ProviderDiagnosticsEvent {
  provider: ProviderName;
  model: string;
  stage: "response" | "parsed" | "failed";
  status: number | null;
  durationMs: number;
  outputChars?: number;
  message?: string;
}

export interface ProviderOptions {
  timeoutMs?: number;
  onDiagnostics?: (event: ProviderDiagnosticsEvent) => void;
}
