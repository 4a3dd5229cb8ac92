import { isProviderName, PROVIDER_NAMES, type AgentConfig, type ProviderName } from "../server/config.js";
import type { LogBundle, LogSource } from "../server/azure-devops-client.js";
import { NotFoundError, ParseError, UnknownProviderError } from "../server/errors.js";
import {
  describeReference,
  normalizeInputUrl,
  parsePipelineUrl,
  type PipelineReference,
} from "../server/url-parser.js";
import { buildAnalysisPrompt } from "./prompts/analysis-prompt.js";
import type { CompletionProvider } from "./providers/index.js";

export interface AnalysisRequest {
  url: string;
  query: string;
  provider?: string;
  model?: string;
}

export interface AnalysisResult {
  answer: string;
  provider: ProviderName;
  model: string;
}

export interface LogAnalyzerConfig {
  defaultProvider: ProviderName;
  defaultModels: Record<ProviderName, string>;
  maxLogChars: Record<ProviderName, number>;
}

export type LogAnalyzerEvent =
  | { type: "parsed"; reference: PipelineReference }
  | { type: "provider"; provider: ProviderName; model: string }
  | { type: "logs"; title: string; sections: number; chars: number }
  | { type: "complete"; answerChars: number };

export interface LogAnalyzerOptions {
  logSource: LogSource;
  providers: Record<ProviderName, CompletionProvider>;
  config: LogAnalyzerConfig;
  verbose?: boolean;
  onEvent?: (event: LogAnalyzerEvent) => void;
}

export function analyzerConfigFrom(config: AgentConfig): LogAnalyzerConfig {
  return {
    defaultProvider: config.defaultProvider,
    defaultModels: {
      openai: config.providers.openai.defaultModel,
      gemini: config.providers.gemini.defaultModel,
      openrouter: config.providers.openrouter.defaultModel,
    },
    maxLogChars: { ...config.maxLogChars },
  };
}

/**
 * Answers a question about one build (or release) run:
 * parse URL -> pick provider -> fetch logs -> build prompt -> complete.
 *
 * Holds no per-request state, so identical requests against identical
 * collaborators yield identical results.
 */
export class LogAnalyzer {
  constructor(private options: LogAnalyzerOptions) {}

  resolveProvider(requested?: string): ProviderName {
    const raw = requested?.trim();
    if (!raw) return this.options.config.defaultProvider;
    const name = raw.toLowerCase();
    if (!isProviderName(name)) {
      throw new UnknownProviderError(raw, PROVIDER_NAMES);
    }
    return name;
  }

  async fetchLogs(reference: PipelineReference): Promise<LogBundle> {
    const { logSource } = this.options;
    let bundle: LogBundle;

    if (reference.kind === "build") {
      bundle = await logSource.fetchBuildLogs(reference);
    } else if (logSource.fetchReleaseLogs) {
      bundle = await logSource.fetchReleaseLogs(reference);
    } else {
      throw new ParseError("Release URLs are not supported by this log source; use a build results URL.");
    }

    if (bundle.sections.length === 0 || !bundle.text.trim()) {
      throw new NotFoundError(`No logs found for ${describeReference(reference)}`);
    }
    return bundle;
  }

  async analyze(request: AnalysisRequest): Promise<AnalysisResult> {
    const reference = parsePipelineUrl(normalizeInputUrl(request.url));
    this.log(`[analyze] Parsed ${describeReference(reference)}`);
    this.options.onEvent?.({ type: "parsed", reference });

    const provider = this.resolveProvider(request.provider);
    const model = request.model?.trim() || this.options.config.defaultModels[provider];
    this.options.onEvent?.({ type: "provider", provider, model });

    const bundle = await this.fetchLogs(reference);
    this.log(`[analyze] Retrieved ${bundle.sections.length} log section(s) for ${bundle.title} (${bundle.text.length} chars)`);
    this.options.onEvent?.({
      type: "logs",
      title: bundle.title,
      sections: bundle.sections.length,
      chars: bundle.text.length,
    });

    const prompt = buildAnalysisPrompt(bundle.text, request.query, this.options.config.maxLogChars[provider]);
    this.log(`[analyze] Asking ${provider} (${model})`);
    const answer = await this.options.providers[provider].complete(prompt, model);

    this.options.onEvent?.({ type: "complete", answerChars: answer.length });
    return { answer, provider, model };
  }

  private log(message: string): void {
    if (this.options.verbose) {
      console.error(message);
    }
  }
}
