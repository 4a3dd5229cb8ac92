import type { AgentConfig, ProviderName } from "../../server/config.js";
import { GeminiProvider } from "./gemini.js";
import { OPENROUTER_HEADERS, OpenAICompatibleProvider } from "./openai-compatible.js";
import type { CompletionProvider, ProviderOptions } from "./types.js";

export type { CompletionProvider, ProviderDiagnosticsEvent, ProviderOptions } from "./types.js";

export const PROVIDER_LABELS: Record<ProviderName, string> = {
  openai: "OpenAI",
  gemini: "Gemini",
  openrouter: "OpenRouter",
};

/**
 * Known models per provider. OpenRouter accepts any `org/model` id, so its list
 * is a set of suggestions rather than a whitelist.
 */
export const PROVIDER_MODELS: Record<ProviderName, readonly string[]> = {
  openai: ["gpt-4o", "gpt-4-turbo", "gpt-3.5-turbo"],
  gemini: ["gemini-1.5-pro", "gemini-1.5-flash", "gemini-1.0-pro"],
  openrouter: [
    "openai/gpt-4-turbo",
    "anthropic/claude-3-opus",
    "anthropic/claude-3-sonnet",
    "mistralai/mistral-large",
    "meta-llama/llama-3-70b-instruct",
  ],
};

export type ProviderRegistry = Record<ProviderName, CompletionProvider>;

export function createProviders(
  config: Pick<AgentConfig, "providers" | "timeoutMs">,
  options: Omit<ProviderOptions, "timeoutMs"> = {}
): ProviderRegistry {
  const shared: ProviderOptions = { ...options, timeoutMs: config.timeoutMs };
  return {
    openai: new OpenAICompatibleProvider("openai", config.providers.openai, shared),
    gemini: new GeminiProvider(config.providers.gemini, shared),
    openrouter: new OpenAICompatibleProvider("openrouter", config.providers.openrouter, {
      ...shared,
      headers: OPENROUTER_HEADERS,
    }),
  };
}

export interface ProviderCatalog {
  providers: Record<ProviderName, string>;
  models: Record<ProviderName, string[]>;
  defaultProvider: ProviderName;
  defaultModels: Record<ProviderName, string>;
}

function mapProviders<T>(fn: (name: ProviderName) => T): Record<ProviderName, T> {
  return { openai: fn("openai"), gemini: fn("gemini"), openrouter: fn("openrouter") };
}

export function describeProviders(config: Pick<AgentConfig, "providers" | "defaultProvider">): ProviderCatalog {
  return {
    providers: { ...PROVIDER_LABELS },
    models: mapProviders((name) => {
      const defaultModel = config.providers[name].defaultModel;
      const known = PROVIDER_MODELS[name];
      return known.includes(defaultModel) ? [...known] : [defaultModel, ...known];
    }),
    defaultProvider: config.defaultProvider,
    defaultModels: mapProviders((name) => config.providers[name].defaultModel),
  };
}
