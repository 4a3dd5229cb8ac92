import dotenv from "dotenv";

dotenv.config();

export const PROVIDER_NAMES = ["openai", "gemini", "openrouter"] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export interface ServerConfig {
  /** Informational; the organization is taken from each analyzed URL. */
  organization?: string;
  pat: string;
  apiVersion: string;
  timeoutMs: number;
}

export interface ProviderSettings {
  apiKey: string;
  baseUrl: string;
  defaultModel: string;
}

export interface AgentConfig {
  defaultProvider: ProviderName;
  providers: Record<ProviderName, ProviderSettings>;
  timeoutMs: number;
  maxLogChars: Record<ProviderName, number>;
}

export interface GuiConfig {
  port: number;
}

export const DEFAULT_BASE_URLS: Record<ProviderName, string> = {
  openai: "https://api.openai.com/v1",
  gemini: "https://generativelanguage.googleapis.com/v1beta",
  openrouter: "https://openrouter.ai/api/v1",
};

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-4o",
  gemini: "gemini-1.5-pro",
  openrouter: "openai/gpt-4-turbo",
};

// Gemini gets a smaller share of its context window for raw log text.
export const DEFAULT_MAX_LOG_CHARS: Record<ProviderName, number> = {
  openai: 80_000,
  gemini: 50_000,
  openrouter: 80_000,
};

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function getEnvInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = Math.floor(Number(raw));
  if (!Number.isFinite(parsed) || parsed < 1) return undefined;
  return parsed;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function loadServerConfig(): ServerConfig {
  return {
    organization: process.env.AZURE_DEVOPS_ORG || undefined,
    pat: requireEnv("AZURE_DEVOPS_PAT"),
    apiVersion: process.env.AZURE_DEVOPS_API_VERSION || "7.1",
    timeoutMs: getEnvInt("AZURE_DEVOPS_TIMEOUT_MS") ?? 30_000,
  };
}

export function loadAgentConfig(): AgentConfig {
  const defaultProviderRaw = (process.env.DEFAULT_AI_PROVIDER || "openai").trim().toLowerCase();
  const defaultProvider: ProviderName = isProviderName(defaultProviderRaw) ? defaultProviderRaw : "openai";

  return {
    defaultProvider,
    providers: {
      openai: {
        apiKey: process.env.AI_API_KEY || process.env.OPENAI_API_KEY || "",
        baseUrl: stripTrailingSlash(process.env.AI_API_BASE_URL || DEFAULT_BASE_URLS.openai),
        defaultModel: process.env.AI_MODEL || DEFAULT_MODELS.openai,
      },
      gemini: {
        apiKey: process.env.GEMINI_API_KEY || "",
        baseUrl: stripTrailingSlash(process.env.GEMINI_BASE_URL || DEFAULT_BASE_URLS.gemini),
        defaultModel: process.env.GEMINI_MODEL || DEFAULT_MODELS.gemini,
      },
      openrouter: {
        apiKey: process.env.OPENROUTER_API_KEY || "",
        baseUrl: stripTrailingSlash(process.env.OPENROUTER_BASE_URL || DEFAULT_BASE_URLS.openrouter),
        defaultModel: process.env.OPENROUTER_MODEL || DEFAULT_MODELS.openrouter,
      },
    },
    timeoutMs: getEnvInt("AI_TIMEOUT_MS") ?? 120_000,
    maxLogChars: {
      openai: getEnvInt("OPENAI_MAX_LOG_CHARS") ?? DEFAULT_MAX_LOG_CHARS.openai,
      gemini: getEnvInt("GEMINI_MAX_LOG_CHARS") ?? DEFAULT_MAX_LOG_CHARS.gemini,
      openrouter: getEnvInt("OPENROUTER_MAX_LOG_CHARS") ?? DEFAULT_MAX_LOG_CHARS.openrouter,
    },
  };
}

export function loadGuiConfig(): GuiConfig {
  return {
    port: getEnvInt("GUI_PORT") ?? 4230,
  };
}
