import { z } from "zod";
import type { ProviderName, ProviderSettings } from "../../server/config.js";
import { HttpProvider } from "./http-provider.js";
import type { ProviderOptions } from "./types.js";

const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
});

export interface OpenAICompatibleOptions extends ProviderOptions {
  /** Extra headers sent with every request, e.g. OpenRouter's attribution headers. */
  headers?: Record<string, string>;
}

/**
 * Chat-completions adapter. Serves OpenAI itself and any endpoint that speaks
 * the same protocol (OpenRouter, gateways), differing only by base URL and headers.
 */
export class OpenAICompatibleProvider extends HttpProvider {
  private readonly extraHeaders: Record<string, string>;

  constructor(name: ProviderName, settings: ProviderSettings, options: OpenAICompatibleOptions = {}) {
    super(name, settings, options);
    this.extraHeaders = options.headers ?? {};
  }

  async complete(prompt: string, model: string): Promise<string> {
    const startedAt = Date.now();
    const { status, data } = await this.postJson(
      `${this.settings.baseUrl}/chat/completions`,
      {
        Authorization: `Bearer ${this.settings.apiKey}`,
        ...this.extraHeaders,
      },
      {
        model,
        messages: [{ role: "user", content: prompt }],
      },
      model,
      startedAt
    );

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw this.fail(model, startedAt, status, "Response has no chat completion choices");
    }

    const content = parsed.data.choices[0].message.content;
    if (!content) {
      throw this.fail(model, startedAt, status, "Response contained an empty answer");
    }

    return this.succeed(model, startedAt, status, content);
  }
}

export const OPENROUTER_HEADERS: Record<string, string> = {
  "HTTP-Referer": "https://github.com/devops-log-analyst",
  "X-Title": "Azure DevOps Log Analyst",
};
