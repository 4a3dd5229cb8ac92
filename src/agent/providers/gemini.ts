import { z } from "zod";
import type { ProviderSettings } from "../../server/config.js";
import { HttpProvider } from "./http-provider.js";
import type { ProviderOptions } from "./types.js";

const GenerateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).default([]),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z
    .object({
      blockReason: z.string().optional(),
    })
    .optional(),
});

/** Gemini `generateContent` adapter: `contents`/`parts` in, `candidates`/`parts` out. */
export class GeminiProvider extends HttpProvider {
  constructor(settings: ProviderSettings, options: ProviderOptions = {}) {
    super("gemini", settings, options);
  }

  async complete(prompt: string, model: string): Promise<string> {
    const startedAt = Date.now();
    const { status, data } = await this.postJson(
      `${this.settings.baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
      { "x-goog-api-key": this.settings.apiKey },
      {
        contents: [{ role: "user", parts: [{ text: prompt }] }],
      },
      model,
      startedAt
    );

    const parsed = GenerateContentSchema.safeParse(data);
    if (!parsed.success) {
      throw this.fail(model, startedAt, status, "Response is not a generateContent result");
    }

    const candidate = parsed.data.candidates?.[0];
    if (!candidate) {
      const blockReason = parsed.data.promptFeedback?.blockReason;
      throw this.fail(
        model,
        startedAt,
        status,
        blockReason ? `Prompt was blocked: ${blockReason}` : "Response has no candidates"
      );
    }

    const text = (candidate.content?.parts ?? []).map((part) => part.text ?? "").join("");
    if (!text) {
      const reason = candidate.finishReason ? ` (finishReason ${candidate.finishReason})` : "";
      throw this.fail(model, startedAt, status, `Response contained an empty answer${reason}`);
    }

    return this.succeed(model, startedAt, status, text);
  }
}
