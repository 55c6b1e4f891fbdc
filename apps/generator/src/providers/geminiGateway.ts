import { z } from "zod";
import { UnknownProviderError } from "../errors";
import type { PromptPayload } from "../prompt/buildPrompt";
import { postJson, type FetchLike, type LLMGateway, type RawModelResponse } from "./llmGateway";

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: z.object({ totalTokenCount: z.number().optional() }).optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
});

export type GeminiGatewayOptions = {
  apiKey: string;
  baseUrl: string;
  fetchImpl?: FetchLike;
};

export class GeminiGateway implements LLMGateway {
  readonly provider = "gemini" as const;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: GeminiGatewayOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(payload: PromptPayload, signal: AbortSignal): Promise<RawModelResponse> {
    const startedAt = Date.now();
    const model = encodeURIComponent(payload.parameters.model);
    const body = await postJson(this.fetchImpl, "Gemini", `${this.options.baseUrl}/models/${model}:generateContent`, {
      headers: { "x-goog-api-key": this.options.apiKey },
      body: {
        systemInstruction: { parts: [{ text: payload.system }] },
        contents: [{ role: "user", parts: [{ text: payload.user }] }],
        generationConfig: {
          temperature: payload.parameters.temperature,
          maxOutputTokens: payload.parameters.maxTokens,
          responseMimeType: "application/json",
        },
      },
      signal,
    });

    const parsed = GeminiResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UnknownProviderError("Gemini response did not match the generateContent format.");
    }

    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new UnknownProviderError(`Gemini blocked the prompt: ${blockReason}.`);
    }

    const candidate = parsed.data.candidates?.[0];
    const text = (candidate?.content?.parts ?? [])
      .map((part) => part.text ?? "")
      .join("")
      .trim();
    if (!text) {
      throw new UnknownProviderError("Gemini response did not include text content.");
    }

    return {
      text,
      tokensUsed: parsed.data.usageMetadata?.totalTokenCount ?? 0,
      latencyMs: Date.now() - startedAt,
      finishReason: candidate?.finishReason ?? null,
    };
  }
}
