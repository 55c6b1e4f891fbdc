import { z } from "zod";
import { UnknownProviderError } from "../errors";
import type { PromptPayload } from "../prompt/buildPrompt";
import { postJson, type FetchLike, type LLMGateway, type RawModelResponse } from "./llmGateway";

export const ANTHROPIC_VERSION = "2023-06-01";

const AnthropicMessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional(),
    })
    .optional(),
});

export type AnthropicGatewayOptions = {
  apiKey: string;
  baseUrl: string;
  version?: string;
  fetchImpl?: FetchLike;
};

export class AnthropicGateway implements LLMGateway {
  readonly provider = "anthropic" as const;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: AnthropicGatewayOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async send(payload: PromptPayload, signal: AbortSignal): Promise<RawModelResponse> {
    const startedAt = Date.now();
    const body = await postJson(this.fetchImpl, "Anthropic", `${this.options.baseUrl}/messages`, {
      headers: {
        "x-api-key": this.options.apiKey,
        "anthropic-version": this.options.version ?? ANTHROPIC_VERSION,
      },
      body: {
        model: payload.parameters.model,
        max_tokens: payload.parameters.maxTokens,
        temperature: payload.parameters.temperature,
        system: payload.system,
        messages: [{ role: "user", content: payload.user }],
      },
      signal,
    });

    const parsed = AnthropicMessageSchema.safeParse(body);
    if (!parsed.success) {
      throw new UnknownProviderError("Anthropic response did not match the messages format.");
    }

    const text = parsed.data.content
      .filter((item) => item.type === "text" && typeof item.text === "string")
      .map((item) => item.text)
      .join("\n")
      .trim();
    if (!text) {
      throw new UnknownProviderError("Anthropic response did not include text content.");
    }

    const usage = parsed.data.usage;
    return {
      text,
      tokensUsed: (usage?.input_tokens ?? 0) + (usage?.output_tokens ?? 0),
      latencyMs: Date.now() - startedAt,
      finishReason: parsed.data.stop_reason ?? null,
    };
  }
}
