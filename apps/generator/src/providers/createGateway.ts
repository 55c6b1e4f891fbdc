import type { PipelineConfig } from "../config";
import { AnthropicGateway } from "./anthropicGateway";
import { GeminiGateway } from "./geminiGateway";
import type { FetchLike, LLMGateway } from "./llmGateway";

export function createGateway(
  config: Pick<PipelineConfig, "provider" | "apiKey" | "baseUrl">,
  fetchImpl?: FetchLike
): LLMGateway {
  switch (config.provider) {
    case "anthropic":
      return new AnthropicGateway({ apiKey: config.apiKey, baseUrl: config.baseUrl, fetchImpl });
    case "gemini":
      return new GeminiGateway({ apiKey: config.apiKey, baseUrl: config.baseUrl, fetchImpl });
  }
}
