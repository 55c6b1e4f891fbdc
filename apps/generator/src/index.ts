export { loadPipelineConfig, type PipelineConfig, type ProviderName, type RetryPolicy } from "./config";
export * from "./errors";
export { createLogger, createSilentLogger, type Logger } from "./logger";
export { htmlToRequirementsText, readRequirementsDocument, type RequirementsDocument } from "./ingest/readDocument";
export { normalizeRequirements } from "./normalizer/normalizeRequirements";
export { buildPrompt, type PromptPayload } from "./prompt/buildPrompt";
export type { LLMGateway, RawModelResponse, FetchLike } from "./providers/llmGateway";
export { AnthropicGateway } from "./providers/anthropicGateway";
export { GeminiGateway } from "./providers/geminiGateway";
export { createGateway } from "./providers/createGateway";
export { createProviderBudget, type ProviderBudget } from "./providers/providerBudget";
export { invokeWithRetry } from "./providers/invokeWithRetry";
export { parseTestSuite, type ParseResult } from "./parser/parseTestSuite";
export { repairModelOutput } from "./parser/repair";
export {
  CONTENT_TYPES,
  FILE_EXTENSIONS,
  parseCsvArtifact,
  parseJsonArtifact,
  renderTestSuite,
} from "./render/renderTestSuite";
export {
  createTestSuiteGenerator,
  resolveOptions,
  type GenerateInput,
  type TestSuiteGenerator,
  type TestSuiteGeneratorDeps,
} from "./pipeline/generateTestSuite";
