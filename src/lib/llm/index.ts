export { GenerationClient, type GenerationClientDeps } from "./generation-client";
export { ProviderError, toProviderError, isTransientStatus } from "./errors";
export { ClaudeProvider } from "./providers/claude";
export { OpenAIProvider } from "./providers/openai";
export type {
  LLMProvider,
  LLMRequest,
  LLMResponse,
  LLMCallOptions,
  LLMAttemptLog,
  OutputSchema,
  JsonObjectSchema,
  GenerationClientConfig,
  GenerateOptions,
  GenerationResult,
  GenerationFailureCode,
  GeneratedText,
  GeneratedTextSource,
  FallbackSource,
} from "./types";
