// Object-literal type, not an interface: SDK tool schemas take an index signature.
export type JsonObjectSchema = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
};

export interface OutputSchema {
  name: string;
  description: string;
  schema: JsonObjectSchema;
}

export interface LLMRequest {
  systemPrompt: string;
  userMessage: string;
  maxTokens?: number;
  temperature?: number;
  outputSchema?: OutputSchema;
}

export interface LLMCallOptions {
  /** Upper bound for this single call; providers pass it to their SDK */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  provider: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  latencyMs: number;
}

export interface LLMProvider {
  name: string;
  call(request: LLMRequest, options?: LLMCallOptions): Promise<LLMResponse>;
}

export interface GenerationClientConfig {
  provider: LLMProvider;
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number;
  /** Backoff before attempt n+1 is baseDelayMs * 2^n */
  baseDelayMs: number;
  attemptTimeoutMs: number;
}

export interface LLMAttemptLog {
  attempt: number;
  provider: string;
  model: string;
  latencyMs: number;
  success: boolean;
  transient?: boolean;
  status?: number;
  error?: string;
}

export type GeneratedTextSource = "generated" | "fallback";

export interface GeneratedText {
  content: string;
  source: GeneratedTextSource;
  model: string;
  latencyMs: number;
  attempts: LLMAttemptLog[];
}

/** Supplies the static text served when the service cannot be reached. */
export interface FallbackSource {
  render(domain: string): string | null;
}

export interface GenerateOptions {
  /** Selects the fallback template */
  domain: string;
  /** Epoch ms after which no new attempt or backoff may start */
  deadlineAt?: number;
}

export type GenerationFailureCode = "PERMANENT_PROVIDER_ERROR" | "FALLBACK_UNAVAILABLE";

export type GenerationResult =
  | { success: true; text: GeneratedText }
  | {
      success: false;
      code: GenerationFailureCode;
      error: string;
      attempts: LLMAttemptLog[];
      latencyMs: number;
    };
