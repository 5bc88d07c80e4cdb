import { z } from "zod/v4";
import type { LogLevel } from "../logging";

const LOG_LEVEL_NAMES = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const satisfies readonly LogLevel[];

const intFromEnv = (fallback: number, min: number) =>
  z.coerce.number().int().min(min).default(fallback);

const optionalString = z.string().trim().optional();

const EnvSchema = z.object({
  GENERATION_PROVIDER: z.enum(["anthropic", "openai"]).default("anthropic"),
  GENERATION_MODEL: optionalString,
  GENERATION_BASE_URL: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  GENERATION_MAX_RETRIES: intFromEnv(2, 0),
  GENERATION_BASE_DELAY_MS: intFromEnv(500, 0),
  GENERATION_ATTEMPT_TIMEOUT_MS: intFromEnv(8000, 1),
  REQUEST_BUDGET_MS: intFromEnv(25000, 1),
  INTENT_MODEL_PATH: z.string().default("models/intent-model.json"),
  INTENT_DATASET_PATH: z.string().default("data/intent-dataset.json"),
  STOP_WORDS_PATH: z.string().default("data/stopwords.json"),
  FALLBACK_TEMPLATES_PATH: z.string().default("data/fallback-templates.json"),
  CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).default("info"),
});

export type GenerationProviderName = "anthropic" | "openai";

export const DEFAULT_MODELS: Record<GenerationProviderName, string> = {
  anthropic: "claude-3-5-haiku-20241022",
  openai: "gpt-4o-mini",
};

export interface AppConfig {
  generation: {
    provider: GenerationProviderName;
    model: string;
    baseURL: string | undefined;
    apiKey: string;
    maxRetries: number;
    baseDelayMs: number;
    attemptTimeoutMs: number;
  };
  requestBudgetMs: number;
  confidenceThreshold: number;
  paths: {
    intentModel: string;
    intentDataset: string;
    stopWords: string;
    fallbackTemplates: string;
  };
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Reads configuration from environment variables. Blank values count as unset.
 * Training and other offline tools pass `requireApiKey: false`.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: { requireApiKey?: boolean } = {}
): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  const apiKey = e.GENERATION_PROVIDER === "anthropic" ? e.ANTHROPIC_API_KEY : e.OPENAI_API_KEY;
  if (!apiKey && options.requireApiKey !== false) {
    const name = e.GENERATION_PROVIDER === "anthropic" ? "ANTHROPIC_API_KEY" : "OPENAI_API_KEY";
    throw new ConfigError([`${name}: required when GENERATION_PROVIDER is ${e.GENERATION_PROVIDER}`]);
  }

  return {
    generation: {
      provider: e.GENERATION_PROVIDER,
      model: e.GENERATION_MODEL ?? DEFAULT_MODELS[e.GENERATION_PROVIDER],
      baseURL: e.GENERATION_BASE_URL,
      apiKey: apiKey ?? "",
      maxRetries: e.GENERATION_MAX_RETRIES,
      baseDelayMs: e.GENERATION_BASE_DELAY_MS,
      attemptTimeoutMs: e.GENERATION_ATTEMPT_TIMEOUT_MS,
    },
    requestBudgetMs: e.REQUEST_BUDGET_MS,
    confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    paths: {
      intentModel: e.INTENT_MODEL_PATH,
      intentDataset: e.INTENT_DATASET_PATH,
      stopWords: e.STOP_WORDS_PATH,
      fallbackTemplates: e.FALLBACK_TEMPLATES_PATH,
    },
    logLevel: e.LOG_LEVEL,
  };
}
