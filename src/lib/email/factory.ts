import * as fs from "fs";
import * as path from "path";
import type { AppConfig } from "../config";
import { DatasetModelSource, FileModelSource, IntentClassifier, type ModelSource } from "../classifier";
import { ClaudeProvider, GenerationClient, OpenAIProvider, type LLMProvider } from "../llm";
import type { ILogger } from "../logging";
import { LoggerAuditSink } from "./audit";
import { FallbackTemplates } from "./fallback-templates";
import { EmailPipeline } from "./pipeline";

export interface EmailPipelineRuntime {
  pipeline: EmailPipeline;
  classifier: IntentClassifier;
  modelSource: ModelSource;
}

function buildProvider(config: AppConfig["generation"]): LLMProvider {
  if (config.provider === "openai") {
    return new OpenAIProvider(config.apiKey, config.model, config.baseURL);
  }
  return new ClaudeProvider(config.apiKey, config.model);
}

/** A trained artifact wins; otherwise the model is trained from the dataset on first use. */
function buildModelSource(config: AppConfig, rootDir: string, logger: ILogger): ModelSource {
  const modelPath = path.resolve(rootDir, config.paths.intentModel);
  if (fs.existsSync(modelPath)) {
    return new FileModelSource(modelPath);
  }
  logger.warn(
    "No trained intent model; training from the dataset on the first request. Run `npm run train` to avoid this.",
    { modelPath }
  );
  return new DatasetModelSource(
    path.resolve(rootDir, config.paths.intentDataset),
    path.resolve(rootDir, config.paths.stopWords)
  );
}

export function createEmailPipeline(
  config: AppConfig,
  logger: ILogger,
  rootDir: string = process.cwd()
): EmailPipelineRuntime {
  const modelSource = buildModelSource(config, rootDir, logger.child({ component: "factory" }));
  const classifier = new IntentClassifier(modelSource, logger);

  const generator = new GenerationClient(
    {
      provider: buildProvider(config.generation),
      maxRetries: config.generation.maxRetries,
      baseDelayMs: config.generation.baseDelayMs,
      attemptTimeoutMs: config.generation.attemptTimeoutMs,
    },
    {
      fallbacks: FallbackTemplates.fromFile(path.resolve(rootDir, config.paths.fallbackTemplates)),
      logger,
    }
  );

  const pipeline = new EmailPipeline({
    classifier,
    generator,
    audit: new LoggerAuditSink(logger),
    logger,
    requestBudgetMs: config.requestBudgetMs,
    confidenceThreshold: config.confidenceThreshold,
  });

  return { pipeline, classifier, modelSource };
}
