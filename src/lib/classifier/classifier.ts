import { silentLogger, type ILogger } from "../logging";
import { IntentModel } from "./model";
import type { ModelSource } from "./model-source";
import { FAILED_CLASSIFICATION, type ClassificationResult } from "./types";

/**
 * Shared across requests. The model loads lazily on first use behind a
 * single-flight promise and is immutable afterwards.
 */
export class IntentClassifier {
  private source: ModelSource;
  private logger: ILogger;
  private model: IntentModel | null = null;
  private loading: Promise<IntentModel> | null = null;

  constructor(source: ModelSource, logger: ILogger = silentLogger) {
    this.source = source;
    this.logger = logger.child({ component: "classifier" });
  }

  /** Never rejects: any failure yields `general` with confidence 0. */
  async classify(text: string): Promise<ClassificationResult> {
    let model: IntentModel;
    try {
      model = await this.ensureModel();
    } catch (error) {
      this.logger.error("Intent model unavailable", error, { source: this.source.description });
      return FAILED_CLASSIFICATION;
    }

    try {
      return model.predict(text);
    } catch (error) {
      this.logger.error("Intent prediction failed", error);
      return FAILED_CLASSIFICATION;
    }
  }

  /** Loads the model ahead of the first request. Rejects if loading fails. */
  async warmUp(): Promise<void> {
    await this.ensureModel();
  }

  private ensureModel(): Promise<IntentModel> {
    if (this.model) return Promise.resolve(this.model);

    if (!this.loading) {
      const started = Date.now();
      // A failed load is forgotten so a later request can retry it.
      this.loading = this.source
        .load()
        .then((artifact) => {
          const model = new IntentModel(artifact);
          this.model = model;
          this.logger.info("Intent model loaded", {
            source: this.source.description,
            labelSetVersion: model.labelSetVersion,
            labels: model.labels.length,
            latencyMs: Date.now() - started,
          });
          return model;
        })
        .finally(() => {
          this.loading = null;
        });
    }
    return this.loading;
  }
}
