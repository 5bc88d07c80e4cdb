import * as fs from "fs";
import { trainIntentModel, type TrainingOptions } from "./trainer";
import {
  IntentDatasetSchema,
  ModelArtifactSchema,
  StopWordsSchema,
  type ModelArtifact,
} from "./types";

/** Where the classifier's artifact comes from. Read-only from the pipeline's side. */
export interface ModelSource {
  readonly description: string;
  load(): Promise<ModelArtifact>;
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.promises.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export function parseModelArtifact(value: unknown): ModelArtifact {
  const result = ModelArtifactSchema.safeParse(value);
  if (!result.success) {
    throw new Error(`Invalid model artifact: ${JSON.stringify(result.error.issues)}`);
  }
  return result.data;
}

/** A pre-trained artifact written by `npm run train`. */
export class FileModelSource implements ModelSource {
  readonly description: string;
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.description = `file:${filePath}`;
  }

  async load(): Promise<ModelArtifact> {
    return parseModelArtifact(await readJson(this.filePath));
  }
}

export async function loadStopWords(filePath: string): Promise<string[]> {
  const result = StopWordsSchema.safeParse(await readJson(filePath));
  if (!result.success) {
    throw new Error(`Invalid stop-word list at ${filePath}`);
  }
  return result.data;
}

/** Trains in-process from the labelled dataset when no artifact is provisioned. */
export class DatasetModelSource implements ModelSource {
  readonly description: string;
  private datasetPath: string;
  private stopWordsPath: string;
  private options: Omit<TrainingOptions, "stopWords">;

  constructor(
    datasetPath: string,
    stopWordsPath: string,
    options: Omit<TrainingOptions, "stopWords"> = {}
  ) {
    this.datasetPath = datasetPath;
    this.stopWordsPath = stopWordsPath;
    this.options = options;
    this.description = `dataset:${datasetPath}`;
  }

  async load(): Promise<ModelArtifact> {
    const dataset = IntentDatasetSchema.safeParse(await readJson(this.datasetPath));
    if (!dataset.success) {
      throw new Error(`Invalid intent dataset: ${JSON.stringify(dataset.error.issues)}`);
    }
    const stopWords = await loadStopWords(this.stopWordsPath);
    return trainIntentModel(dataset.data.examples, { ...this.options, stopWords });
  }
}
