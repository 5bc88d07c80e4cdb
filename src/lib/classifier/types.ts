import { z } from "zod/v4";
import { DEFAULT_LABEL, INTENT_LABELS, isIntentLabel, type IntentLabel } from "./labels";

export interface ClassificationResult {
  label: IntentLabel;
  /** Probability of `label`; 0 when classification failed */
  confidence: number;
  /** Per-label probabilities summing to 1; empty when classification failed */
  probabilities: Partial<Record<IntentLabel, number>>;
}

export const FAILED_CLASSIFICATION: ClassificationResult = {
  label: DEFAULT_LABEL,
  confidence: 0,
  probabilities: {},
};

// ─── Training data ────────────────────────────────────────────────────────────

export const LabelledExampleSchema = z.object({
  text: z.string().min(1),
  label: z.enum(INTENT_LABELS),
});

export type LabelledExample = z.infer<typeof LabelledExampleSchema>;

export const IntentDatasetSchema = z.object({
  labelSetVersion: z.string(),
  examples: z.array(LabelledExampleSchema).min(1),
});

export type IntentDataset = z.infer<typeof IntentDatasetSchema>;

export const StopWordsSchema = z.array(z.string());

// ─── Model artifact ───────────────────────────────────────────────────────────
// Feature transform + parameters in one JSON document. weights[k][i] is the
// coefficient of vocabulary[i] for labels[k]; there is no intercept.

export const ModelArtifactSchema = z
  .object({
    labelSetVersion: z.string(),
    labels: z.array(z.string()).min(2),
    stopWords: z.array(z.string()),
    maxNgram: z.number().int().min(1).max(3),
    vocabulary: z.array(z.string()),
    idf: z.array(z.number()),
    weights: z.array(z.array(z.number())),
    trainedExamples: z.number().int().nonnegative(),
  })
  .refine((a) => a.labels.every(isIntentLabel), { message: "labels outside the known label set" })
  .refine((a) => a.labels[0] === DEFAULT_LABEL, { message: `first label must be "${DEFAULT_LABEL}"` })
  .refine((a) => a.idf.length === a.vocabulary.length, { message: "idf length must match vocabulary" })
  .refine(
    (a) =>
      a.weights.length === a.labels.length &&
      a.weights.every((row) => row.length === a.vocabulary.length),
    { message: "weights must be labels × vocabulary" }
  );

export type ModelArtifact = z.infer<typeof ModelArtifactSchema>;
