import { TfidfVectorizer, type SparseVector } from "./features";
import { isIntentLabel, type IntentLabel } from "./labels";
import type { ClassificationResult, ModelArtifact } from "./types";

/** Numerically stable softmax. */
export function softmax(logits: readonly number[]): number[] {
  const max = Math.max(...logits);
  const exps = logits.map((z) => Math.exp(z - max));
  const total = exps.reduce((a, b) => a + b, 0);
  return exps.map((e) => e / total);
}

export function dot(weights: readonly number[], x: SparseVector): number {
  let sum = 0;
  for (const [i, v] of x) sum += weights[i] * v;
  return sum;
}

/**
 * Immutable multinomial logistic regression over TF-IDF features. Safe to
 * share between concurrent requests.
 */
export class IntentModel {
  readonly labels: readonly IntentLabel[];
  readonly labelSetVersion: string;
  private vectorizer: TfidfVectorizer;
  private weights: readonly (readonly number[])[];

  constructor(artifact: ModelArtifact) {
    const labels: IntentLabel[] = [];
    for (const label of artifact.labels) {
      if (!isIntentLabel(label)) {
        throw new Error(`Model artifact contains unknown label "${label}"`);
      }
      labels.push(label);
    }
    this.labels = labels;
    this.labelSetVersion = artifact.labelSetVersion;
    this.vectorizer = new TfidfVectorizer(
      artifact.vocabulary,
      artifact.idf,
      artifact.stopWords,
      artifact.maxNgram
    );
    this.weights = artifact.weights;
  }

  /**
   * Highest-probability label and its probability. An empty feature vector
   * gives the uniform distribution, and ties go to the earliest label.
   */
  predict(text: string): ClassificationResult {
    const x = this.vectorizer.transform(text);
    const probabilities = softmax(this.weights.map((row) => dot(row, x)));

    let best = 0;
    for (let k = 1; k < probabilities.length; k++) {
      if (probabilities[k] > probabilities[best]) best = k;
    }

    const confidence = probabilities[best];
    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      throw new Error(`Classifier produced an invalid probability: ${confidence}`);
    }

    const byLabel: Partial<Record<IntentLabel, number>> = {};
    this.labels.forEach((label, k) => {
      byLabel[label] = probabilities[k];
    });

    return { label: this.labels[best], confidence, probabilities: byLabel };
  }
}
