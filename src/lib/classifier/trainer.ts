import { analyze, smoothIdf, TfidfVectorizer, type SparseVector } from "./features";
import { INTENT_LABELS, LABEL_SET_VERSION } from "./labels";
import { dot, softmax } from "./model";
import type { LabelledExample, ModelArtifact } from "./types";

export interface TrainingOptions {
  stopWords: readonly string[];
  maxNgram?: number;
  /** Terms seen in fewer documents are dropped from the vocabulary */
  minDocumentFrequency?: number;
  epochs?: number;
  learningRate?: number;
  l2?: number;
}

const DEFAULTS = {
  maxNgram: 2,
  minDocumentFrequency: 1,
  epochs: 600,
  learningRate: 2,
  l2: 1e-4,
};

/**
 * Fits the TF-IDF vocabulary and a softmax regression by full-batch gradient
 * descent from zero weights. Same examples and options give the same
 * artifact.
 */
export function trainIntentModel(
  examples: readonly LabelledExample[],
  options: TrainingOptions
): ModelArtifact {
  if (examples.length === 0) {
    throw new Error("Cannot train an intent model without examples");
  }

  const maxNgram = options.maxNgram ?? DEFAULTS.maxNgram;
  const minDf = options.minDocumentFrequency ?? DEFAULTS.minDocumentFrequency;
  const epochs = options.epochs ?? DEFAULTS.epochs;
  const learningRate = options.learningRate ?? DEFAULTS.learningRate;
  const l2 = options.l2 ?? DEFAULTS.l2;
  const stopWords = new Set(options.stopWords);

  // Vocabulary and document frequencies
  const documentFrequency = new Map<string, number>();
  for (const example of examples) {
    for (const term of new Set(analyze(example.text, stopWords, maxNgram))) {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    }
  }
  const vocabulary = [...documentFrequency.entries()]
    .filter(([, df]) => df >= minDf)
    .map(([term]) => term)
    .sort();
  const idf = vocabulary.map((term) => smoothIdf(examples.length, documentFrequency.get(term) ?? 0));

  const vectorizer = new TfidfVectorizer(vocabulary, idf, stopWords, maxNgram);
  const labels = [...INTENT_LABELS];
  const xs: SparseVector[] = examples.map((e) => vectorizer.transform(e.text));
  const ys: number[] = examples.map((e) => labels.indexOf(e.label));

  const weights: number[][] = labels.map(() => new Array<number>(vocabulary.length).fill(0));
  const n = examples.length;

  for (let epoch = 0; epoch < epochs; epoch++) {
    const gradient: number[][] = labels.map(() => new Array<number>(vocabulary.length).fill(0));

    for (let j = 0; j < n; j++) {
      const x = xs[j];
      const p = softmax(weights.map((row) => dot(row, x)));
      for (let k = 0; k < labels.length; k++) {
        const error = p[k] - (k === ys[j] ? 1 : 0);
        if (error === 0) continue;
        const row = gradient[k];
        for (const [i, v] of x) row[i] += error * v;
      }
    }

    for (let k = 0; k < labels.length; k++) {
      const row = weights[k];
      const grad = gradient[k];
      for (let i = 0; i < row.length; i++) {
        row[i] -= learningRate * (grad[i] / n + l2 * row[i]);
      }
    }
  }

  return {
    labelSetVersion: LABEL_SET_VERSION,
    labels,
    stopWords: [...stopWords].sort(),
    maxNgram,
    vocabulary,
    idf,
    weights,
    trainedExamples: n,
  };
}
