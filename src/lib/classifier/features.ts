// Bag-of-n-grams TF-IDF features with negation scoping.

const NEGATION_CUES = new Set(["not", "no", "never", "cannot", "nor", "without"]);
const CLAUSE_BREAKS = new Set([".", ",", ";", ":", "!", "?", "but"]);
export const NEGATION_PREFIX = "not_";

/** Sparse vector as (index, value) pairs in ascending index order. */
export type SparseVector = Array<[number, number]>;

/**
 * Lower-cases and splits into word tokens. Tokens after a negation cue carry
 * the `not_` prefix until the clause ends, so "not a student" never yields
 * the bare token "student".
 */
export function tokenize(text: string): string[] {
  const normalized = text.normalize("NFKC").toLowerCase().replace(/[‘’`]/g, "'");
  const raw = normalized.match(/[a-z0-9]+(?:'[a-z]+)?|[.,;:!?]/g) ?? [];

  const tokens: string[] = [];
  let negated = false;
  for (const token of raw) {
    if (CLAUSE_BREAKS.has(token)) {
      negated = false;
      continue;
    }
    if (NEGATION_CUES.has(token) || token.endsWith("n't")) {
      negated = true;
      continue;
    }
    tokens.push(negated ? NEGATION_PREFIX + token : token);
  }
  return tokens;
}

export function removeStopWords(tokens: string[], stopWords: ReadonlySet<string>): string[] {
  return tokens.filter((token) => {
    const base = token.startsWith(NEGATION_PREFIX) ? token.slice(NEGATION_PREFIX.length) : token;
    return !stopWords.has(base);
  });
}

export function ngrams(tokens: string[], maxNgram: number): string[] {
  const terms: string[] = [];
  for (let n = 1; n <= maxNgram; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      terms.push(tokens.slice(i, i + n).join(" "));
    }
  }
  return terms;
}

export function analyze(text: string, stopWords: ReadonlySet<string>, maxNgram: number): string[] {
  return ngrams(removeStopWords(tokenize(text), stopWords), maxNgram);
}

/** Smooth idf: ln((1 + n) / (1 + df)) + 1 */
export function smoothIdf(documentCount: number, documentFrequency: number): number {
  return Math.log((1 + documentCount) / (1 + documentFrequency)) + 1;
}

export class TfidfVectorizer {
  private index: Map<string, number>;
  private idf: readonly number[];
  private stopWords: ReadonlySet<string>;
  readonly maxNgram: number;

  constructor(vocabulary: readonly string[], idf: readonly number[], stopWords: Iterable<string>, maxNgram: number) {
    this.index = new Map(vocabulary.map((term, i) => [term, i]));
    this.idf = idf;
    this.stopWords = new Set(stopWords);
    this.maxNgram = maxNgram;
  }

  get size(): number {
    return this.index.size;
  }

  /** L2-normalised tf·idf; empty when no term is in the vocabulary. */
  transform(text: string): SparseVector {
    const counts = new Map<number, number>();
    for (const term of analyze(text, this.stopWords, this.maxNgram)) {
      const i = this.index.get(term);
      if (i !== undefined) counts.set(i, (counts.get(i) ?? 0) + 1);
    }

    const entries: SparseVector = [...counts.entries()]
      .sort((a, b) => a[0] - b[0])
      .map(([i, count]) => [i, count * this.idf[i]]);

    const norm = Math.sqrt(entries.reduce((sum, [, v]) => sum + v * v, 0));
    if (norm === 0) return [];
    return entries.map(([i, v]) => [i, v / norm]);
  }
}
