import { normalizeText } from './normalize';

export const STOPWORDS_ES: readonly string[] = [
  'de',
  'la',
  'el',
  'los',
  'las',
  'y',
  'en',
  'del',
  'para',
  'con',
  'a',
  'por',
  'una',
  'un',
  'al',
  'que',
  'se',
  'su',
  'sus',
];

const STOPWORDS = new Set(STOPWORDS_ES);

const TOKEN_REGEX = /[\p{L}\p{M}\p{N}_]+/gu;

/** Sparse term vector: vocabulary index → weight. */
export type TermVector = Map<number, number>;

export interface VectorSpace {
  vocabulary: Map<string, number>;
  objectiveVectors: TermVector[];
  activityVectors: TermVector[];
}

export const tokenize = (text: string): string[] => {
  const tokens = normalizeText(text).match(TOKEN_REGEX) ?? [];
  return tokens.filter((token) => token.length >= 2 && !STOPWORDS.has(token));
};

/** Unigrams followed by space-joined bigrams. */
export const extractTerms = (text: string): string[] => {
  const tokens = tokenize(text);
  const terms = [...tokens];

  for (let index = 0; index < tokens.length - 1; index += 1) {
    terms.push(`${tokens[index]} ${tokens[index + 1]}`);
  }

  return terms;
};

const countTerms = (terms: string[]): Map<string, number> => {
  const counts = new Map<string, number>();
  terms.forEach((term) => {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  });
  return counts;
};

const toUnitVector = (
  counts: Map<string, number>,
  vocabulary: Map<string, number>,
  idf: number[],
): TermVector => {
  const vector: TermVector = new Map();
  let sumOfSquares = 0;

  counts.forEach((count, term) => {
    const index = vocabulary.get(term);
    if (index === undefined) {
      return;
    }
    const weight = count * (idf[index] ?? 0);
    vector.set(index, weight);
    sumOfSquares += weight * weight;
  });

  if (sumOfSquares === 0) {
    return new Map();
  }

  const norm = Math.sqrt(sumOfSquares);
  vector.forEach((weight, index) => {
    vector.set(index, weight / norm);
  });

  return vector;
};

/**
 * Fits a smoothed TF-IDF model over the union of both sequences so that
 * objective and activity vectors share one vocabulary.
 */
export const buildVectorSpace = (objectiveTexts: string[], activityTexts: string[]): VectorSpace => {
  const corpus = [...objectiveTexts, ...activityTexts];
  const documentCounts = corpus.map((text) => countTerms(extractTerms(text)));

  const documentFrequency = new Map<string, number>();
  documentCounts.forEach((counts) => {
    counts.forEach((_count, term) => {
      documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
    });
  });

  const terms = Array.from(documentFrequency.keys()).sort();
  const vocabulary = new Map<string, number>(terms.map((term, index) => [term, index]));

  const documents = corpus.length;
  const idf = terms.map((term) => Math.log((1 + documents) / (1 + (documentFrequency.get(term) ?? 0))) + 1);

  const vectors = documentCounts.map((counts) => toUnitVector(counts, vocabulary, idf));

  return {
    vocabulary,
    objectiveVectors: vectors.slice(0, objectiveTexts.length),
    activityVectors: vectors.slice(objectiveTexts.length),
  };
};

export const cosineSimilarity = (left: TermVector, right: TermVector): number => {
  if (left.size === 0 || right.size === 0) {
    return 0;
  }

  const [smaller, larger] = left.size <= right.size ? [left, right] : [right, left];
  let dot = 0;
  smaller.forEach((weight, index) => {
    dot += weight * (larger.get(index) ?? 0);
  });

  // Both vectors are unit length, so the dot product is the cosine.
  return Math.min(Math.max(dot, 0), 1);
};
