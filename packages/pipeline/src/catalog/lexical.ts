export interface SparseVector {
  indices: number[];
  values: number[];
}

export const LATE_INTERACTION_DIMENSIONS = 128;
export const LOCAL_DENSE_DIMENSIONS = 384;

const SPARSE_INDEX_SPACE = 2 ** 31 - 1;
const BM25_K1 = 1.2;
const BM25_B = 0.75;
const BM25_AVERAGE_LENGTH = 256;

const STOP_WORDS = new Set([
  'a',
  'an',
  'and',
  'are',
  'as',
  'at',
  'be',
  'by',
  'for',
  'from',
  'in',
  'is',
  'it',
  'of',
  'on',
  'or',
  'the',
  'this',
  'to',
  'with'
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0 && !STOP_WORDS.has(token));
}

/** 32-bit FNV-1a. */
export function hashToken(token: string, seed = 0x811c9dc5): number {
  let hash = seed >>> 0;
  for (let index = 0; index < token.length; index += 1) {
    hash ^= token.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

const normalize = (vector: number[]): number[] => {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  if (norm === 0) {
    return vector;
  }
  const scale = 1 / Math.sqrt(norm);
  return vector.map((value) => value * scale);
};

const trigrams = (token: string): string[] => {
  const padded = `#${token}#`;
  if (padded.length <= 3) {
    return [padded];
  }
  const grams: string[] = [];
  for (let index = 0; index + 3 <= padded.length; index += 1) {
    grams.push(padded.slice(index, index + 3));
  }
  return grams;
};

const accumulateToken = (target: number[], token: string): void => {
  const dimensions = target.length;
  const whole = hashToken(token);
  target[whole % dimensions] += whole & 1 ? 2 : -2;
  for (const gram of trigrams(token)) {
    const hash = hashToken(gram);
    target[hash % dimensions] += hash & 1 ? 1 : -1;
  }
};

export function tokenVector(token: string, dimensions = LATE_INTERACTION_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  accumulateToken(vector, token);
  return normalize(vector);
}

/**
 * One fixed-width vector per token, compared with MaxSim at query time.
 */
export function lateInteractionVectors(text: string): number[][] {
  const tokens = tokenize(text);
  if (tokens.length === 0) {
    return [new Array<number>(LATE_INTERACTION_DIMENSIONS).fill(0)];
  }
  return tokens.map((token) => tokenVector(token));
}

export function hashedDenseVector(text: string, dimensions = LOCAL_DENSE_DIMENSIONS): number[] {
  const vector = new Array<number>(dimensions).fill(0);
  for (const token of tokenize(text)) {
    accumulateToken(vector, token);
  }
  return normalize(vector);
}

const sparseIndex = (token: string): number => hashToken(token) % SPARSE_INDEX_SPACE;

const toSparse = (weights: Map<number, number>): SparseVector => {
  const entries = [...weights.entries()].sort((left, right) => left[0] - right[0]);
  return {
    indices: entries.map(([index]) => index),
    values: entries.map(([, value]) => value)
  };
};

/**
 * Saturated term frequencies for stored passages. Inverse document frequency is
 * applied by the vector store at query time.
 */
export function bm25PassageVector(text: string): SparseVector {
  const tokens = tokenize(text);
  const counts = new Map<number, number>();
  for (const token of tokens) {
    const index = sparseIndex(token);
    counts.set(index, (counts.get(index) ?? 0) + 1);
  }
  const lengthNorm = 1 - BM25_B + BM25_B * (tokens.length / BM25_AVERAGE_LENGTH);
  const weights = new Map<number, number>();
  for (const [index, tf] of counts) {
    weights.set(index, (tf * (BM25_K1 + 1)) / (tf + BM25_K1 * lengthNorm));
  }
  return toSparse(weights);
}

export function bm25QueryVector(text: string): SparseVector {
  const weights = new Map<number, number>();
  for (const token of tokenize(text)) {
    weights.set(sparseIndex(token), 1);
  }
  return toSparse(weights);
}

export function cosineSimilarity(left: number[], right: number[]): number {
  const length = Math.min(left.length, right.length);
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let index = 0; index < length; index += 1) {
    dot += left[index] * right[index];
    leftNorm += left[index] * left[index];
    rightNorm += right[index] * right[index];
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Sum over query tokens of the best-matching document token. */
export function maxSimilarity(query: number[][], document: number[][]): number {
  let total = 0;
  for (const queryToken of query) {
    let best = Number.NEGATIVE_INFINITY;
    for (const documentToken of document) {
      const similarity = cosineSimilarity(queryToken, documentToken);
      if (similarity > best) {
        best = similarity;
      }
    }
    if (Number.isFinite(best)) {
      total += best;
    }
  }
  return total;
}
