/**
 * @module semantic/embedder
 * Text → vector backend consumed by the semantic matcher.
 */

export interface Embedder {
  /** One vector per input text, in input order. */
  embedTexts(texts: string[]): Promise<number[][]>;
  id(): string;
}

/** Cosine similarity in [-1, 1]; 0 when either vector is all zeros or lengths differ. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
