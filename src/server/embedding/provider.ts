export type EmbeddingVector = readonly number[];

/**
 * Maps free text to a fixed-length vector. The model behind it is opaque; callers only
 * rely on `cosineSimilarity` being comparable across vectors from the same provider.
 */
export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<EmbeddingVector>;
  embedBatch(texts: string[]): Promise<EmbeddingVector[]>;
  cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number;
}

/** Cosine similarity; 0 for empty, zero-norm or mismatched vectors. */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  if (a.length === 0 || b.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
