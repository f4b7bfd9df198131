import { createHash } from "node:crypto";
import { tokenizeWords } from "../../lib/graph.js";
import { cosineSimilarity, type EmbeddingProvider, type EmbeddingVector } from "./provider.js";

function bucketFor(token: string, dimensions: number): number {
  const digest = createHash("sha256").update(token).digest();
  return digest.readUInt32BE(0) % dimensions;
}

/**
 * Local bag-of-words embedding: each token is hashed into one of `dimensions`
 * buckets and the count vector is L2-normalized. Counts are never negative, so
 * similarities fall in [0, 1]. Used when no remote embedding model is configured.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hashing";

  constructor(private readonly dimensions = 256) {
    if (!Number.isInteger(dimensions) || dimensions < 1) {
      throw new Error(`dimensions must be a positive integer, got ${dimensions}`);
    }
  }

  embedSync(text: string): EmbeddingVector {
    const tokens = tokenizeWords(text);
    if (tokens.length === 0) return [];

    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokens) {
      vector[bucketFor(token, this.dimensions)] += 1;
    }
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return vector.map((value) => value / norm);
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.embedSync(text);
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.embedSync(text));
  }

  cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    return cosineSimilarity(a, b);
  }
}
