import { describe, it } from "node:test";
import assert from "node:assert";
import { HashingEmbeddingProvider } from "./hashing-provider.js";
import { cosineSimilarity } from "./provider.js";

function norm(vector: readonly number[]): number {
  return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

describe("HashingEmbeddingProvider", () => {
  it("should produce unit vectors of the configured size", () => {
    const provider = new HashingEmbeddingProvider(64);
    const vector = provider.embedSync("reduces blood glucose");

    assert.strictEqual(vector.length, 64);
    assert.ok(Math.abs(norm(vector) - 1) < 1e-12);
  });

  it("should be deterministic and case-insensitive", async () => {
    const provider = new HashingEmbeddingProvider(32);
    assert.deepStrictEqual(
      await provider.embed("Type 2 Diabetes"),
      await provider.embed("type 2 diabetes"),
    );
  });

  it("should return an empty vector for text without tokens", async () => {
    const provider = new HashingEmbeddingProvider();
    assert.deepStrictEqual(await provider.embedBatch(["", "  ", "..."]), [[], [], []]);
  });

  it("should rank shared vocabulary above disjoint vocabulary", async () => {
    const provider = new HashingEmbeddingProvider(512);
    const [query, related, same] = await provider.embedBatch([
      "type 2 diabetes",
      "lowers blood sugar in type 2 diabetes",
      "type 2 diabetes",
    ]);

    assert.ok(Math.abs(provider.cosineSimilarity(query, same) - 1) < 1e-12);
    assert.ok(provider.cosineSimilarity(query, related) > 0);
  });

  it("should reject a non-positive dimension count", () => {
    assert.throws(() => new HashingEmbeddingProvider(0), /positive integer/);
  });
});

describe("cosineSimilarity", () => {
  it("should return 0 for empty, mismatched or zero vectors", () => {
    assert.strictEqual(cosineSimilarity([], [1]), 0);
    assert.strictEqual(cosineSimilarity([1, 0], [1, 0, 0]), 0);
    assert.strictEqual(cosineSimilarity([0, 0], [1, 0]), 0);
  });

  it("should measure the angle between vectors", () => {
    assert.strictEqual(cosineSimilarity([1, 0], [0, 1]), 0);
    assert.strictEqual(cosineSimilarity([2, 0], [3, 0]), 1);
    assert.strictEqual(cosineSimilarity([1, 0], [-1, 0]), -1);
  });
});
