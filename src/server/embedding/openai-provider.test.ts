import { describe, it } from "node:test";
import assert from "node:assert";
import { appConfig } from "../config.js";
import {
  createEmbeddingProvider,
  OpenAiEmbeddingProvider,
  type EmbeddingsApi,
} from "./openai-provider.js";

type CreateBody = { model: string; input: string[] };

/** Returns `[input.length, position]` per input, in reverse order to exercise `index`. */
function fakeApi(calls: CreateBody[]): EmbeddingsApi {
  return {
    async create(body) {
      calls.push(body);
      const data = body.input.map((text, index) => ({
        embedding: [text.length, index],
        index,
      }));
      return { data: data.reverse() };
    },
  };
}

describe("OpenAiEmbeddingProvider", () => {
  it("should batch unique uncached texts and keep input order", async () => {
    const calls: CreateBody[] = [];
    const provider = new OpenAiEmbeddingProvider(fakeApi(calls), {
      model: "test-embedding-model",
      batchSize: 2,
    });

    const vectors = await provider.embedBatch(["aa", "bbb", "aa", "c", "  "]);

    assert.deepStrictEqual(
      calls.map((call) => call.input),
      [["aa", "bbb"], ["c"]],
    );
    assert.strictEqual(calls[0].model, "test-embedding-model");
    assert.deepStrictEqual(vectors, [[2, 0], [3, 1], [2, 0], [1, 0], []]);
  });

  it("should serve repeated texts from the cache", async () => {
    const calls: CreateBody[] = [];
    const provider = new OpenAiEmbeddingProvider(fakeApi(calls), { batchSize: 8 });

    await provider.embed("type 2 diabetes");
    const again = await provider.embed(" type 2 diabetes ");

    assert.strictEqual(calls.length, 1);
    assert.deepStrictEqual(again, [15, 0]);
  });

  it("should return every vector when the batch outgrows the cache", async () => {
    const calls: CreateBody[] = [];
    const provider = new OpenAiEmbeddingProvider(fakeApi(calls), {
      batchSize: 10,
      cacheMaxEntries: 2,
    });

    const vectors = await provider.embedBatch(["alpha", "beta", "gamma"]);

    assert.strictEqual(calls.length, 1);
    assert.deepStrictEqual(vectors, [[5, 0], [4, 1], [5, 2]]);
  });

  it("should reject a response with the wrong number of vectors", async () => {
    const api: EmbeddingsApi = {
      async create() {
        return { data: [] };
      },
    };
    const provider = new OpenAiEmbeddingProvider(api);

    await assert.rejects(provider.embed("migraine"), /returned 0 vectors for 1 inputs/);
  });

  it("should propagate API failures", async () => {
    const api: EmbeddingsApi = {
      async create() {
        throw new Error("rate limited");
      },
    };
    const provider = new OpenAiEmbeddingProvider(api);

    await assert.rejects(provider.embed("migraine"), /rate limited/);
  });
});

describe("createEmbeddingProvider", () => {
  it("should use hashing embeddings when asked to", () => {
    const provider = createEmbeddingProvider({
      openAiApiKey: "test-secret",
      embeddings: { ...appConfig.embeddings, provider: "hashing" },
    });
    assert.strictEqual(provider.name, "hashing");
  });

  it("should fall back to hashing embeddings without an API key", () => {
    const provider = createEmbeddingProvider({
      openAiApiKey: undefined,
      embeddings: { ...appConfig.embeddings, provider: "openai" },
    });
    assert.strictEqual(provider.name, "hashing");
  });

  it("should use OpenAI embeddings when a key is configured", () => {
    const provider = createEmbeddingProvider({
      openAiApiKey: "test-secret",
      embeddings: { ...appConfig.embeddings, provider: "auto" },
    });
    assert.strictEqual(provider.name, "openai");
  });
});
