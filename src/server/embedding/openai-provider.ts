import type { LRUCache } from "lru-cache";
import OpenAI from "openai";
import { chunkArray } from "../../lib/graph.js";
import { createTTLCache } from "../cache/lru.js";
import { appConfig, type AppConfig } from "../config.js";
import { logEvent } from "../telemetry.js";
import { HashingEmbeddingProvider } from "./hashing-provider.js";
import { cosineSimilarity, type EmbeddingProvider, type EmbeddingVector } from "./provider.js";

/** The slice of the OpenAI client this provider calls. */
export type EmbeddingsApi = {
  create(body: { model: string; input: string[] }): Promise<{
    data: Array<{ embedding: number[]; index: number }>;
  }>;
};

type OpenAiEmbeddingProviderOptions = {
  model?: string;
  batchSize?: number;
  cacheTtlMs?: number;
  cacheMaxEntries?: number;
};

export class OpenAiEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  private readonly model: string;
  private readonly batchSize: number;
  private readonly cache: LRUCache<string, EmbeddingVector>;

  constructor(
    private readonly api: EmbeddingsApi,
    options: OpenAiEmbeddingProviderOptions = {},
  ) {
    this.model = options.model ?? appConfig.embeddings.openAiModel;
    this.batchSize = options.batchSize ?? appConfig.embeddings.openAiBatchSize;
    this.cache = createTTLCache<EmbeddingVector>({
      ttlMs: options.cacheTtlMs ?? appConfig.cache.ttlMs,
      maxEntries: options.cacheMaxEntries ?? appConfig.cache.maxEntries,
    });
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedBatch([text]);
    return vector ?? [];
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    const keys = texts.map((text) => text.trim());
    // results come from this map; the LRU may evict entries written earlier in this call
    const resolved = new Map<string, EmbeddingVector>();
    const missing: string[] = [];
    for (const key of new Set(keys)) {
      if (!key) continue;
      const cached = this.cache.get(key);
      if (cached) resolved.set(key, cached);
      else missing.push(key);
    }

    for (const chunk of chunkArray(missing, this.batchSize)) {
      const response = await this.api.create({ model: this.model, input: chunk });
      if (response.data.length !== chunk.length) {
        throw new Error(
          `Embedding response returned ${response.data.length} vectors for ${chunk.length} inputs`,
        );
      }
      for (const item of response.data) {
        const key = chunk[item.index];
        if (key === undefined) {
          throw new Error(`Embedding response index ${item.index} is out of range`);
        }
        resolved.set(key, item.embedding);
        this.cache.set(key, item.embedding);
      }
    }

    return keys.map((key) => resolved.get(key) ?? []);
  }

  cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    return cosineSimilarity(a, b);
  }
}

export function createEmbeddingProvider(
  config: Pick<AppConfig, "embeddings" | "openAiApiKey"> = appConfig,
): EmbeddingProvider {
  const { provider } = config.embeddings;
  if (provider !== "hashing" && config.openAiApiKey) {
    const client = new OpenAI({ apiKey: config.openAiApiKey });
    logEvent("info", "embeddings.provider", {
      provider: "openai",
      model: config.embeddings.openAiModel,
    });
    return new OpenAiEmbeddingProvider(client.embeddings, {
      model: config.embeddings.openAiModel,
      batchSize: config.embeddings.openAiBatchSize,
    });
  }

  if (provider === "openai") {
    logEvent("warn", "embeddings.fallback", { reason: "OPENAI_API_KEY missing" });
  }
  logEvent("info", "embeddings.provider", {
    provider: "hashing",
    dimensions: config.embeddings.hashingDimensions,
  });
  return new HashingEmbeddingProvider(config.embeddings.hashingDimensions);
}
