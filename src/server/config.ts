import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false, quiet: true });
  }
}

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

export type EmbeddingProviderMode = "auto" | "openai" | "hashing";

const parseEmbeddingProviderMode = (value: string | undefined): EmbeddingProviderMode => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "openai") return "openai";
  if (normalized === "hashing" || normalized === "local") return "hashing";
  return "auto";
};

export type LogLevelSetting = "info" | "warn" | "error" | "silent";

const parseLogLevel = (value: string | undefined): LogLevelSetting => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "warn" || normalized === "error" || normalized === "silent") {
    return normalized;
  }
  return "info";
};

export const appConfig = {
  openAiApiKey: process.env.OPENAI_API_KEY,
  dataPath: process.env.DATA_PATH ?? path.resolve(process.cwd(), "data", "seed.json"),
  server: {
    host: process.env.HOST ?? "0.0.0.0",
    port: parseNumber(process.env.PORT, 8000),
  },
  ranking: {
    textWeight: parseNumber(process.env.RANK_TEXT_WEIGHT, 0.6),
    graphWeight: parseNumber(process.env.RANK_GRAPH_WEIGHT, 0.4),
    defaultTopK: Math.max(1, Math.floor(parseNumber(process.env.RANK_DEFAULT_TOP_K, 10))),
    maxTopK: Math.max(1, Math.floor(parseNumber(process.env.RANK_MAX_TOP_K, 50))),
  },
  explain: {
    maxPathLength: Math.max(1, Math.floor(parseNumber(process.env.EXPLAIN_MAX_PATH_LENGTH, 3))),
    maxPaths: Math.max(1, Math.floor(parseNumber(process.env.EXPLAIN_MAX_PATHS, 3))),
  },
  entity: {
    fuzzyMatchThreshold: parseNumber(process.env.FUZZY_MATCH_THRESHOLD, 0.3),
  },
  embeddings: {
    provider: parseEmbeddingProviderMode(process.env.EMBEDDING_PROVIDER),
    openAiModel: process.env.OPENAI_EMBEDDING_MODEL ?? "text-embedding-3-small",
    openAiBatchSize: Math.max(1, Math.floor(parseNumber(process.env.OPENAI_EMBEDDING_BATCH_SIZE, 96))),
    hashingDimensions: Math.max(
      8,
      Math.floor(parseNumber(process.env.HASHING_EMBEDDING_DIMENSIONS, 256)),
    ),
  },
  cache: {
    ttlMs: parseNumber(process.env.CACHE_TTL_MS, 30 * 60 * 1000),
    maxEntries: parseNumber(process.env.CACHE_MAX_ENTRIES, 2000),
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
  },
};

export type AppConfig = typeof appConfig;

export function assertRuntimeConfig(): void {
  if (appConfig.embeddings.provider === "openai" && !appConfig.openAiApiKey) {
    console.warn("OPENAI_API_KEY missing: text similarity will use hashing embeddings.");
  }
  if (appConfig.ranking.textWeight + appConfig.ranking.graphWeight <= 0) {
    console.warn("RANK_TEXT_WEIGHT + RANK_GRAPH_WEIGHT must be positive: using 0.6 / 0.4.");
  }
}
