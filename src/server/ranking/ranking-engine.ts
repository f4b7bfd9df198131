import type {
  DiseaseRecord,
  DrugRecord,
  ErrorResult,
  RankingWeights,
  ScoredCandidate,
} from "../../lib/contracts.js";
import { normalizeScore } from "../../lib/graph.js";
import { appConfig } from "../config.js";
import type { EmbeddingProvider, EmbeddingVector } from "../embedding/provider.js";
import type { EntityStore } from "../entity/entity-store.js";
import { CollaboratorError, ConfigurationError } from "../errors.js";
import type { LinkPredictionScorer } from "../graph/link-prediction.js";
import { logEvent, toErrorMessage } from "../telemetry.js";

export type RankingEngineDeps = {
  entities: EntityStore;
  scorer: LinkPredictionScorer;
  embeddings: EmbeddingProvider;
  weights?: RankingWeights;
};

export type WeightUpdateResult =
  | { updated: true; weights: RankingWeights }
  | { updated: false; weights: RankingWeights; error: string };

export type RankingStats = {
  targetDisease: string;
  knownDrugsCount: number;
  candidateDrugsCount: number;
  textWeight: number;
  graphWeight: number;
  cachedEmbeddings: number;
};

const defaultWeights: RankingWeights = { textWeight: 0.6, graphWeight: 0.4 };

function normalizeWeights(textWeight: number, graphWeight: number): RankingWeights | null {
  if (!Number.isFinite(textWeight) || !Number.isFinite(graphWeight)) return null;
  if (textWeight < 0 || graphWeight < 0) return null;
  const total = textWeight + graphWeight;
  if (total <= 0) return null;
  return { textWeight: textWeight / total, graphWeight: graphWeight / total };
}

export function diseaseQueryText(disease: DiseaseRecord): string {
  return `${disease.diseaseName} ${disease.synonyms}`;
}

/**
 * Min-max normalizes `score` over every candidate. A flat range (one candidate, or
 * all scores equal) maps everything to 1. Expects the list sorted by score descending.
 */
export function withNormalizedScores(
  candidates: Array<Omit<ScoredCandidate, "normalizedScore">>,
): ScoredCandidate[] {
  if (candidates.length === 0) return [];
  const maxScore = candidates[0].score;
  const minScore = candidates[candidates.length - 1].score;
  const range = maxScore - minScore;

  return candidates.map((candidate) => ({
    ...candidate,
    normalizedScore: range > 0 ? normalizeScore((candidate.score - minScore) / range) : 1,
  }));
}

/**
 * Fuses text similarity over drug indications with link-prediction affinity on the
 * knowledge graph. Indication vectors are embedded once when the engine is created
 * and reused for its whole lifetime.
 */
export class RankingEngine {
  private weightsState: RankingWeights;

  private constructor(
    private readonly entities: EntityStore,
    private readonly scorer: LinkPredictionScorer,
    private readonly embeddings: EmbeddingProvider,
    private readonly drugVectors: ReadonlyMap<string, EmbeddingVector>,
    weights: RankingWeights,
  ) {
    this.weightsState = weights;
  }

  static async create(deps: RankingEngineDeps): Promise<RankingEngine> {
    const requested = deps.weights ?? {
      textWeight: appConfig.ranking.textWeight,
      graphWeight: appConfig.ranking.graphWeight,
    };
    const weights =
      normalizeWeights(requested.textWeight, requested.graphWeight) ?? defaultWeights;

    const drugs = deps.entities.allDrugs().filter((drug) => drug.indicationsText.length > 0);
    let vectors: EmbeddingVector[];
    try {
      vectors = await deps.embeddings.embedBatch(drugs.map((drug) => drug.indicationsText));
    } catch (error) {
      throw new CollaboratorError("embedding drug indications", error);
    }

    const drugVectors = new Map<string, EmbeddingVector>();
    drugs.forEach((drug, index) => {
      const vector = vectors[index];
      if (vector && vector.length > 0) drugVectors.set(drug.drugId, vector);
    });

    logEvent("info", "ranking.embeddings_cached", {
      provider: deps.embeddings.name,
      cachedEmbeddings: drugVectors.size,
    });

    return new RankingEngine(deps.entities, deps.scorer, deps.embeddings, drugVectors, weights);
  }

  /** Same vectors and weights, scored against another graph. */
  withScorer(scorer: LinkPredictionScorer): RankingEngine {
    return new RankingEngine(
      this.entities,
      scorer,
      this.embeddings,
      this.drugVectors,
      this.weightsState,
    );
  }

  get weights(): RankingWeights {
    return { ...this.weightsState };
  }

  get cachedEmbeddings(): number {
    return this.drugVectors.size;
  }

  updateWeights(textWeight: number, graphWeight: number): WeightUpdateResult {
    const next = normalizeWeights(textWeight, graphWeight);
    if (!next) {
      const error = new ConfigurationError(
        `Invalid ranking weights text=${textWeight} graph=${graphWeight}; keeping current weights`,
      );
      logEvent("warn", "ranking.weights_rejected", {
        textWeight,
        graphWeight,
        message: error.message,
      });
      return { updated: false, weights: this.weights, error: error.message };
    }

    this.weightsState = next;
    logEvent("info", "ranking.weights_updated", { ...next });
    return { updated: true, weights: this.weights };
  }

  candidatesFor(diseaseId: string): DrugRecord[] {
    const known = new Set(
      this.entities.knownDrugsForDisease(diseaseId).map((drug) => drug.drugId),
    );
    return this.entities.allDrugs().filter((drug) => !known.has(drug.drugId));
  }

  async rank(diseaseQuery: string, topK: number): Promise<ScoredCandidate[]> {
    const target = this.entities.fuzzyMatchDisease(diseaseQuery);
    if (!target) {
      logEvent("info", "ranking.no_match", { diseaseQuery });
      return [];
    }

    const candidates = this.candidatesFor(target.diseaseId);
    if (candidates.length === 0) return [];

    let diseaseVector: EmbeddingVector;
    try {
      diseaseVector = await this.embeddings.embed(diseaseQueryText(target));
    } catch (error) {
      throw new CollaboratorError("embedding disease text", error);
    }

    const { textWeight, graphWeight } = this.weightsState;
    const scored: Array<Omit<ScoredCandidate, "normalizedScore">> = [];

    for (const drug of candidates) {
      try {
        const textScore = this.textScore(drug.drugId, diseaseVector);
        const graphScore = this.scorer.graphScore(drug.drugId, target.diseaseId);
        scored.push({
          drugId: drug.drugId,
          drugName: drug.drugName,
          atc: drug.atc,
          indicationsText: drug.indicationsText,
          score: textWeight * textScore + graphWeight * graphScore,
          textScore,
          graphScore,
          targetDiseaseId: target.diseaseId,
          targetDiseaseName: target.diseaseName,
        });
      } catch (error) {
        logEvent("warn", "ranking.candidate_skipped", {
          drugId: drug.drugId,
          message: toErrorMessage(error),
        });
      }
    }

    // Array.prototype.sort is stable: equal scores keep candidate order.
    scored.sort((a, b) => b.score - a.score);
    return withNormalizedScores(scored).slice(0, Math.max(0, topK));
  }

  rankingStats(diseaseQuery: string): RankingStats | ErrorResult {
    const target = this.entities.fuzzyMatchDisease(diseaseQuery);
    if (!target) return { error: "no matching disease" };

    return {
      targetDisease: target.diseaseName,
      knownDrugsCount: this.entities.knownDrugsForDisease(target.diseaseId).length,
      candidateDrugsCount: this.candidatesFor(target.diseaseId).length,
      textWeight: this.weightsState.textWeight,
      graphWeight: this.weightsState.graphWeight,
      cachedEmbeddings: this.drugVectors.size,
    };
  }

  private textScore(drugId: string, diseaseVector: EmbeddingVector): number {
    const drugVector = this.drugVectors.get(drugId);
    if (!drugVector) return 0;
    return normalizeScore(this.embeddings.cosineSimilarity(drugVector, diseaseVector));
  }
}
