import type {
  DiseaseRecord,
  DrugRecord,
  ErrorResult,
  Explanation,
  GraphStats,
  LinkPredictionScores,
  ScoredCandidate,
} from "../lib/contracts.js";
import { appConfig } from "./config.js";
import type { EmbeddingProvider } from "./embedding/provider.js";
import type { EntityStore } from "./entity/entity-store.js";
import { CollaboratorError, RepurposeError, toErrorResult } from "./errors.js";
import {
  PathExplainer,
  type DiseaseProfile,
  type DrugMechanism,
  type PathExplainerOptions,
} from "./explain/path-explainer.js";
import { buildKnowledgeGraph } from "./graph/graph-builder.js";
import type { KnowledgeGraph } from "./graph/knowledge-graph.js";
import { LinkPredictionScorer } from "./graph/link-prediction.js";
import {
  RankingEngine,
  type RankingStats,
  type WeightUpdateResult,
} from "./ranking/ranking-engine.js";
import {
  endRequestLog,
  errorRequestLog,
  logEvent,
  startRequestLog,
  stepRequestLog,
  toErrorMessage,
  warnRequestLog,
} from "./telemetry.js";

export type RepurposeServiceOptions = {
  loadEntities: () => Promise<EntityStore>;
  embeddings: EmbeddingProvider;
  weights?: { textWeight: number; graphWeight: number };
  explain?: PathExplainerOptions;
};

export type HealthStatus =
  | {
      status: "healthy";
      healthy: true;
      initialized: true;
      drugsCount: number;
      diseasesCount: number;
      graphNodes: number;
      graphEdges: number;
    }
  | { status: "not_initialized" | "unhealthy"; healthy: false; error?: string };

/** Everything a request reads. Rebuilds swap it as one value. */
type ServiceState = {
  entities: EntityStore;
  graph: KnowledgeGraph;
  scorer: LinkPredictionScorer;
  ranker: RankingEngine;
  explainer: PathExplainer;
};

export class RepurposeService {
  private state: ServiceState | null = null;
  private initializing: Promise<ServiceState> | null = null;

  constructor(private readonly options: RepurposeServiceOptions) {}

  get initialized(): boolean {
    return this.state !== null;
  }

  /**
   * Loads entities, builds the graph and embeds every drug once. Concurrent callers
   * share the same in-flight initialization; a failed attempt can be retried.
   */
  async initialize(): Promise<void> {
    await this.ready();
  }

  /** Rebuilds the graph from the loaded entities and swaps it in atomically. */
  async buildGraph(): Promise<KnowledgeGraph> {
    const current = await this.ready();
    const graph = buildKnowledgeGraph(current.entities);
    const scorer = new LinkPredictionScorer(graph);
    this.state = {
      entities: current.entities,
      graph,
      scorer,
      ranker: current.ranker.withScorer(scorer),
      explainer: new PathExplainer(current.entities, graph, this.options.explain),
    };
    return graph;
  }

  async rank(
    diseaseQuery: string,
    topK: number = appConfig.ranking.defaultTopK,
  ): Promise<ScoredCandidate[]> {
    const log = startRequestLog("rank", { diseaseQuery, topK });
    try {
      const { ranker } = await this.ready();
      const candidates = await ranker.rank(diseaseQuery, topK);
      if (candidates.length === 0) warnRequestLog(log, "rank.empty");
      endRequestLog(log, { count: candidates.length });
      return candidates;
    } catch (error) {
      errorRequestLog(log, "rank.failed", error);
      return [];
    }
  }

  async explain(drugId: string, diseaseQuery: string): Promise<Explanation | ErrorResult> {
    const log = startRequestLog("explain", { drugId, diseaseQuery });
    try {
      const { explainer } = await this.ready();
      const explanation = explainer.explain(drugId, diseaseQuery);
      if ("error" in explanation) {
        stepRequestLog(log, "explain.unresolved", { error: explanation.error });
      }
      endRequestLog(log);
      return explanation;
    } catch (error) {
      errorRequestLog(log, "explain.failed", error);
      return { error: `Failed to generate explanation: ${toErrorResult(error).error}` };
    }
  }

  async linkPredictionScore(drugId: string, diseaseId: string): Promise<LinkPredictionScores> {
    const { scorer } = await this.ready();
    return scorer.score(drugId, diseaseId);
  }

  async graphStats(): Promise<GraphStats> {
    const { graph } = await this.ready();
    return graph.stats();
  }

  async updateWeights(textWeight: number, graphWeight: number): Promise<WeightUpdateResult> {
    const { ranker } = await this.ready();
    return ranker.updateWeights(textWeight, graphWeight);
  }

  async rankingStats(diseaseQuery: string): Promise<RankingStats | ErrorResult> {
    const { ranker } = await this.ready();
    return ranker.rankingStats(diseaseQuery);
  }

  async drugInfo(drugId: string): Promise<DrugRecord | null> {
    const { entities } = await this.ready();
    return entities.drugById(drugId);
  }

  async diseaseInfo(diseaseId: string): Promise<DiseaseRecord | null> {
    const { entities } = await this.ready();
    return entities.diseaseById(diseaseId);
  }

  async allDrugs(): Promise<readonly DrugRecord[]> {
    const { entities } = await this.ready();
    return entities.allDrugs();
  }

  async allDiseases(): Promise<readonly DiseaseRecord[]> {
    const { entities } = await this.ready();
    return entities.allDiseases();
  }

  async searchDiseases(query: string): Promise<DiseaseRecord[]> {
    const { entities } = await this.ready();
    return entities.searchDiseases(query);
  }

  async drugMechanism(drugId: string): Promise<DrugMechanism | ErrorResult> {
    const { explainer } = await this.ready();
    return explainer.drugMechanism(drugId);
  }

  async diseaseProfile(diseaseId: string): Promise<DiseaseProfile | ErrorResult> {
    const { explainer } = await this.ready();
    return explainer.diseaseProfile(diseaseId);
  }

  /** Reports state without triggering initialization. */
  healthCheck(): HealthStatus {
    const state = this.state;
    if (!state) return { status: "not_initialized", healthy: false };
    try {
      return {
        status: "healthy",
        healthy: true,
        initialized: true,
        drugsCount: state.entities.allDrugs().length,
        diseasesCount: state.entities.allDiseases().length,
        graphNodes: state.graph.nodeCount,
        graphEdges: state.graph.edgeCount,
      };
    } catch (error) {
      return { status: "unhealthy", healthy: false, error: toErrorResult(error).error };
    }
  }

  private async ready(): Promise<ServiceState> {
    if (this.state) return this.state;
    if (!this.initializing) {
      this.initializing = this.createState()
        .catch((error: unknown) => {
          logEvent("error", "service.initialize_failed", { message: toErrorMessage(error) });
          // every caller sees a coded error, whichever operation triggered the load
          throw error instanceof RepurposeError
            ? error
            : new CollaboratorError("initialization", error);
        })
        .finally(() => {
          this.initializing = null;
        });
    }
    const state = await this.initializing;
    if (!this.state) this.state = state;
    return this.state;
  }

  private async createState(): Promise<ServiceState> {
    const startedAt = Date.now();
    logEvent("info", "service.initializing");

    const entities = await this.options.loadEntities();
    const graph = buildKnowledgeGraph(entities);
    const scorer = new LinkPredictionScorer(graph);
    const ranker = await RankingEngine.create({
      entities,
      scorer,
      embeddings: this.options.embeddings,
      weights: this.options.weights,
    });
    const explainer = new PathExplainer(entities, graph, this.options.explain);

    logEvent("info", "service.initialized", {
      elapsedMs: Date.now() - startedAt,
      drugs: entities.allDrugs().length,
      diseases: entities.allDiseases().length,
    });
    return { entities, graph, scorer, ranker, explainer };
  }
}
