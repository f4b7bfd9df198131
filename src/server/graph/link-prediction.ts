import type { LinkPredictionScores } from "../../lib/contracts.js";
import { clamp, diseaseRef, drugRef, makeNodeKey } from "../../lib/graph.js";
import type { KnowledgeGraph } from "./knowledge-graph.js";

const zeroScores: LinkPredictionScores = {
  adamicAdar: 0,
  commonNeighbors: 0,
  normalizedCommonNeighbors: 0,
};

export class LinkPredictionScorer {
  constructor(private readonly graph: KnowledgeGraph) {}

  /** Structural affinity between two node keys; zeros when either node is absent. */
  scoreNodes(drugKey: string, diseaseKey: string): LinkPredictionScores {
    if (!this.graph.hasNode(drugKey) || !this.graph.hasNode(diseaseKey)) {
      return { ...zeroScores };
    }

    const shared = this.graph.commonNeighbors(drugKey, diseaseKey);
    let adamicAdar = 0;
    for (const neighbor of shared) {
      const degree = this.graph.degree(neighbor);
      // log(1) = 0: a degree-1 neighbour carries no signal
      if (degree <= 1) continue;
      adamicAdar += 1 / Math.log(degree);
    }

    const smallerDegree = Math.min(this.graph.degree(drugKey), this.graph.degree(diseaseKey));
    return {
      adamicAdar,
      commonNeighbors: shared.length,
      normalizedCommonNeighbors: shared.length / Math.max(1, smallerDegree),
    };
  }

  score(drugId: string, diseaseId: string): LinkPredictionScores {
    return this.scoreNodes(makeNodeKey(drugRef(drugId)), makeNodeKey(diseaseRef(diseaseId)));
  }

  /** Blend used by the ranking engine: 0.7 · min(1, AA / 2) + 0.3 · NCN, capped at 1. */
  graphScore(drugId: string, diseaseId: string): number {
    const scores = this.score(drugId, diseaseId);
    const normalizedAdamicAdar = Math.min(1, scores.adamicAdar / 2);
    return clamp(0.7 * normalizedAdamicAdar + 0.3 * scores.normalizedCommonNeighbors);
  }
}
