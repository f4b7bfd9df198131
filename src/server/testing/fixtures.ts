import type { EntitySnapshot } from "../../lib/contracts.js";
import { InMemoryEntityStore } from "../entity/entity-store.js";
import { cosineSimilarity, type EmbeddingProvider, type EmbeddingVector } from "../embedding/provider.js";

/**
 * Three drugs, two diseases, one shared gene. D2 treats Dis1 and targets G1, so the
 * build propagates Dis1 - G1 via D2; D1 reaches Dis1 only through G1.
 */
export function sampleSnapshot(): EntitySnapshot {
  return {
    drugs: [
      {
        drugId: "D1",
        drugName: "Glucofen",
        atc: " A10XX01 ",
        indicationsText: "Lowers blood sugar in type 2 diabetes",
      },
      { drugId: "D2", drugName: "Sugarex", atc: "A10XX02", indicationsText: "Treats obesity" },
      {
        drugId: "D3",
        drugName: "Headacil",
        atc: "N02XX01",
        indicationsText: "Relieves migraine headache",
      },
    ],
    diseases: [
      { diseaseId: "Dis1", diseaseName: "Type 2 Diabetes", synonyms: "Diabetes Mellitus" },
      { diseaseId: "Dis2", diseaseName: "Migraine", synonyms: "headache" },
    ],
    evidence: [
      { drugId: "D2", diseaseId: "Dis1", evidence: "Approved" },
      { drugId: "D3", diseaseId: "Dis2", evidence: "Approved" },
    ],
    geneAssociations: [
      { drugId: "D1", geneSymbol: "G1", note: "Inhibitor" },
      { drugId: "D2", geneSymbol: "G1", note: "Agonist" },
    ],
  };
}

export function sampleEntityStore(): InMemoryEntityStore {
  return new InMemoryEntityStore(sampleSnapshot(), { fuzzyMatchThreshold: 0.3 });
}

/** Looks vectors up by exact text; anything unknown gets `fallback`. */
export class StubEmbeddingProvider implements EmbeddingProvider {
  readonly name = "stub";
  readonly embedCalls: string[] = [];

  constructor(
    private readonly vectors: Record<string, EmbeddingVector> = {},
    private readonly fallback: EmbeddingVector = [1, 0],
  ) {}

  async embed(text: string): Promise<EmbeddingVector> {
    this.embedCalls.push(text);
    return this.vectors[text] ?? this.fallback;
  }

  async embedBatch(texts: string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.vectors[text] ?? this.fallback);
  }

  cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    return cosineSimilarity(a, b);
  }
}

/** D1 points at the diabetes query, D2 and D3 are orthogonal to it. */
export function diabetesVectors(): Record<string, EmbeddingVector> {
  return {
    "lowers blood sugar in type 2 diabetes": [1, 0],
    "treats obesity": [0, 1],
    "relieves migraine headache": [0, 1],
    "type 2 diabetes diabetes mellitus": [1, 0],
  };
}
