import type { GraphEdgeType, GraphNodeKind } from "./contracts.js";

export type DrugRef = { kind: "drug"; id: string };
export type DiseaseRef = { kind: "disease"; id: string };
export type GeneRef = { kind: "gene"; symbol: string };

export type NodeRef = DrugRef | DiseaseRef | GeneRef;

const keyPrefix: Record<GraphNodeKind, string> = {
  drug: "drug",
  disease: "dis",
  gene: "gene",
};

export function drugRef(id: string): DrugRef {
  return { kind: "drug", id };
}

export function diseaseRef(id: string): DiseaseRef {
  return { kind: "disease", id };
}

export function geneRef(symbol: string): GeneRef {
  return { kind: "gene", symbol };
}

export function makeNodeKey(ref: NodeRef): string {
  if (ref.kind === "gene") return `${keyPrefix.gene}:${ref.symbol}`;
  return `${keyPrefix[ref.kind]}:${ref.id}`;
}

/** Order-independent key for the single undirected edge between two nodes. */
export function makeEdgeKey(leftKey: string, rightKey: string): string {
  return leftKey < rightKey ? `${leftKey}|${rightKey}` : `${rightKey}|${leftKey}`;
}

export const edgeWeights: Record<GraphEdgeType, number> = {
  drug_disease: 2.0,
  drug_gene: 1.0,
  disease_gene_propagated: 0.5,
};

export function clamp(value: number, min = 0, max = 1): number {
  return Math.max(min, Math.min(max, value));
}

export function normalizeScore(value: number | undefined | null): number {
  if (typeof value !== "number" || Number.isNaN(value)) return 0;
  return clamp(value);
}

export function chunkArray<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export function tokenizeWords(value: string): string[] {
  return value.toLowerCase().match(/\w+/g) ?? [];
}
