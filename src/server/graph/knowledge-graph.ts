import type { GraphStats } from "../../lib/contracts.js";
import {
  edgeWeights,
  makeEdgeKey,
  makeNodeKey,
  type DiseaseRef,
  type DrugRef,
  type GeneRef,
} from "../../lib/graph.js";

export type DrugNode = {
  kind: "drug";
  key: string;
  ref: DrugRef;
  name: string;
  atc: string;
  indications: string;
};

export type DiseaseNode = {
  kind: "disease";
  key: string;
  ref: DiseaseRef;
  name: string;
  synonyms: string;
};

export type GeneNode = {
  kind: "gene";
  key: string;
  ref: GeneRef;
  symbol: string;
};

export type GraphNode = DrugNode | DiseaseNode | GeneNode;

type EdgeEndpoints = {
  key: string;
  source: string;
  target: string;
  weight: number;
};

export type DrugDiseaseEdge = EdgeEndpoints & { type: "drug_disease"; evidence: string };
export type DrugGeneEdge = EdgeEndpoints & { type: "drug_gene"; note: string };
export type PropagatedEdge = EdgeEndpoints & {
  type: "disease_gene_propagated";
  viaDrug: DrugRef;
};

export type GraphEdge = DrugDiseaseEdge | DrugGeneEdge | PropagatedEdge;

type EdgeAnnotation =
  | { type: "drug_disease"; evidence: string }
  | { type: "drug_gene"; note: string }
  | { type: "disease_gene_propagated"; viaDrug: DrugRef };

/** Node keys from one endpoint to the other, endpoints included. */
export type NodePath = string[];

/**
 * Frozen, undirected, simple graph. Produced once by {@link GraphDraft.freeze};
 * every method is a read.
 */
export class KnowledgeGraph {
  private readonly nodeMap: ReadonlyMap<string, GraphNode>;
  private readonly adjacency: ReadonlyMap<string, ReadonlyMap<string, GraphEdge>>;
  private readonly edgeMap: ReadonlyMap<string, GraphEdge>;

  constructor(
    nodes: ReadonlyMap<string, GraphNode>,
    adjacency: ReadonlyMap<string, ReadonlyMap<string, GraphEdge>>,
    edges: ReadonlyMap<string, GraphEdge>,
  ) {
    this.nodeMap = nodes;
    this.adjacency = adjacency;
    this.edgeMap = edges;
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  hasNode(key: string): boolean {
    return this.nodeMap.has(key);
  }

  node(key: string): GraphNode | null {
    return this.nodeMap.get(key) ?? null;
  }

  nodes(): GraphNode[] {
    return [...this.nodeMap.values()];
  }

  edges(): GraphEdge[] {
    return [...this.edgeMap.values()];
  }

  nodesOfKind<K extends GraphNode["kind"]>(kind: K): Array<Extract<GraphNode, { kind: K }>> {
    const out: Array<Extract<GraphNode, { kind: K }>> = [];
    for (const node of this.nodeMap.values()) {
      if (isNodeOfKind(node, kind)) out.push(node);
    }
    return out;
  }

  neighbors(key: string): string[] {
    return [...(this.adjacency.get(key)?.keys() ?? [])];
  }

  degree(key: string): number {
    return this.adjacency.get(key)?.size ?? 0;
  }

  hasEdge(leftKey: string, rightKey: string): boolean {
    return this.adjacency.get(leftKey)?.has(rightKey) ?? false;
  }

  edgeBetween(leftKey: string, rightKey: string): GraphEdge | null {
    return this.adjacency.get(leftKey)?.get(rightKey) ?? null;
  }

  commonNeighbors(leftKey: string, rightKey: string): string[] {
    const right = this.adjacency.get(rightKey);
    if (!right) return [];
    return this.neighbors(leftKey).filter((key) => key !== rightKey && right.has(key));
  }

  /** Breadth-first shortest path by hop count, or null when disconnected. */
  shortestPath(startKey: string, endKey: string): NodePath | null {
    if (!this.hasNode(startKey) || !this.hasNode(endKey)) return null;
    if (startKey === endKey) return [startKey];

    const queue = [startKey];
    const visited = new Set<string>([startKey]);
    const parent = new Map<string, string>();

    for (let head = 0; head < queue.length; head += 1) {
      const current = queue[head];
      for (const neighbor of this.neighbors(current)) {
        if (visited.has(neighbor)) continue;
        visited.add(neighbor);
        parent.set(neighbor, current);
        if (neighbor === endKey) {
          const path = [endKey];
          let cursor = parent.get(endKey);
          while (cursor !== undefined) {
            path.unshift(cursor);
            cursor = parent.get(cursor);
          }
          return path;
        }
        queue.push(neighbor);
      }
    }
    return null;
  }

  /**
   * Simple paths of at most `cutoff` hops, in depth-first discovery order. Stops after
   * `limit` paths. No ordering between paths is implied.
   */
  simplePaths(startKey: string, endKey: string, cutoff: number, limit = Infinity): NodePath[] {
    const found: NodePath[] = [];
    if (!this.hasNode(startKey) || !this.hasNode(endKey) || cutoff < 1 || limit <= 0) {
      return found;
    }
    if (startKey === endKey) return found;

    const path = [startKey];
    const onPath = new Set<string>([startKey]);

    const walk = (current: string): boolean => {
      for (const neighbor of this.neighbors(current)) {
        if (onPath.has(neighbor)) continue;
        if (neighbor === endKey) {
          found.push([...path, neighbor]);
          if (found.length >= limit) return true;
          continue;
        }
        if (path.length >= cutoff) continue;
        path.push(neighbor);
        onPath.add(neighbor);
        const done = walk(neighbor);
        path.pop();
        onPath.delete(neighbor);
        if (done) return true;
      }
      return false;
    };

    walk(startKey);
    return found;
  }

  connectedComponents(): number {
    const seen = new Set<string>();
    let components = 0;
    for (const key of this.nodeMap.keys()) {
      if (seen.has(key)) continue;
      components += 1;
      const stack = [key];
      seen.add(key);
      while (stack.length > 0) {
        const current = stack.pop();
        if (current === undefined) break;
        for (const neighbor of this.neighbors(current)) {
          if (seen.has(neighbor)) continue;
          seen.add(neighbor);
          stack.push(neighbor);
        }
      }
    }
    return components;
  }

  density(): number {
    const n = this.nodeMap.size;
    if (n <= 1) return 0;
    return (2 * this.edgeMap.size) / (n * (n - 1));
  }

  stats(): GraphStats {
    let drugNodes = 0;
    let diseaseNodes = 0;
    let geneNodes = 0;
    for (const node of this.nodeMap.values()) {
      if (node.kind === "drug") drugNodes += 1;
      else if (node.kind === "disease") diseaseNodes += 1;
      else geneNodes += 1;
    }
    return {
      totalNodes: this.nodeCount,
      totalEdges: this.edgeCount,
      drugNodes,
      diseaseNodes,
      geneNodes,
      density: this.density(),
      connectedComponents: this.connectedComponents(),
    };
  }
}

function isNodeOfKind<K extends GraphNode["kind"]>(
  node: GraphNode,
  kind: K,
): node is Extract<GraphNode, { kind: K }> {
  return node.kind === kind;
}

/**
 * Mutable staging area used while a graph is being built. `freeze()` hands the
 * collected state to a {@link KnowledgeGraph} and closes the draft.
 */
export class GraphDraft {
  private readonly nodeMap = new Map<string, GraphNode>();
  private readonly adjacency = new Map<string, Map<string, GraphEdge>>();
  private readonly edgeMap = new Map<string, GraphEdge>();
  private frozen = false;

  addDrug(ref: DrugRef, attrs: { name: string; atc: string; indications: string }): void {
    this.putNode({ kind: "drug", key: makeNodeKey(ref), ref, ...attrs });
  }

  addDisease(ref: DiseaseRef, attrs: { name: string; synonyms: string }): void {
    this.putNode({ kind: "disease", key: makeNodeKey(ref), ref, ...attrs });
  }

  addGene(ref: GeneRef): void {
    this.putNode({ kind: "gene", key: makeNodeKey(ref), ref, symbol: ref.symbol });
  }

  hasNode(key: string): boolean {
    return this.nodeMap.has(key);
  }

  hasEdge(leftKey: string, rightKey: string): boolean {
    return this.adjacency.get(leftKey)?.has(rightKey) ?? false;
  }

  nodesOfKind<K extends GraphNode["kind"]>(kind: K): Array<Extract<GraphNode, { kind: K }>> {
    const out: Array<Extract<GraphNode, { kind: K }>> = [];
    for (const node of this.nodeMap.values()) {
      if (isNodeOfKind(node, kind)) out.push(node);
    }
    return out;
  }

  neighborsOfKind(key: string, kind: GraphNode["kind"]): string[] {
    const out: string[] = [];
    for (const neighbor of this.adjacency.get(key)?.keys() ?? []) {
      if (this.nodeMap.get(neighbor)?.kind === kind) out.push(neighbor);
    }
    return out;
  }

  /**
   * Adds or re-annotates the edge between two existing nodes. Returns false, and
   * changes nothing, when either endpoint is missing.
   */
  setEdge(sourceKey: string, targetKey: string, annotation: EdgeAnnotation): boolean {
    this.assertOpen();
    if (!this.nodeMap.has(sourceKey) || !this.nodeMap.has(targetKey)) return false;

    const key = makeEdgeKey(sourceKey, targetKey);
    const edge: GraphEdge = {
      key,
      source: sourceKey,
      target: targetKey,
      weight: edgeWeights[annotation.type],
      ...annotation,
    };
    this.edgeMap.set(key, edge);
    this.link(sourceKey, targetKey, edge);
    this.link(targetKey, sourceKey, edge);
    return true;
  }

  freeze(): KnowledgeGraph {
    this.assertOpen();
    this.frozen = true;
    return new KnowledgeGraph(this.nodeMap, this.adjacency, this.edgeMap);
  }

  private putNode(node: GraphNode): void {
    this.assertOpen();
    this.nodeMap.set(node.key, node);
    if (!this.adjacency.has(node.key)) {
      this.adjacency.set(node.key, new Map());
    }
  }

  private link(fromKey: string, toKey: string, edge: GraphEdge): void {
    const neighbors = this.adjacency.get(fromKey);
    if (neighbors) neighbors.set(toKey, edge);
  }

  private assertOpen(): void {
    if (this.frozen) {
      throw new Error("GraphDraft is frozen; start a new build instead of mutating");
    }
  }
}
