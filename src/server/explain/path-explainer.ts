import type {
  DiseaseRecord,
  DrugGeneAssociation,
  DrugRecord,
  ErrorResult,
  Explanation,
  GraphPath,
  KnownEvidence,
  TextOverlap,
} from "../../lib/contracts.js";
import { diseaseRef, drugRef, makeNodeKey, tokenizeWords, type NodeRef } from "../../lib/graph.js";
import { appConfig } from "../config.js";
import type { EntityStore } from "../entity/entity-store.js";
import type { KnowledgeGraph, NodePath } from "../graph/knowledge-graph.js";

export type PathExplainerOptions = {
  maxLength?: number;
  maxPaths?: number;
};

export type DrugMechanism = {
  drugId: string;
  drugName: string;
  atcCode: string;
  indications: string;
  relatedGenes: DrugGeneAssociation[];
  relatedDiseases: DiseaseRecord[];
  geneCount: number;
  diseaseCount: number;
};

export type DiseaseProfile = {
  diseaseId: string;
  diseaseName: string;
  synonyms: string;
  relatedDrugs: DrugRecord[];
  drugCount: number;
};

const MIN_OVERLAP_TOKEN_LENGTH = 3;

function uniqueTokens(value: string): string[] {
  return [...new Set(tokenizeWords(value))];
}

export function computeTextOverlap(drug: DrugRecord, disease: DiseaseRecord): TextOverlap {
  const drugTokens = uniqueTokens(drug.indicationsText);
  const diseaseTokens = uniqueTokens(`${disease.diseaseName} ${disease.synonyms}`);
  const diseaseSet = new Set(diseaseTokens);

  const overlappingTokens = drugTokens.filter(
    (token) => diseaseSet.has(token) && token.length >= MIN_OVERLAP_TOKEN_LENGTH,
  );

  return {
    overlappingTokens,
    overlapCount: overlappingTokens.length,
    drugTokens,
    diseaseTokens,
    overlapRatio: overlappingTokens.length / Math.max(1, diseaseTokens.length),
  };
}

/**
 * Turns a drug / disease pair into evidence chains over the knowledge graph plus the
 * token overlap between indications and disease names.
 */
export class PathExplainer {
  private readonly maxLength: number;
  private readonly maxPaths: number;

  constructor(
    private readonly entities: EntityStore,
    private readonly graph: KnowledgeGraph,
    options: PathExplainerOptions = {},
  ) {
    this.maxLength = options.maxLength ?? appConfig.explain.maxPathLength;
    this.maxPaths = options.maxPaths ?? appConfig.explain.maxPaths;
  }

  explain(drugId: string, diseaseQuery: string): Explanation | ErrorResult {
    const disease = this.entities.fuzzyMatchDisease(diseaseQuery);
    if (!disease) return { error: "no matching disease" };

    const drug = this.entities.drugById(drugId);
    if (!drug) return { error: "drug not found" };

    return {
      drugId: drug.drugId,
      drugName: drug.drugName,
      diseaseId: disease.diseaseId,
      diseaseName: disease.diseaseName,
      diseaseQuery,
      graphPaths: this.graphPaths(drug.drugId, disease.diseaseId),
      textOverlaps: computeTextOverlap(drug, disease),
      knownEvidence: this.knownEvidence(drug.drugId, disease.diseaseId),
      drugInfo: {
        atc: drug.atc,
        indicationsText: drug.indicationsText,
      },
      diseaseInfo: {
        synonyms: disease.synonyms,
      },
    };
  }

  /**
   * The shortest path when it fits within `maxLength` hops; otherwise up to
   * `maxPaths` simple paths in the order a depth-first walk finds them.
   */
  findPaths(drugId: string, diseaseId: string): NodePath[] {
    const start = makeNodeKey(drugRef(drugId));
    const end = makeNodeKey(diseaseRef(diseaseId));

    const shortest = this.graph.shortestPath(start, end);
    if (!shortest) return [];
    if (shortest.length <= this.maxLength + 1) return [shortest];

    return this.graph.simplePaths(start, end, this.maxLength, this.maxPaths);
  }

  graphPaths(drugId: string, diseaseId: string): GraphPath[] {
    return this.findPaths(drugId, diseaseId).map((path, index) => {
      const hops = this.describeHops(path);
      return {
        pathId: index + 1,
        nodes: path,
        length: path.length - 1,
        hops,
        explanation: hops.length > 0 ? hops.join(" → ") : "No path found",
      };
    });
  }

  describeHops(path: NodePath): string[] {
    const hops: string[] = [];
    for (let i = 0; i < path.length - 1; i += 1) {
      hops.push(this.describeHop(path[i], path[i + 1]));
    }
    return hops;
  }

  knownEvidence(drugId: string, diseaseId: string): KnownEvidence {
    const row = this.entities.knownEvidence(drugId, diseaseId);
    return row
      ? { hasKnownEvidence: true, evidence: row.evidence }
      : { hasKnownEvidence: false, evidence: null };
  }

  drugMechanism(drugId: string): DrugMechanism | ErrorResult {
    const drug = this.entities.drugById(drugId);
    if (!drug) return { error: `Drug not found: ${drugId}` };

    const relatedGenes = this.entities.geneAssociationsForDrug(drugId);
    const relatedDiseases = this.entities.knownDiseasesForDrug(drugId);
    return {
      drugId: drug.drugId,
      drugName: drug.drugName,
      atcCode: drug.atc,
      indications: drug.indicationsText,
      relatedGenes,
      relatedDiseases,
      geneCount: relatedGenes.length,
      diseaseCount: relatedDiseases.length,
    };
  }

  diseaseProfile(diseaseId: string): DiseaseProfile | ErrorResult {
    const disease = this.entities.diseaseById(diseaseId);
    if (!disease) return { error: `Disease not found: ${diseaseId}` };

    const relatedDrugs = this.entities.knownDrugsForDisease(diseaseId);
    return {
      diseaseId: disease.diseaseId,
      diseaseName: disease.diseaseName,
      synonyms: disease.synonyms,
      relatedDrugs,
      drugCount: relatedDrugs.length,
    };
  }

  private describeHop(fromKey: string, toKey: string): string {
    const from = this.displayName(fromKey);
    const to = this.displayName(toKey);
    const edge = this.graph.edgeBetween(fromKey, toKey);
    if (!edge) return `${from} connected to ${to}`;

    switch (edge.type) {
      case "drug_disease":
        return `${from} treats ${to} (${edge.evidence})`;
      case "drug_gene":
        return `${from} targets ${to} (${edge.note})`;
      case "disease_gene_propagated":
        return `${from} associated with ${to} (via ${this.refName(edge.viaDrug)})`;
      default:
        return `${from} connected to ${to}`;
    }
  }

  private displayName(key: string): string {
    const node = this.graph.node(key);
    return node ? this.refName(node.ref) : key;
  }

  private refName(ref: NodeRef): string {
    switch (ref.kind) {
      case "drug":
        return this.entities.drugById(ref.id)?.drugName || ref.id;
      case "disease":
        return this.entities.diseaseById(ref.id)?.diseaseName || ref.id;
      case "gene":
        return ref.symbol;
    }
  }
}
