import fs from "node:fs/promises";
import {
  entitySnapshotSchema,
  type DiseaseRecord,
  type DrugDiseaseEvidence,
  type DrugGeneAssociation,
  type DrugRecord,
  type EntitySnapshot,
} from "../../lib/contracts.js";
import { appConfig } from "../config.js";

/**
 * Read-only access to the drug, disease and association records the graph is built
 * from. Records are immutable once loaded.
 */
export interface EntityStore {
  allDrugs(): readonly DrugRecord[];
  allDiseases(): readonly DiseaseRecord[];
  allEvidence(): readonly DrugDiseaseEvidence[];
  allGeneAssociations(): readonly DrugGeneAssociation[];
  drugById(drugId: string): DrugRecord | null;
  drugByName(drugName: string): DrugRecord | null;
  diseaseById(diseaseId: string): DiseaseRecord | null;
  diseaseByName(diseaseName: string): DiseaseRecord | null;
  knownDrugsForDisease(diseaseId: string): DrugRecord[];
  knownDiseasesForDrug(drugId: string): DiseaseRecord[];
  geneAssociationsForDrug(drugId: string): DrugGeneAssociation[];
  knownEvidence(drugId: string, diseaseId: string): DrugDiseaseEvidence | null;
  fuzzyMatchDisease(query: string): DiseaseRecord | null;
  searchDiseases(query: string): DiseaseRecord[];
}

type InMemoryEntityStoreOptions = {
  fuzzyMatchThreshold?: number;
};

function lower(value: string): string {
  return value.trim().toLowerCase();
}

function wordSet(value: string): Set<string> {
  return new Set(value.split(/\s+/).filter(Boolean));
}

export function normalizeSnapshot(snapshot: EntitySnapshot): EntitySnapshot {
  return {
    drugs: snapshot.drugs.map((drug) => ({
      drugId: drug.drugId.trim(),
      drugName: lower(drug.drugName),
      atc: drug.atc.trim(),
      indicationsText: lower(drug.indicationsText),
    })),
    diseases: snapshot.diseases.map((disease) => ({
      diseaseId: disease.diseaseId.trim(),
      diseaseName: lower(disease.diseaseName),
      synonyms: lower(disease.synonyms),
    })),
    evidence: snapshot.evidence.map((row) => ({
      drugId: row.drugId.trim(),
      diseaseId: row.diseaseId.trim(),
      evidence: lower(row.evidence),
    })),
    geneAssociations: snapshot.geneAssociations.map((row) => ({
      drugId: row.drugId.trim(),
      geneSymbol: row.geneSymbol.trim(),
      note: lower(row.note),
    })),
  };
}

export class InMemoryEntityStore implements EntityStore {
  private readonly drugs: readonly DrugRecord[];
  private readonly diseases: readonly DiseaseRecord[];
  private readonly evidence: readonly DrugDiseaseEvidence[];
  private readonly geneAssociations: readonly DrugGeneAssociation[];

  private readonly drugsById = new Map<string, DrugRecord>();
  private readonly drugsByName = new Map<string, DrugRecord>();
  private readonly diseasesById = new Map<string, DiseaseRecord>();
  private readonly diseasesByName = new Map<string, DiseaseRecord>();
  private readonly fuzzyMatchThreshold: number;

  constructor(snapshot: EntitySnapshot, options: InMemoryEntityStoreOptions = {}) {
    const normalized = normalizeSnapshot(snapshot);
    this.drugs = Object.freeze(normalized.drugs);
    this.diseases = Object.freeze(normalized.diseases);
    this.evidence = Object.freeze(normalized.evidence);
    this.geneAssociations = Object.freeze(normalized.geneAssociations);
    this.fuzzyMatchThreshold =
      options.fuzzyMatchThreshold ?? appConfig.entity.fuzzyMatchThreshold;

    for (const drug of this.drugs) {
      this.drugsById.set(drug.drugId, drug);
      this.drugsByName.set(drug.drugName, drug);
    }
    for (const disease of this.diseases) {
      this.diseasesById.set(disease.diseaseId, disease);
      this.diseasesByName.set(disease.diseaseName, disease);
    }
  }

  allDrugs(): readonly DrugRecord[] {
    return this.drugs;
  }

  allDiseases(): readonly DiseaseRecord[] {
    return this.diseases;
  }

  allEvidence(): readonly DrugDiseaseEvidence[] {
    return this.evidence;
  }

  allGeneAssociations(): readonly DrugGeneAssociation[] {
    return this.geneAssociations;
  }

  drugById(drugId: string): DrugRecord | null {
    return this.drugsById.get(drugId) ?? null;
  }

  drugByName(drugName: string): DrugRecord | null {
    return this.drugsByName.get(lower(drugName)) ?? null;
  }

  diseaseById(diseaseId: string): DiseaseRecord | null {
    return this.diseasesById.get(diseaseId) ?? null;
  }

  diseaseByName(diseaseName: string): DiseaseRecord | null {
    return this.diseasesByName.get(lower(diseaseName)) ?? null;
  }

  knownDrugsForDisease(diseaseId: string): DrugRecord[] {
    const out: DrugRecord[] = [];
    for (const row of this.evidence) {
      if (row.diseaseId !== diseaseId) continue;
      const drug = this.drugsById.get(row.drugId);
      if (drug) out.push(drug);
    }
    return out;
  }

  knownDiseasesForDrug(drugId: string): DiseaseRecord[] {
    const out: DiseaseRecord[] = [];
    for (const row of this.evidence) {
      if (row.drugId !== drugId) continue;
      const disease = this.diseasesById.get(row.diseaseId);
      if (disease) out.push(disease);
    }
    return out;
  }

  geneAssociationsForDrug(drugId: string): DrugGeneAssociation[] {
    return this.geneAssociations.filter((row) => row.drugId === drugId);
  }

  knownEvidence(drugId: string, diseaseId: string): DrugDiseaseEvidence | null {
    return (
      this.evidence.find((row) => row.drugId === drugId && row.diseaseId === diseaseId) ??
      null
    );
  }

  /**
   * Exact name, then substring containment in either direction, then the best
   * word-level Jaccard score at or above the threshold. The first rule that matches
   * decides.
   */
  fuzzyMatchDisease(query: string): DiseaseRecord | null {
    const normalized = lower(query);
    if (!normalized) return null;

    const exact = this.diseasesByName.get(normalized);
    if (exact) return exact;

    for (const [name, disease] of this.diseasesByName) {
      if (name.includes(normalized) || normalized.includes(name)) {
        return disease;
      }
    }

    const queryWords = wordSet(normalized);
    let bestMatch: DiseaseRecord | null = null;
    let bestScore = 0;

    for (const [name, disease] of this.diseasesByName) {
      const diseaseWords = wordSet(name);
      const intersection = [...queryWords].filter((word) => diseaseWords.has(word)).length;
      if (intersection === 0) continue;

      const union = new Set([...queryWords, ...diseaseWords]).size;
      const score = union > 0 ? intersection / union : 0;
      if (score > bestScore && score >= this.fuzzyMatchThreshold) {
        bestScore = score;
        bestMatch = disease;
      }
    }

    return bestMatch;
  }

  searchDiseases(query: string): DiseaseRecord[] {
    const normalized = lower(query);
    if (!normalized) return [];
    return this.diseases.filter(
      (disease) =>
        disease.diseaseName.includes(normalized) || disease.synonyms.includes(normalized),
    );
  }
}

export async function loadEntitySnapshot(filePath: string): Promise<EntitySnapshot> {
  const raw = await fs.readFile(filePath, "utf8");
  const parsed: unknown = JSON.parse(raw);
  return entitySnapshotSchema.parse(parsed);
}

export async function loadEntityStore(
  filePath: string = appConfig.dataPath,
  options: InMemoryEntityStoreOptions = {},
): Promise<InMemoryEntityStore> {
  return new InMemoryEntityStore(await loadEntitySnapshot(filePath), options);
}
