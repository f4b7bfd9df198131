import { z } from "zod";

export const graphNodeKinds = ["drug", "disease", "gene"] as const;

export const graphEdgeTypes = [
  "drug_disease",
  "drug_gene",
  "disease_gene_propagated",
] as const;

export type GraphNodeKind = (typeof graphNodeKinds)[number];
export type GraphEdgeType = (typeof graphEdgeTypes)[number];

const text = z
  .string()
  .nullish()
  .transform((value) => (value ?? "").trim());

const identifier = z.string().trim().min(1);

export const drugRecordSchema = z.object({
  drugId: identifier,
  drugName: text,
  atc: text,
  indicationsText: text,
});

export const diseaseRecordSchema = z.object({
  diseaseId: identifier,
  diseaseName: text,
  synonyms: text,
});

export const drugDiseaseEvidenceSchema = z.object({
  drugId: identifier,
  diseaseId: identifier,
  evidence: text,
});

export const drugGeneAssociationSchema = z.object({
  drugId: identifier,
  geneSymbol: identifier,
  note: text,
});

export const entitySnapshotSchema = z.object({
  drugs: z.array(drugRecordSchema).default([]),
  diseases: z.array(diseaseRecordSchema).default([]),
  evidence: z.array(drugDiseaseEvidenceSchema).default([]),
  geneAssociations: z.array(drugGeneAssociationSchema).default([]),
});

export type DrugRecord = z.infer<typeof drugRecordSchema>;
export type DiseaseRecord = z.infer<typeof diseaseRecordSchema>;
export type DrugDiseaseEvidence = z.infer<typeof drugDiseaseEvidenceSchema>;
export type DrugGeneAssociation = z.infer<typeof drugGeneAssociationSchema>;
export type EntitySnapshot = z.infer<typeof entitySnapshotSchema>;

export const linkPredictionScoresSchema = z.object({
  adamicAdar: z.number().nonnegative(),
  commonNeighbors: z.number().int().nonnegative(),
  normalizedCommonNeighbors: z.number().min(0).max(1),
});

export const scoredCandidateSchema = z.object({
  drugId: z.string(),
  drugName: z.string(),
  atc: z.string(),
  indicationsText: z.string(),
  score: z.number(),
  textScore: z.number().min(0),
  graphScore: z.number().min(0).max(1),
  normalizedScore: z.number().min(0).max(1),
  targetDiseaseId: z.string(),
  targetDiseaseName: z.string(),
});

export const graphPathSchema = z.object({
  pathId: z.number().int().positive(),
  nodes: z.array(z.string()),
  length: z.number().int().nonnegative(),
  hops: z.array(z.string()),
  explanation: z.string(),
});

export const textOverlapSchema = z.object({
  overlappingTokens: z.array(z.string()),
  overlapCount: z.number().int().nonnegative(),
  drugTokens: z.array(z.string()),
  diseaseTokens: z.array(z.string()),
  overlapRatio: z.number().min(0),
});

export const knownEvidenceSchema = z.object({
  hasKnownEvidence: z.boolean(),
  evidence: z.string().nullable(),
});

export const explanationSchema = z.object({
  drugId: z.string(),
  drugName: z.string(),
  diseaseId: z.string(),
  diseaseName: z.string(),
  diseaseQuery: z.string(),
  graphPaths: z.array(graphPathSchema),
  textOverlaps: textOverlapSchema,
  knownEvidence: knownEvidenceSchema,
  drugInfo: z.object({
    atc: z.string(),
    indicationsText: z.string(),
  }),
  diseaseInfo: z.object({
    synonyms: z.string(),
  }),
});

export const graphStatsSchema = z.object({
  totalNodes: z.number().int().nonnegative(),
  totalEdges: z.number().int().nonnegative(),
  drugNodes: z.number().int().nonnegative(),
  diseaseNodes: z.number().int().nonnegative(),
  geneNodes: z.number().int().nonnegative(),
  density: z.number().min(0).max(1),
  connectedComponents: z.number().int().nonnegative(),
});

export const rankingWeightsSchema = z.object({
  textWeight: z.number(),
  graphWeight: z.number(),
});

export type LinkPredictionScores = z.infer<typeof linkPredictionScoresSchema>;
export type ScoredCandidate = z.infer<typeof scoredCandidateSchema>;
export type GraphPath = z.infer<typeof graphPathSchema>;
export type TextOverlap = z.infer<typeof textOverlapSchema>;
export type KnownEvidence = z.infer<typeof knownEvidenceSchema>;
export type Explanation = z.infer<typeof explanationSchema>;
export type GraphStats = z.infer<typeof graphStatsSchema>;
export type RankingWeights = z.infer<typeof rankingWeightsSchema>;

export type ErrorResult = {
  error: string;
};

export function isErrorResult(value: unknown): value is ErrorResult {
  return (
    typeof value === "object" &&
    value !== null &&
    "error" in value &&
    typeof value.error === "string"
  );
}
