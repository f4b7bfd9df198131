import { z } from "zod";
import { isErrorResult, rankingWeightsSchema } from "../../lib/contracts.js";
import { appConfig } from "../config.js";
import {
  NoMatchError,
  NotFoundError,
  RepurposeError,
  toErrorResult,
  type RepurposeErrorCode,
} from "../errors.js";
import type { RepurposeService } from "../service.js";

export type RouteResult = {
  status: number;
  body: unknown;
};

const rankQuerySchema = z.object({
  disease: z.string().trim().min(1),
  k: z.coerce
    .number()
    .int()
    .min(1)
    .max(appConfig.ranking.maxTopK)
    .default(appConfig.ranking.defaultTopK),
});

const explainQuerySchema = z.object({
  disease: z.string().trim().min(1),
  drug_id: z.string().trim().min(1),
});

const linkPredictionQuerySchema = z.object({
  drug_id: z.string().trim().min(1),
  disease_id: z.string().trim().min(1),
});

const diseaseQuerySchema = z.object({
  disease: z.string().trim().min(1),
});

const searchQuerySchema = z.object({
  q: z.string().trim().min(1),
});

const idParamsSchema = z.object({
  id: z.string().trim().min(1),
});

const statusByCode: Record<RepurposeErrorCode, number> = {
  not_found: 404,
  no_match: 404,
  configuration: 400,
  collaborator: 502,
};

export function errorResponse(error: unknown): RouteResult {
  const status = error instanceof RepurposeError ? statusByCode[error.code] : 500;
  return { status, body: toErrorResult(error) };
}

function invalid(error: z.ZodError): RouteResult {
  return { status: 400, body: { error: "Invalid request", details: error.flatten() } };
}

function notInitialized(service: RepurposeService): RouteResult | null {
  if (service.initialized) return null;
  return { status: 503, body: { error: "Service not initialized" } };
}

export function handleRoot(): RouteResult {
  return {
    status: 200,
    body: {
      message: "Drug Repurposing API",
      version: "0.1.0",
      health: "/health",
    },
  };
}

export function handleHealth(service: RepurposeService): RouteResult {
  const health = service.healthCheck();
  if (!health.healthy) {
    return { status: 503, body: { error: "Service unhealthy", ...health } };
  }
  return { status: 200, body: { ok: true, ...health } };
}

export async function handleRank(service: RepurposeService, query: unknown): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = rankQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);

  const { disease, k } = parsed.data;
  const candidates = await service.rank(disease, k);
  if (candidates.length === 0) {
    return {
      status: 200,
      body: { disease, k, candidates: [], count: 0, message: "No candidates found" },
    };
  }
  return { status: 200, body: { disease, k, candidates, count: candidates.length } };
}

export async function handleExplain(
  service: RepurposeService,
  query: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = explainQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);

  const explanation = await service.explain(parsed.data.drug_id, parsed.data.disease);
  if (isErrorResult(explanation)) {
    return { status: 400, body: explanation };
  }
  return { status: 200, body: explanation };
}

export async function handleLinkPrediction(
  service: RepurposeService,
  query: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = linkPredictionQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);

  const { drug_id: drugId, disease_id: diseaseId } = parsed.data;
  const scores = await service.linkPredictionScore(drugId, diseaseId);
  return { status: 200, body: { drugId, diseaseId, ...scores } };
}

export async function handleStats(service: RepurposeService): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  return {
    status: 200,
    body: { graphStats: await service.graphStats(), serviceStatus: "healthy" },
  };
}

export async function handleRankingStats(
  service: RepurposeService,
  query: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = diseaseQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);

  const stats = await service.rankingStats(parsed.data.disease);
  if (isErrorResult(stats)) return errorResponse(new NoMatchError(stats.error));
  return { status: 200, body: stats };
}

export async function handleUpdateWeights(
  service: RepurposeService,
  body: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = rankingWeightsSchema.safeParse(body);
  if (!parsed.success) return invalid(parsed.error);

  const result = await service.updateWeights(parsed.data.textWeight, parsed.data.graphWeight);
  return { status: result.updated ? 200 : 400, body: result };
}

export async function handleAllDrugs(service: RepurposeService): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const drugs = await service.allDrugs();
  return { status: 200, body: { drugs, count: drugs.length } };
}

export async function handleAllDiseases(service: RepurposeService): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const diseases = await service.allDiseases();
  return { status: 200, body: { diseases, count: diseases.length } };
}

export async function handleDrugInfo(
  service: RepurposeService,
  params: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = idParamsSchema.safeParse(params);
  if (!parsed.success) return invalid(parsed.error);

  const drug = await service.drugInfo(parsed.data.id);
  if (!drug) return errorResponse(new NotFoundError(`Drug not found: ${parsed.data.id}`));
  return { status: 200, body: drug };
}

export async function handleDiseaseInfo(
  service: RepurposeService,
  params: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = idParamsSchema.safeParse(params);
  if (!parsed.success) return invalid(parsed.error);

  const disease = await service.diseaseInfo(parsed.data.id);
  if (!disease) return errorResponse(new NotFoundError(`Disease not found: ${parsed.data.id}`));
  return { status: 200, body: disease };
}

export async function handleDrugMechanism(
  service: RepurposeService,
  params: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = idParamsSchema.safeParse(params);
  if (!parsed.success) return invalid(parsed.error);

  const mechanism = await service.drugMechanism(parsed.data.id);
  if (isErrorResult(mechanism)) return errorResponse(new NotFoundError(mechanism.error));
  return { status: 200, body: mechanism };
}

export async function handleDiseaseProfile(
  service: RepurposeService,
  params: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = idParamsSchema.safeParse(params);
  if (!parsed.success) return invalid(parsed.error);

  const profile = await service.diseaseProfile(parsed.data.id);
  if (isErrorResult(profile)) return errorResponse(new NotFoundError(profile.error));
  return { status: 200, body: profile };
}

export async function handleSearchDiseases(
  service: RepurposeService,
  query: unknown,
): Promise<RouteResult> {
  const unavailable = notInitialized(service);
  if (unavailable) return unavailable;
  const parsed = searchQuerySchema.safeParse(query);
  if (!parsed.success) return invalid(parsed.error);

  const results = await service.searchDiseases(parsed.data.q);
  return { status: 200, body: { query: parsed.data.q, results, count: results.length } };
}
