import { describe, it } from "node:test";
import assert from "node:assert";
import { z } from "zod";
import {
  explanationSchema,
  graphStatsSchema,
  linkPredictionScoresSchema,
  scoredCandidateSchema,
} from "../../lib/contracts.js";
import { CollaboratorError, NotFoundError } from "../errors.js";
import { RepurposeService } from "../service.js";
import { diabetesVectors, sampleEntityStore, StubEmbeddingProvider } from "../testing/fixtures.js";
import {
  errorResponse,
  handleDiseaseProfile,
  handleDrugInfo,
  handleDrugMechanism,
  handleExplain,
  handleHealth,
  handleLinkPrediction,
  handleRank,
  handleRankingStats,
  handleSearchDiseases,
  handleStats,
  handleUpdateWeights,
} from "./routes.js";

function createService(): RepurposeService {
  return new RepurposeService({
    loadEntities: async () => sampleEntityStore(),
    embeddings: new StubEmbeddingProvider(diabetesVectors()),
    weights: { textWeight: 0.6, graphWeight: 0.4 },
  });
}

async function readyService(): Promise<RepurposeService> {
  const service = createService();
  await service.initialize();
  return service;
}

describe("HTTP routes", () => {
  it("should answer 503 before the service is initialized", async () => {
    const service = createService();

    assert.strictEqual(handleHealth(service).status, 503);
    assert.deepStrictEqual(await handleRank(service, { disease: "diabetes" }), {
      status: 503,
      body: { error: "Service not initialized" },
    });
  });

  describe("GET /rank", () => {
    it("should rank candidates with k parsed from the query string", async () => {
      const result = await handleRank(await readyService(), { disease: "type 2 diabetes", k: "1" });
      assert.strictEqual(result.status, 200);
      assert.ok(typeof result.body === "object" && result.body !== null);
      assert.ok("count" in result.body && "k" in result.body);
      assert.strictEqual(result.body.count, 1);
      assert.strictEqual(result.body.k, 1);
    });

    it("should return candidates that satisfy the candidate contract", async () => {
      const result = await handleRank(await readyService(), { disease: "type 2 diabetes" });
      const body = z.object({ candidates: z.array(scoredCandidateSchema) }).parse(result.body);

      assert.deepStrictEqual(
        body.candidates.map((candidate) => candidate.drugId),
        ["D1", "D3"],
      );
    });

    it("should answer an empty list with a message for unknown diseases", async () => {
      const result = await handleRank(await readyService(), { disease: "nonexistent disease xyz" });
      assert.deepStrictEqual(result, {
        status: 200,
        body: {
          disease: "nonexistent disease xyz",
          k: 10,
          candidates: [],
          count: 0,
          message: "No candidates found",
        },
      });
    });

    it("should reject a missing disease or an out-of-range k", async () => {
      const service = await readyService();
      assert.strictEqual((await handleRank(service, {})).status, 400);
      assert.strictEqual((await handleRank(service, { disease: "diabetes", k: "0" })).status, 400);
      assert.strictEqual((await handleRank(service, { disease: "diabetes", k: "500" })).status, 400);
      assert.strictEqual((await handleRank(service, { disease: "diabetes", k: "two" })).status, 400);
    });
  });

  describe("GET /explain", () => {
    it("should return the explanation", async () => {
      const result = await handleExplain(await readyService(), {
        disease: "type 2 diabetes",
        drug_id: "D1",
      });
      assert.strictEqual(result.status, 200);
      const explanation = explanationSchema.parse(result.body);
      assert.strictEqual(explanation.drugId, "D1");
      assert.strictEqual(explanation.diseaseId, "Dis1");
      assert.deepStrictEqual(explanation.knownEvidence, { hasKnownEvidence: false, evidence: null });
    });

    it("should map explanation errors to 400", async () => {
      assert.deepStrictEqual(
        await handleExplain(await readyService(), { disease: "migraine", drug_id: "NOPE" }),
        { status: 400, body: { error: "drug not found" } },
      );
    });
  });

  describe("lookups", () => {
    it("should return 404 for unknown ids", async () => {
      const service = await readyService();
      assert.deepStrictEqual(await handleDrugInfo(service, { id: "NOPE" }), {
        status: 404,
        body: { error: "Drug not found: NOPE" },
      });
      assert.strictEqual((await handleDrugMechanism(service, { id: "NOPE" })).status, 404);
      assert.strictEqual((await handleDiseaseProfile(service, { id: "NOPE" })).status, 404);
      assert.strictEqual((await handleRankingStats(service, { disease: "zzz qqq" })).status, 404);
    });

    it("should return link prediction scores for a pair", async () => {
      const result = await handleLinkPrediction(await readyService(), {
        drug_id: "D2",
        disease_id: "Dis1",
      });
      assert.deepStrictEqual(result, {
        status: 200,
        body: {
          drugId: "D2",
          diseaseId: "Dis1",
          adamicAdar: 1 / Math.log(3),
          commonNeighbors: 1,
          normalizedCommonNeighbors: 0.5,
        },
      });
      linkPredictionScoresSchema
        .extend({ drugId: z.string(), diseaseId: z.string() })
        .strict()
        .parse(result.body);
    });

    it("should search diseases", async () => {
      const result = await handleSearchDiseases(await readyService(), { q: "headache" });
      assert.strictEqual(result.status, 200);
      assert.ok(typeof result.body === "object" && result.body !== null && "count" in result.body);
      assert.strictEqual(result.body.count, 1);
    });

    it("should report graph statistics", async () => {
      const result = await handleStats(await readyService());
      assert.ok(typeof result.body === "object" && result.body !== null);
      assert.ok("serviceStatus" in result.body);
      assert.strictEqual(result.body.serviceStatus, "healthy");
      const { graphStats } = z.object({ graphStats: graphStatsSchema }).parse(result.body);
      assert.strictEqual(graphStats.drugNodes, 3);
      assert.strictEqual(graphStats.diseaseNodes, 2);
      assert.strictEqual(graphStats.geneNodes, 1);
    });
  });

  describe("POST /weights", () => {
    it("should update weights", async () => {
      assert.deepStrictEqual(
        await handleUpdateWeights(await readyService(), { textWeight: 1, graphWeight: 1 }),
        { status: 200, body: { updated: true, weights: { textWeight: 0.5, graphWeight: 0.5 } } },
      );
    });

    it("should reject a zero sum or a malformed body", async () => {
      const service = await readyService();
      assert.strictEqual(
        (await handleUpdateWeights(service, { textWeight: 0, graphWeight: 0 })).status,
        400,
      );
      assert.strictEqual((await handleUpdateWeights(service, { textWeight: "high" })).status, 400);
    });
  });

  describe("errorResponse", () => {
    it("should map error codes to statuses", () => {
      assert.deepStrictEqual(errorResponse(new NotFoundError("Drug not found: X")), {
        status: 404,
        body: { error: "Drug not found: X" },
      });
      assert.deepStrictEqual(
        errorResponse(new CollaboratorError("embedding disease text", new Error("timeout"))),
        { status: 502, body: { error: "embedding disease text failed: timeout" } },
      );
      assert.deepStrictEqual(errorResponse(new Error("boom")), {
        status: 500,
        body: { error: "Internal error: boom" },
      });
    });
  });
});
