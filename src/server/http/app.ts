import cors from "cors";
import express, { type Request, type Response } from "express";
import type { RepurposeService } from "../service.js";
import { logEvent, toErrorMessage } from "../telemetry.js";
import {
  errorResponse,
  handleAllDiseases,
  handleAllDrugs,
  handleDiseaseInfo,
  handleDiseaseProfile,
  handleDrugInfo,
  handleDrugMechanism,
  handleExplain,
  handleHealth,
  handleLinkPrediction,
  handleRank,
  handleRankingStats,
  handleRoot,
  handleSearchDiseases,
  handleStats,
  handleUpdateWeights,
  type RouteResult,
} from "./routes.js";

type Handler = (req: Request) => RouteResult | Promise<RouteResult>;

function route(name: string, handler: Handler) {
  return async (req: Request, res: Response) => {
    try {
      const result = await handler(req);
      res.status(result.status).json(result.body);
    } catch (error) {
      logEvent("error", "http.unhandled", { route: name, message: toErrorMessage(error) });
      const result = errorResponse(error);
      res.status(result.status).json(result.body);
    }
  };
}

export function createApp(service: RepurposeService) {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  app.use(cors());

  app.get("/", route("root", () => handleRoot()));
  app.get("/health", route("health", () => handleHealth(service)));
  app.get("/rank", route("rank", (req) => handleRank(service, req.query)));
  app.get("/explain", route("explain", (req) => handleExplain(service, req.query)));
  app.get(
    "/link-prediction",
    route("link-prediction", (req) => handleLinkPrediction(service, req.query)),
  );
  app.get("/stats", route("stats", () => handleStats(service)));
  app.get("/ranking-stats", route("ranking-stats", (req) => handleRankingStats(service, req.query)));
  app.post("/weights", route("weights", (req) => handleUpdateWeights(service, req.body)));
  app.get("/drugs", route("drugs", () => handleAllDrugs(service)));
  app.get("/drugs/:id", route("drug", (req) => handleDrugInfo(service, req.params)));
  app.get(
    "/drugs/:id/mechanism",
    route("drug-mechanism", (req) => handleDrugMechanism(service, req.params)),
  );
  app.get("/diseases", route("diseases", () => handleAllDiseases(service)));
  app.get("/diseases/:id", route("disease", (req) => handleDiseaseInfo(service, req.params)));
  app.get(
    "/diseases/:id/profile",
    route("disease-profile", (req) => handleDiseaseProfile(service, req.params)),
  );
  app.get(
    "/search/diseases",
    route("search-diseases", (req) => handleSearchDiseases(service, req.query)),
  );

  return app;
}
