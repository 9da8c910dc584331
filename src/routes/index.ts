import { Router } from "express";
import { AgentRankingService } from "../services/scoring/agentRanking.service";
import { createRankingRoutes } from "./ranking.routes";

export const createApiRoutes = (rankingService: AgentRankingService): Router => {
  const router = Router();

  router.use("/rankings", createRankingRoutes(rankingService));

  return router;
};
