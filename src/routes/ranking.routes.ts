import { Router } from "express";
import { AgentRankingController } from "../controllers/agentRanking.controller";
import { asyncHandler } from "../middleware/error.middleware";
import { validateRequest } from "../middleware/validation.middleware";
import {
  customerProfileSchema,
  rankingQuerySchema,
} from "../schemas/request.schemas";
import { AgentRankingService } from "../services/scoring/agentRanking.service";

export const createRankingRoutes = (
  rankingService: AgentRankingService,
): Router => {
  const router = Router();
  const controller = new AgentRankingController(rankingService);

  router.get("/regimes", asyncHandler(controller.listRegimes));

  router.post(
    "/",
    validateRequest({ query: rankingQuerySchema, body: customerProfileSchema }),
    asyncHandler(controller.rankAgents),
  );

  return router;
};
