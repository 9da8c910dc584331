import { Request, Response } from "express";
import { RankingQuery } from "../schemas/request.schemas";
import { AgentRankingService } from "../services/scoring/agentRanking.service";

export class AgentRankingController {
  constructor(private readonly rankingService: AgentRankingService) {}

  /**
   * POST /api/v1/rankings
   * Ranks every agent against the customer profile in the body
   */
  public rankAgents = async (req: Request, res: Response): Promise<void> => {
    const query: RankingQuery = res.locals.query ?? {};

    const ranking = await this.rankingService.rankAgents(req.body, {
      regime: query.regime,
    });

    // Ranking covers the whole pool; limit only trims what is returned
    const agents =
      query.limit !== undefined
        ? ranking.agents.slice(0, query.limit)
        : ranking.agents;

    res.status(200).json({
      success: true,
      data: { ...ranking, agents },
    });
  };

  /**
   * GET /api/v1/rankings/regimes
   */
  public listRegimes = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json({
      success: true,
      data: {
        defaultRegime: this.rankingService.defaultRegime,
        regimes: this.rankingService.regimeNames,
      },
    });
  };
}
