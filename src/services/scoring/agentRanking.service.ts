import { v4 as uuidv4 } from "uuid";
import { ScoringRegimes } from "../../config/scoring.config";
import { customerProfileSchema } from "../../schemas/request.schemas";
import {
  CustomerProfile,
  RankingResponse,
  ScoringConfig,
} from "../../types/ranking.types";
import { ValidationError } from "../../utils/errors";
import logger from "../../utils/logger";
import { MetricStore } from "../metricStore/metricStore.types";
import { Normalizer } from "./normalizer";
import { PerformanceAggregator } from "./performanceAggregator.service";
import { rankAgents } from "./ranker";
import { Scorer, ScorerOptions } from "./scorer.service";

export interface AgentRankingServiceOptions extends ScorerOptions {
  clock?: () => Date;
  idGenerator?: () => string;
}

export interface RankOptions {
  regime?: string;
}

interface RegimePipeline {
  config: ScoringConfig;
  normalizer: Normalizer;
  scorer: Scorer;
}

/**
 * Ranks every agent in the Metric Store against one customer profile
 */
export class AgentRankingService {
  private readonly aggregator = new PerformanceAggregator();
  private readonly pipelines = new Map<string, RegimePipeline>();
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;

  constructor(
    private readonly metricStore: MetricStore,
    private readonly regimes: ScoringRegimes,
    options: AgentRankingServiceOptions = {},
  ) {
    for (const [name, config] of Object.entries(regimes.regimes)) {
      this.pipelines.set(name, {
        config,
        normalizer: new Normalizer(config),
        scorer: new Scorer(config, {
          departmentResolver: options.departmentResolver,
        }),
      });
    }
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? uuidv4;
  }

  get defaultRegime(): string {
    return this.regimes.defaultRegime;
  }

  get regimeNames(): string[] {
    return [...this.pipelines.keys()];
  }

  async rankAgents(
    input: unknown,
    options: RankOptions = {},
  ): Promise<RankingResponse> {
    const start = Date.now();
    const customerProfile = this.validateProfile(input);
    const regime = options.regime ?? this.regimes.defaultRegime;
    const pipeline = this.pipelines.get(regime);

    if (!pipeline) {
      throw new ValidationError(`Unknown scoring regime "${regime}"`, [
        { field: "regime", message: `Expected one of: ${this.regimeNames.join(", ")}` },
      ]);
    }

    const requestId = this.idGenerator();
    const snapshot = await this.metricStore.fetchSnapshot();

    const { profiles, issues } = this.aggregator.aggregate(
      customerProfile,
      snapshot,
    );
    const normalized = pipeline.normalizer.normalizeAll(profiles);
    const scored = pipeline.scorer.scoreAll(normalized, customerProfile);
    const agents = rankAgents(scored, pipeline.config.tieTolerance);

    logger.info("Agents ranked", {
      requestId,
      regime,
      agentCount: agents.length,
      dataIssues: issues.length,
      duration: `${Date.now() - start}ms`,
    });

    return {
      requestId,
      regime,
      customerProfile,
      computedAt: this.clock().toISOString(),
      agentCount: agents.length,
      agents,
      dataIssues: issues,
    };
  }

  /**
   * Rejects a profile outside the closed enumerations before any store access
   */
  validateProfile(input: unknown): CustomerProfile {
    const result = customerProfileSchema.safeParse(input);

    if (!result.success) {
      const details = result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
      }));
      throw new ValidationError("Invalid customer profile", details);
    }

    return result.data;
  }
}
