import path from "path";
import { config } from "./config/config";
import { loadScoringRegimes } from "./config/scoring.config";
import { InMemoryMetricStore } from "./services/metricStore/inMemoryMetricStore";
import { MetricStore } from "./services/metricStore/metricStore.types";
import { PostgresMetricStore } from "./services/metricStore/postgresMetricStore.service";
import { AgentRankingService } from "./services/scoring/agentRanking.service";
import logger from "./utils/logger";

export interface ServiceContainer {
  metricStore: MetricStore;
  rankingService: AgentRankingService;
}

export const createMetricStore = (): MetricStore => {
  if (config.METRIC_STORE === "memory") {
    return InMemoryMetricStore.fromFile(
      path.resolve(process.cwd(), config.METRIC_FIXTURE_PATH),
    );
  }
  return new PostgresMetricStore();
};

/**
 * Wire the service from the environment. Configuration errors surface here,
 * before the server accepts requests.
 */
export const createContainer = (): ServiceContainer => {
  const regimes = loadScoringRegimes(
    config.SCORING_CONFIG_PATH,
    config.SCORING_REGIME,
  );
  const metricStore = createMetricStore();

  logger.info("Scoring configuration loaded", {
    regimes: Object.keys(regimes.regimes),
    defaultRegime: regimes.defaultRegime,
    metricStore: metricStore.kind,
  });

  return {
    metricStore,
    rankingService: new AgentRankingService(metricStore, regimes),
  };
};
