import express, { Application } from "express";
import helmet from "helmet";
import compression from "compression";
import cors from "cors";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { config } from "./config/config";
import { errorHandler, notFoundHandler } from "./middleware/error.middleware";
import { createHealthRoutes } from "./routes/health.routes";
import { createApiRoutes } from "./routes";
import { MetricStore } from "./services/metricStore/metricStore.types";
import { AgentRankingService } from "./services/scoring/agentRanking.service";
import logger from "./utils/logger";

export interface AppDependencies {
  metricStore: MetricStore;
  rankingService: AgentRankingService;
}

export const createApp = async ({
  metricStore,
  rankingService,
}: AppDependencies): Promise<Application> => {
  const app = express();

  app.use(helmet());
  app.use(
    cors({
      origin: config.CORS_ORIGIN,
      credentials: true,
    }),
  );

  // Compression
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: "1mb" }));

  // Request logging
  if (config.NODE_ENV !== "test") {
    const morganFormat = config.NODE_ENV === "production" ? "combined" : "dev";
    app.use(
      morgan(morganFormat, {
        stream: {
          write: (message) => logger.info(message.trim()),
        },
      }),
    );
  }

  app.use((req, res, next) => {
    const requestId = req.header("x-request-id") || uuidv4();
    res.locals.requestId = requestId;
    res.setHeader("X-Request-ID", requestId);
    next();
  });

  // Routes
  app.use("/", createHealthRoutes(metricStore));
  app.use("/api/v1", createApiRoutes(rankingService));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
