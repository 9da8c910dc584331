import { Router } from "express";
import { config } from "../config/config";
import { MetricStore } from "../services/metricStore/metricStore.types";
import logger from "../utils/logger";

export const createHealthRoutes = (metricStore: MetricStore): Router => {
  const router = Router();

  router.get("/health", async (_req, res) => {
    const health = {
      status: "ok",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.NODE_ENV,
    };

    res.status(200).json(health);
  });

  router.get("/health/ready", async (_req, res) => {
    const checks: Record<string, string> = {
      metricStore: "unknown",
      timestamp: new Date().toISOString(),
    };

    try {
      const health = await metricStore.healthCheck();
      checks.metricStore = health.status;

      if (health.status === "healthy") {
        res.status(200).json({ status: "ready", checks });
      } else {
        res.status(503).json({ status: "not ready", checks });
      }
    } catch (err) {
      logger.error("Readiness check failed", {
        error: err instanceof Error ? err.message : String(err),
      });
      checks.metricStore = "error";
      res.status(503).json({ status: "not ready", checks });
    }
  });

  router.get("/health/live", (_req, res) => {
    res.status(200).json({
      status: "alive",
      timestamp: new Date().toISOString(),
    });
  });

  return router;
};
