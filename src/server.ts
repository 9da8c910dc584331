import { Server } from "http";
import { createApp } from "./app";
import { createContainer } from "./bootstrap";
import { config } from "./config/config";
import { closePool } from "./config/database";
import logger from "./utils/logger";

let server: Server | undefined;

const startServer = async () => {
  try {
    const container = createContainer();
    const app = await createApp(container);

    server = app.listen(config.PORT, () => {
      logger.info(`Server started successfully`, {
        port: config.PORT,
        environment: config.NODE_ENV,
        metricStore: container.metricStore.kind,
        nodeVersion: process.version,
      });
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.error(`Port ${config.PORT} is already in use`);
      } else {
        logger.error("Server error", { error: error.message });
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error("Failed to start server", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
};

const shutdownResources = async () => {
  try {
    await closePool();
    logger.info("Graceful shutdown completed");
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown", {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
};

const gracefulShutdown = (signal: string) => {
  logger.info(`${signal} received, starting graceful shutdown`);

  if (!server) {
    void shutdownResources();
    return;
  }

  server.close(() => {
    logger.info("HTTP server closed");
    void shutdownResources();
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30000).unref();
};

// Handle shutdown signals
process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", { error: error.message, stack: error.stack });
  gracefulShutdown("UNCAUGHT_EXCEPTION");
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
  gracefulShutdown("UNHANDLED_REJECTION");
});

void startServer();
