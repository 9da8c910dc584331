import { Pool, PoolConfig, PoolClient, QueryResultRow } from "pg";
import logger, { loggerUtils } from "../utils/logger";
import { config } from "./config";

export type IsolationLevel =
  | "READ COMMITTED"
  | "REPEATABLE READ"
  | "SERIALIZABLE";

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  readOnly?: boolean;
}

let pool: Pool | null = null;

// ═══════════════════════════════════════════════════════════════
// Pool Configuration
// ═══════════════════════════════════════════════════════════════
const buildPoolConfig = (): PoolConfig => ({
  host: config.DB_HOST,
  port: config.DB_PORT,
  database: config.DB_NAME,
  user: config.DB_USER,
  password: config.DB_PASSWORD,
  max: config.DB_MAX_CONNECTIONS,
  idleTimeoutMillis: 15000,
  connectionTimeoutMillis: 15000,
  ssl: config.DB_SSL ? { rejectUnauthorized: false } : undefined,
});

// ═══════════════════════════════════════════════════════════════
// Lazily created pool, so the memory store never opens connections
// ═══════════════════════════════════════════════════════════════
export const getPool = (): Pool => {
  if (pool) return pool;

  const poolConfig = buildPoolConfig();

  if (config.NODE_ENV === "development") {
    logger.debug("Database pool configuration:", {
      ...poolConfig,
      password: "***HIDDEN***",
    });
  }

  pool = new Pool(poolConfig);

  pool.on("error", (err) => {
    logger.error("Unexpected error on idle client", { error: err.message });
  });

  pool.on("connect", () => {
    logger.info("New database connection established");
  });

  return pool;
};

// ═══════════════════════════════════════════════════════════════
// query() - Returns rows array directly
// ═══════════════════════════════════════════════════════════════
export const query = async <T extends QueryResultRow>(
  text: string,
  params?: unknown[],
  client?: PoolClient,
): Promise<T[]> => {
  const start = Date.now();
  try {
    const res = client
      ? await client.query<T>(text, params)
      : await getPool().query<T>(text, params);

    loggerUtils.logDatabase(logger, text.substring(0, 100), Date.now() - start);
    return res.rows;
  } catch (error) {
    loggerUtils.logDatabase(
      logger,
      text.substring(0, 200),
      Date.now() - start,
      error instanceof Error ? error : new Error(String(error)),
    );
    throw error;
  }
};

// ═══════════════════════════════════════════════════════════════
// transaction() - Execute queries in a transaction
// Example: await transaction(async (client) => {
//            await query('SELECT ...', [], client);
//          }, { isolationLevel: 'REPEATABLE READ', readOnly: true });
// ═══════════════════════════════════════════════════════════════
export const transaction = async <T>(
  callback: (client: PoolClient) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> => {
  const client = await getPool().connect();
  const startTime = Date.now();

  const modes = [
    options.isolationLevel ? `ISOLATION LEVEL ${options.isolationLevel}` : "",
    options.readOnly ? "READ ONLY" : "",
  ].filter(Boolean);

  try {
    await client.query(modes.length ? `BEGIN ${modes.join(", ")}` : "BEGIN");
    logger.debug("Transaction started", { modes });

    const result = await callback(client);

    await client.query("COMMIT");
    logger.debug("Transaction committed", {
      duration: `${Date.now() - startTime}ms`,
    });

    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    logger.error("Transaction rolled back", {
      error: error instanceof Error ? error.message : error,
      duration: `${Date.now() - startTime}ms`,
    });
    throw error;
  } finally {
    client.release();
  }
};

// ═══════════════════════════════════════════════════════════════
// Utility Functions
// ═══════════════════════════════════════════════════════════════

/**
 * Get current pool statistics
 */
export const getPoolStats = () => {
  return {
    total: pool?.totalCount ?? 0,
    idle: pool?.idleCount ?? 0,
    waiting: pool?.waitingCount ?? 0,
  };
};

/**
 * Round-trip check used by the readiness probe
 */
export const healthCheck = async (): Promise<{
  status: "healthy" | "unhealthy";
  latency?: number;
  error?: string;
  timestamp: Date;
}> => {
  const start = Date.now();
  const timestamp = new Date();

  try {
    await query("SELECT 1");
    return { status: "healthy", latency: Date.now() - start, timestamp };
  } catch (error) {
    return {
      status: "unhealthy",
      error: error instanceof Error ? error.message : "Unknown error",
      timestamp,
    };
  }
};

/**
 * Gracefully close the pool
 */
export const closePool = async (): Promise<void> => {
  if (!pool) {
    logger.debug("Pool not open, skipping close");
    return;
  }

  try {
    logger.info("Closing database pool...", getPoolStats());
    await pool.end();
    pool = null;
    logger.info("Database pool closed successfully");
  } catch (error) {
    logger.error("Error closing database pool:", {
      error: error instanceof Error ? error.message : error,
    });
    throw error;
  }
};
