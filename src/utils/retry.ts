import logger from "./logger";

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  context?: string;
}

// SQLSTATE / socket codes worth another attempt on a read-only snapshot
const TRANSIENT_DB_CODES = new Set([
  "40001", // serialization_failure
  "40P01", // deadlock_detected
  "57P01", // admin_shutdown
  "08006", // connection_failure
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
]);

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const isTransientDatabaseError = (error: unknown): boolean => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return false;
  }
  const { code } = error;
  return typeof code === "string" && TRANSIENT_DB_CODES.has(code);
};

/**
 * Run `fn` up to `retries` times with linear backoff
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    retries = 3,
    delayMs = 1000,
    shouldRetry = () => true,
    context = "Operation",
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt >= retries || !shouldRetry(error)) {
        break;
      }

      logger.warn(`${context} failed, retrying`, {
        attempt,
        retries,
        error: error instanceof Error ? error.message : String(error),
      });
      await sleep(delayMs * attempt);
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error(`${context} failed with unknown error`);
}
