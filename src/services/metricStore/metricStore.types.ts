import { MetricSnapshot } from "../../types/ranking.types";

export interface MetricStoreHealth {
  status: "healthy" | "unhealthy";
  latency?: number;
  error?: string;
  timestamp: Date;
}

/**
 * Read-only source of agent, assignment and booking records.
 * One call to fetchSnapshot() must reflect a single consistent view.
 */
export interface MetricStore {
  readonly kind: "postgres" | "memory";
  fetchSnapshot(): Promise<MetricSnapshot>;
  healthCheck(): Promise<MetricStoreHealth>;
}
