import fs from "fs";
import { z } from "zod";
import { MetricSnapshot } from "../../types/ranking.types";
import { ConfigurationError } from "../../utils/errors";
import logger from "../../utils/logger";
import { MetricStore, MetricStoreHealth } from "./metricStore.types";

const bookingSchema = z.object({
  bookingId: z.number().int(),
  destination: z.string(),
  bookingStatus: z.string(),
});

export const metricSnapshotSchema = z.object({
  agents: z.array(
    z.object({
      agentId: z.number().int(),
      name: z.string(),
      averageCustomerServiceRating: z.number(),
      departmentName: z.string(),
      yearsOfService: z.number(),
    }),
  ),
  assignments: z.array(
    z.object({
      assignmentId: z.number().int(),
      agentId: z.number().int(),
      leadSource: z.string(),
      communicationMethod: z.string(),
      booking: bookingSchema.nullable().default(null),
    }),
  ),
});

const copySnapshot = (snapshot: MetricSnapshot): MetricSnapshot => ({
  agents: snapshot.agents.map((agent) => ({ ...agent })),
  assignments: snapshot.assignments.map((assignment) => ({
    ...assignment,
    booking: assignment.booking ? { ...assignment.booking } : null,
  })),
});

/**
 * Metric Store over a snapshot held in memory. Every fetch returns a copy,
 * so callers never share mutable records.
 */
export class InMemoryMetricStore implements MetricStore {
  readonly kind = "memory" as const;
  private snapshot: MetricSnapshot;

  constructor(snapshot: MetricSnapshot = { agents: [], assignments: [] }) {
    this.snapshot = copySnapshot(snapshot);
  }

  /**
   * Load a snapshot from a JSON fixture file
   */
  static fromFile(filePath: string): InMemoryMetricStore {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read metric fixture ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const result = metricSnapshotSchema.safeParse(raw);
    if (!result.success) {
      const fields = result.error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");
      throw new ConfigurationError(
        `Invalid metric fixture ${filePath}: ${fields}`,
      );
    }

    logger.info("Loaded metric fixture", {
      path: filePath,
      agents: result.data.agents.length,
      assignments: result.data.assignments.length,
    });

    return new InMemoryMetricStore(result.data);
  }

  /**
   * Replace the held snapshot atomically
   */
  replace(snapshot: MetricSnapshot): void {
    this.snapshot = copySnapshot(snapshot);
  }

  async fetchSnapshot(): Promise<MetricSnapshot> {
    return copySnapshot(this.snapshot);
  }

  async healthCheck(): Promise<MetricStoreHealth> {
    return { status: "healthy", latency: 0, timestamp: new Date() };
  }
}
