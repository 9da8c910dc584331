import { PoolClient } from "pg";
import { healthCheck, query, transaction } from "../../config/database";
import {
  AgentRecord,
  AssignmentRecord,
  MetricSnapshot,
} from "../../types/ranking.types";
import logger from "../../utils/logger";
import { isTransientDatabaseError, retry } from "../../utils/retry";
import { MetricStore, MetricStoreHealth } from "./metricStore.types";

// ═══════════════════════════════════════════════════════════════
// Row types
// ═══════════════════════════════════════════════════════════════

type AgentRow = {
  agent_id: number;
  name: string;
  average_customer_service_rating: string | number;
  department_name: string | null;
  years_of_service: number;
};

type AssignmentRow = {
  assignment_id: number;
  agent_id: number;
  lead_source: string;
  communication_method: string;
  booking_id: number | null;
  destination: string | null;
  booking_status: string | null;
};

const AGENTS_SQL = `
  SELECT a.agent_id,
         a.name,
         a.average_customer_service_rating,
         d.department_name,
         a.years_of_service
    FROM agents a
    LEFT JOIN departments d ON d.department_id = a.department_id
   ORDER BY a.agent_id`;

const ASSIGNMENTS_SQL = `
  SELECT asg.assignment_id,
         asg.agent_id,
         asg.lead_source,
         asg.communication_method,
         b.booking_id,
         b.destination,
         b.booking_status
    FROM assignments asg
    LEFT JOIN bookings b ON b.assignment_id = asg.assignment_id
   ORDER BY asg.assignment_id, b.booking_id`;

export const mapAgentRow = (row: AgentRow): AgentRecord => ({
  agentId: Number(row.agent_id),
  name: row.name,
  // NUMERIC columns arrive as strings
  averageCustomerServiceRating: Number(row.average_customer_service_rating),
  departmentName: row.department_name ?? "",
  yearsOfService: Number(row.years_of_service),
});

export const mapAssignmentRow = (row: AssignmentRow): AssignmentRecord => ({
  assignmentId: Number(row.assignment_id),
  agentId: Number(row.agent_id),
  leadSource: row.lead_source,
  communicationMethod: row.communication_method,
  booking:
    row.booking_id === null
      ? null
      : {
          bookingId: Number(row.booking_id),
          destination: row.destination ?? "",
          bookingStatus: row.booking_status ?? "",
        },
});

/**
 * Metric Store backed by the booking database. Both reads share one
 * read-only repeatable-read transaction.
 */
export class PostgresMetricStore implements MetricStore {
  readonly kind = "postgres" as const;

  async fetchSnapshot(): Promise<MetricSnapshot> {
    const start = Date.now();

    const snapshot = await retry(() => this.readSnapshot(), {
      retries: 3,
      delayMs: 250,
      shouldRetry: isTransientDatabaseError,
      context: "Metric snapshot read",
    });

    logger.debug("Metric snapshot fetched", {
      agents: snapshot.agents.length,
      assignments: snapshot.assignments.length,
      duration: `${Date.now() - start}ms`,
    });

    return snapshot;
  }

  async healthCheck(): Promise<MetricStoreHealth> {
    return healthCheck();
  }

  private readSnapshot(): Promise<MetricSnapshot> {
    return transaction(
      async (client: PoolClient) => {
        const agentRows = await query<AgentRow>(AGENTS_SQL, [], client);
        const assignmentRows = await query<AssignmentRow>(
          ASSIGNMENTS_SQL,
          [],
          client,
        );

        return {
          agents: agentRows.map(mapAgentRow),
          assignments: assignmentRows.map(mapAssignmentRow),
        };
      },
      { isolationLevel: "REPEATABLE READ", readOnly: true },
    );
  }
}
