import {
  BookingOutcome,
  ScoringDefaults,
} from "../../constants/scoring.constants";
import {
  AgentPerformanceProfile,
  AgentRecord,
  AggregationResult,
  AssignmentRecord,
  CustomerProfile,
  DataIssue,
  MetricSnapshot,
} from "../../types/ranking.types";
import { DataIntegrityError } from "../../utils/errors";
import logger from "../../utils/logger";

interface AgentAccumulator {
  agent: AgentRecord;
  // Qualifying record counts per conditioned dimension
  leadSourceMatches: number;
  destinationMatches: number;
  communicationMatches: number;
  totalBookings: number;
  confirmedBookings: number;
  cancelledBookings: number;
}

/**
 * Mean of the agent's overall rating across `matches` qualifying records.
 * Records carry no per-assignment rating, so the mean is the rating itself
 * whenever anything qualifies.
 */
const conditionalRating = (rating: number, matches: number): number | null =>
  matches > 0 ? rating : null;

export const cancellationRate = (cancelled: number, total: number): number =>
  total > 0 ? cancelled / total : 0;

/**
 * Builds one performance profile per agent from the metric snapshot,
 * conditioned on the customer profile.
 */
export class PerformanceAggregator {
  aggregate(
    customer: CustomerProfile,
    snapshot: MetricSnapshot,
  ): AggregationResult {
    const issues: DataIssue[] = [];
    const accumulators = this.indexAgents(snapshot.agents, issues);
    const seenAssignments = new Set<number>();

    for (const assignment of snapshot.assignments) {
      const acc = accumulators.get(assignment.agentId);

      if (!acc) {
        this.skip(
          issues,
          new DataIntegrityError(
            `Assignment ${assignment.assignmentId} references unknown agent ${assignment.agentId}`,
            "assignment",
            assignment.assignmentId,
          ),
        );
        continue;
      }

      if (seenAssignments.has(assignment.assignmentId)) {
        this.skip(
          issues,
          new DataIntegrityError(
            `Assignment ${assignment.assignmentId} appears more than once (multiple linked bookings)`,
            "assignment",
            assignment.assignmentId,
          ),
        );
        continue;
      }
      seenAssignments.add(assignment.assignmentId);

      this.accumulate(acc, assignment, customer);
    }

    const profiles = [...accumulators.values()].map((acc) =>
      this.toProfile(acc),
    );

    return { profiles, issues };
  }

  private indexAgents(
    agents: AgentRecord[],
    issues: DataIssue[],
  ): Map<number, AgentAccumulator> {
    const index = new Map<number, AgentAccumulator>();

    for (const agent of agents) {
      if (index.has(agent.agentId)) {
        this.skip(
          issues,
          new DataIntegrityError(
            `Duplicate agent id ${agent.agentId}`,
            "agent",
            agent.agentId,
          ),
        );
        continue;
      }

      const problem = this.checkAgent(agent);
      if (problem) {
        this.skip(
          issues,
          new DataIntegrityError(problem, "agent", agent.agentId),
        );
        continue;
      }

      index.set(agent.agentId, {
        agent,
        leadSourceMatches: 0,
        destinationMatches: 0,
        communicationMatches: 0,
        totalBookings: 0,
        confirmedBookings: 0,
        cancelledBookings: 0,
      });
    }

    return index;
  }

  private checkAgent(agent: AgentRecord): string | null {
    const rating = agent.averageCustomerServiceRating;
    if (
      !Number.isFinite(rating) ||
      rating < ScoringDefaults.RATING_MIN ||
      rating > ScoringDefaults.RATING_MAX
    ) {
      return `Agent ${agent.agentId} has rating ${rating} outside [${ScoringDefaults.RATING_MIN}, ${ScoringDefaults.RATING_MAX}]`;
    }
    if (!Number.isInteger(agent.yearsOfService) || agent.yearsOfService < 0) {
      return `Agent ${agent.agentId} has invalid years of service ${agent.yearsOfService}`;
    }
    return null;
  }

  private accumulate(
    acc: AgentAccumulator,
    assignment: AssignmentRecord,
    customer: CustomerProfile,
  ): void {
    if (assignment.leadSource === customer.leadSource) {
      acc.leadSourceMatches++;
    }

    if (assignment.communicationMethod === customer.communicationMethod) {
      acc.communicationMatches++;
    }

    const booking = assignment.booking;
    if (!booking) return;

    if (booking.destination === customer.destination) {
      acc.destinationMatches++;
    }

    // Volume and risk span every booking, whatever the request
    acc.totalBookings++;
    if (booking.bookingStatus === BookingOutcome.CONFIRMED) {
      acc.confirmedBookings++;
    } else if (booking.bookingStatus === BookingOutcome.CANCELLED) {
      acc.cancelledBookings++;
    }
  }

  private toProfile(acc: AgentAccumulator): AgentPerformanceProfile {
    const { agent } = acc;
    const rating = agent.averageCustomerServiceRating;

    return {
      agentId: agent.agentId,
      name: agent.name,
      departmentName: agent.departmentName,
      rating,
      yearsOfService: agent.yearsOfService,
      leadSourceRating: conditionalRating(rating, acc.leadSourceMatches),
      destinationRating: conditionalRating(rating, acc.destinationMatches),
      communicationRating: conditionalRating(
        rating,
        acc.communicationMatches,
      ),
      totalBookings: acc.totalBookings,
      confirmedBookings: acc.confirmedBookings,
      cancelledBookings: acc.cancelledBookings,
      cancellationRate: cancellationRate(
        acc.cancelledBookings,
        acc.totalBookings,
      ),
    };
  }

  private skip(issues: DataIssue[], error: DataIntegrityError): void {
    logger.warn("Skipping record during aggregation", {
      error: error.message,
      recordKind: error.recordKind,
      recordId: error.recordId,
    });
    issues.push({
      code: "DATA_INTEGRITY",
      message: error.message,
      record: { kind: error.recordKind, id: error.recordId },
    });
  }
}
