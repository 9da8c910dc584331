import { describe, expect, it } from "@jest/globals";
import {
  PerformanceAggregator,
  cancellationRate,
} from "../../../src/services/scoring/performanceAggregator.service";
import { MetricSnapshot } from "../../../src/types/ranking.types";
import { goldenSnapshot, sarahJohnson } from "../../fixtures/rankingFixture";

describe("PerformanceAggregator", () => {
  const aggregator = new PerformanceAggregator();

  it("produces one profile per agent, including agents without history", () => {
    const { profiles, issues } = aggregator.aggregate(sarahJohnson, goldenSnapshot);

    expect(profiles.map((p) => p.agentId)).toEqual([1, 2, 3]);
    expect(issues).toEqual([]);
  });

  it("conditions rating dimensions on the request and counts volume agent-wide", () => {
    const { profiles } = aggregator.aggregate(sarahJohnson, goldenSnapshot);

    expect(profiles[0]).toEqual({
      agentId: 1,
      name: "Ava Chen",
      departmentName: "Luxury Voyages",
      rating: 4.5,
      yearsOfService: 10,
      leadSourceRating: 4.5,
      destinationRating: 4.5,
      communicationRating: 4.5,
      totalBookings: 4,
      confirmedBookings: 3,
      cancelledBookings: 1,
      cancellationRate: 0.25,
    });
  });

  it("leaves a dimension absent when nothing qualifies", () => {
    const { profiles } = aggregator.aggregate(sarahJohnson, goldenSnapshot);
    const marcus = profiles[1];

    expect(marcus.leadSourceRating).toBeNull();
    expect(marcus.destinationRating).toBeNull();
    expect(marcus.communicationRating).toBeNull();
    // Pending bookings count toward the total only
    expect(marcus.totalBookings).toBe(2);
    expect(marcus.confirmedBookings).toBe(1);
    expect(marcus.cancelledBookings).toBe(0);
  });

  it("gives an agent with no bookings a cancellation rate of exactly 0", () => {
    const { profiles } = aggregator.aggregate(sarahJohnson, goldenSnapshot);
    const priya = profiles[2];

    expect(priya.totalBookings).toBe(0);
    expect(priya.cancellationRate).toBe(0);
    expect(priya.leadSourceRating).toBeNull();
  });

  it("matches destination through the linked booking only", () => {
    const snapshot: MetricSnapshot = {
      agents: [goldenSnapshot.agents[0]],
      assignments: [
        {
          assignmentId: 1,
          agentId: 1,
          leadSource: "Bought",
          communicationMethod: "Text",
          booking: null,
        },
      ],
    };
    const [profile] = aggregator.aggregate(sarahJohnson, snapshot).profiles;

    expect(profile.destinationRating).toBeNull();
    expect(profile.totalBookings).toBe(0);
  });

  it("skips assignments that reference an unknown agent", () => {
    const snapshot: MetricSnapshot = {
      agents: goldenSnapshot.agents,
      assignments: [
        ...goldenSnapshot.assignments,
        {
          assignmentId: 900,
          agentId: 42,
          leadSource: "Organic",
          communicationMethod: "Phone Call",
          booking: { bookingId: 1, destination: "Europa", bookingStatus: "Cancelled" },
        },
      ],
    };
    const { profiles, issues } = aggregator.aggregate(sarahJohnson, snapshot);

    expect(profiles).toHaveLength(3);
    expect(issues).toEqual([
      {
        code: "DATA_INTEGRITY",
        message: "Assignment 900 references unknown agent 42",
        record: { kind: "assignment", id: 900 },
      },
    ]);
  });

  it("skips a second booking linked to the same assignment", () => {
    const snapshot: MetricSnapshot = {
      agents: [goldenSnapshot.agents[1]],
      assignments: [
        {
          assignmentId: 5,
          agentId: 2,
          leadSource: "Organic",
          communicationMethod: "Text",
          booking: { bookingId: 1, destination: "Mars", bookingStatus: "Confirmed" },
        },
        {
          assignmentId: 5,
          agentId: 2,
          leadSource: "Organic",
          communicationMethod: "Text",
          booking: { bookingId: 2, destination: "Mars", bookingStatus: "Cancelled" },
        },
      ],
    };
    const { profiles, issues } = aggregator.aggregate(sarahJohnson, snapshot);

    expect(profiles[0].totalBookings).toBe(1);
    expect(profiles[0].cancelledBookings).toBe(0);
    expect(issues.map((i) => i.record)).toEqual([{ kind: "assignment", id: 5 }]);
  });

  it("skips duplicate and out-of-range agent records", () => {
    const snapshot: MetricSnapshot = {
      agents: [
        goldenSnapshot.agents[0],
        { ...goldenSnapshot.agents[0], name: "Shadow copy" },
        { ...goldenSnapshot.agents[1], averageCustomerServiceRating: 7 },
        { ...goldenSnapshot.agents[2], yearsOfService: -1 },
      ],
      assignments: [],
    };
    const { profiles, issues } = aggregator.aggregate(sarahJohnson, snapshot);

    expect(profiles.map((p) => p.name)).toEqual(["Ava Chen"]);
    expect(issues.map((i) => i.message)).toEqual([
      "Duplicate agent id 1",
      "Agent 2 has rating 7 outside [1, 5]",
      "Agent 3 has invalid years of service -1",
    ]);
  });

  it("keeps confirmed plus cancelled within the total", () => {
    const { profiles } = aggregator.aggregate(sarahJohnson, goldenSnapshot);

    for (const p of profiles) {
      expect(p.confirmedBookings + p.cancelledBookings).toBeLessThanOrEqual(p.totalBookings);
      expect(p.cancellationRate).toBeGreaterThanOrEqual(0);
      expect(p.cancellationRate).toBeLessThanOrEqual(1);
    }
  });
});

describe("cancellationRate", () => {
  it("divides cancelled by total", () => {
    expect(cancellationRate(1, 4)).toBe(0.25);
  });

  it("is 0 for a zero total", () => {
    expect(cancellationRate(0, 0)).toBe(0);
  });
});
