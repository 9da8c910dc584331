import { ScoringConfigInput } from "../../src/schemas/scoringConfig.schemas";
import { CustomerProfile, MetricSnapshot } from "../../src/types/ranking.types";

export const sarahJohnson: CustomerProfile = {
  communicationMethod: "Phone Call",
  leadSource: "Organic",
  destination: "Europa",
  launchLocation: "Kennedy Space Center",
  customerName: "Sarah Johnson",
};

/**
 * Three agents:
 *  1 - strong history matching the request, one cancellation in four bookings
 *  2 - new hire, history only on other lead sources and channels
 *  3 - long tenure, no history at all
 */
export const goldenSnapshot: MetricSnapshot = {
  agents: [
    {
      agentId: 1,
      name: "Ava Chen",
      averageCustomerServiceRating: 4.5,
      departmentName: "Luxury Voyages",
      yearsOfService: 10,
    },
    {
      agentId: 2,
      name: "Marcus Webb",
      averageCustomerServiceRating: 4.0,
      departmentName: "Family Expeditions",
      yearsOfService: 0,
    },
    {
      agentId: 3,
      name: "Priya Nair",
      averageCustomerServiceRating: 3.5,
      departmentName: "Adventure Travel",
      yearsOfService: 20,
    },
  ],
  assignments: [
    {
      assignmentId: 101,
      agentId: 1,
      leadSource: "Organic",
      communicationMethod: "Phone Call",
      booking: { bookingId: 9001, destination: "Europa", bookingStatus: "Confirmed" },
    },
    {
      assignmentId: 102,
      agentId: 1,
      leadSource: "Bought",
      communicationMethod: "Text",
      booking: { bookingId: 9002, destination: "Mars", bookingStatus: "Cancelled" },
    },
    {
      assignmentId: 103,
      agentId: 1,
      leadSource: "Organic",
      communicationMethod: "Text",
      booking: { bookingId: 9003, destination: "Europa", bookingStatus: "Confirmed" },
    },
    {
      assignmentId: 104,
      agentId: 1,
      leadSource: "Bought",
      communicationMethod: "Phone Call",
      booking: { bookingId: 9004, destination: "Titan", bookingStatus: "Confirmed" },
    },
    {
      assignmentId: 201,
      agentId: 2,
      leadSource: "Bought",
      communicationMethod: "Text",
      booking: { bookingId: 9005, destination: "Mars", bookingStatus: "Confirmed" },
    },
    {
      assignmentId: 202,
      agentId: 2,
      leadSource: "Bought",
      communicationMethod: "Text",
      booking: { bookingId: 9006, destination: "Venus", bookingStatus: "Pending" },
    },
  ],
};

export const refinedRegime: ScoringConfigInput = {
  baselineRating: 3.0,
  tieTolerance: 1e-9,
  weights: [
    { dimension: "rating", weight: 0.3 },
    { dimension: "leadSourceRating", weight: 0.2 },
    { dimension: "destinationRating", weight: 0.2 },
    { dimension: "communicationRating", weight: 0.1 },
    { dimension: "tripVolume", weight: 0.2 },
  ],
  normalization: {
    serviceYears: { min: 2, max: 18 },
    tripVolume: { mode: "observed" },
  },
};

export const initialRegime: ScoringConfigInput = {
  baselineRating: 3.0,
  tieTolerance: 1e-9,
  weights: [
    { dimension: "rating", weight: 0.25 },
    { dimension: "leadSourceRating", weight: 0.15 },
    { dimension: "destinationRating", weight: 0.2 },
    { dimension: "communicationRating", weight: 0.1 },
    { dimension: "serviceYears", weight: 0.15 },
    { dimension: "tripVolume", weight: 0.15 },
  ],
  normalization: {
    serviceYears: { min: 2, max: 18 },
    tripVolume: { mode: "observed" },
  },
};
