import {
  CommunicationMethod,
  Destination,
  LaunchLocation,
  LeadSource,
  ScoringDimension,
} from "../constants/scoring.constants";

export interface CustomerProfile {
  communicationMethod: CommunicationMethod;
  leadSource: LeadSource;
  destination: Destination;
  launchLocation: LaunchLocation;
  customerName: string;
}

// ───────────────────────────────────────────────────────────────
// Metric Store records
// ───────────────────────────────────────────────────────────────

export interface AgentRecord {
  agentId: number;
  name: string;
  averageCustomerServiceRating: number;
  /** Descriptive only unless a department resolver is configured */
  departmentName: string;
  yearsOfService: number;
}

export interface BookingRecord {
  bookingId: number;
  destination: string;
  /** Confirmed, Cancelled, or an in-progress status */
  bookingStatus: string;
}

export interface AssignmentRecord {
  assignmentId: number;
  agentId: number;
  leadSource: string;
  communicationMethod: string;
  booking: BookingRecord | null;
}

export interface MetricSnapshot {
  agents: AgentRecord[];
  assignments: AssignmentRecord[];
}

// ───────────────────────────────────────────────────────────────
// Derived, per request
// ───────────────────────────────────────────────────────────────

export interface AgentPerformanceProfile {
  agentId: number;
  name: string;
  departmentName: string;
  rating: number;
  yearsOfService: number;
  leadSourceRating: number | null;
  destinationRating: number | null;
  communicationRating: number | null;
  totalBookings: number;
  confirmedBookings: number;
  cancelledBookings: number;
  /** 0 when the agent has no bookings */
  cancellationRate: number;
}

export interface NormalizedAgentProfile extends AgentPerformanceProfile {
  normalizedServiceYears: number;
  normalizedTripVolume: number;
}

export interface ScoredAgentProfile extends NormalizedAgentProfile {
  baseScore: number;
  finalScore: number;
}

export interface ScoredAgent extends ScoredAgentProfile {
  rank: number;
}

export interface DataIssue {
  code: "DATA_INTEGRITY";
  message: string;
  record: {
    kind: "agent" | "assignment";
    id: number;
  };
}

export interface AggregationResult {
  profiles: AgentPerformanceProfile[];
  issues: DataIssue[];
}

export interface RankingResponse {
  requestId: string;
  regime: string;
  customerProfile: CustomerProfile;
  computedAt: string;
  agentCount: number;
  agents: ScoredAgent[];
  dataIssues: DataIssue[];
}

// ───────────────────────────────────────────────────────────────
// Scoring configuration
// ───────────────────────────────────────────────────────────────

export interface WeightEntry {
  dimension: ScoringDimension;
  weight: number;
}

export interface NormalizationDomain {
  min: number;
  max: number;
}

export type TripVolumeDomain =
  | ({ mode: "static" } & NormalizationDomain)
  | { mode: "observed" };

export interface ScoringConfig {
  baselineRating: number;
  tieTolerance: number;
  weights: WeightEntry[];
  normalization: {
    serviceYears: NormalizationDomain;
    tripVolume: TripVolumeDomain;
  };
}

/**
 * Maps a customer profile onto a department name.
 * Supplied by an external business-rules collaborator; none ships here.
 */
export type DepartmentResolver = (profile: CustomerProfile) => string | null;
