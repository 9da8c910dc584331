/**
 * Closed enumerations accepted on a customer profile
 */
export const COMMUNICATION_METHODS = ["Phone Call", "Text"] as const;

export const LEAD_SOURCES = ["Organic", "Bought"] as const;

export const DESTINATIONS = [
  "Mars",
  "Europa",
  "Venus",
  "Titan",
  "Ganymede",
] as const;

export const LAUNCH_LOCATIONS = [
  "Kennedy Space Center",
  "Dallas-Fort Worth Launch Complex",
  "New York Orbital Gateway",
  "Tokyo Spaceport Terminal",
  "Dubai Interplanetary Hub",
  "London Ascension Platform",
  "Sydney Stellar Port",
] as const;

export type CommunicationMethod = (typeof COMMUNICATION_METHODS)[number];
export type LeadSource = (typeof LEAD_SOURCES)[number];
export type Destination = (typeof DESTINATIONS)[number];
export type LaunchLocation = (typeof LAUNCH_LOCATIONS)[number];

/**
 * Booking outcomes that feed the volume and risk metrics.
 * Any other status is an in-progress booking: counted in the total only.
 */
export enum BookingOutcome {
  CONFIRMED = "Confirmed",
  CANCELLED = "Cancelled",
}

/**
 * Scoring dimensions a weight entry may reference
 */
export const SCORING_DIMENSIONS = [
  "rating",
  "leadSourceRating",
  "destinationRating",
  "communicationRating",
  "serviceYears",
  "tripVolume",
  "department",
] as const;

export type ScoringDimension = (typeof SCORING_DIMENSIONS)[number];

export const ScoringDefaults = {
  // Customer service rating scale
  RATING_MIN: 1.0,
  RATING_MAX: 5.0,

  // Normalization target range
  TARGET_MIN: 1.0,
  TARGET_MAX: 5.0,

  // Substitute for a rating dimension with no qualifying history
  BASELINE_RATING: 3.0,

  // Allowed drift of the weight sum from 1.0
  WEIGHT_SUM_EPSILON: 1e-9,

  // Final scores closer than this are ties
  TIE_TOLERANCE: 1e-9,

  // Practical tenure range in years
  SERVICE_YEARS_MIN: 2,
  SERVICE_YEARS_MAX: 18,
} as const;
