import {
  ScoringDefaults,
  ScoringDimension,
} from "../../constants/scoring.constants";
import {
  CustomerProfile,
  DepartmentResolver,
  NormalizedAgentProfile,
  ScoredAgentProfile,
  ScoringConfig,
  WeightEntry,
} from "../../types/ranking.types";
import { ConfigurationError } from "../../utils/errors";

/**
 * Profile field each dimension reads. Two weight entries must never read the
 * same field.
 */
export const DIMENSION_SIGNALS: Record<
  ScoringDimension,
  keyof NormalizedAgentProfile
> = {
  rating: "rating",
  leadSourceRating: "leadSourceRating",
  destinationRating: "destinationRating",
  communicationRating: "communicationRating",
  serviceYears: "normalizedServiceYears",
  tripVolume: "normalizedTripVolume",
  department: "departmentName",
};

export interface ScorerOptions {
  departmentResolver?: DepartmentResolver;
}

/**
 * Rejects a weight vector that does not sum to 1, has negative entries, or
 * weights one input signal through more than one entry.
 */
export const validateWeights = (
  weights: WeightEntry[],
  options: ScorerOptions = {},
): void => {
  if (weights.length === 0) {
    throw new ConfigurationError("Weight vector is empty");
  }

  for (const entry of weights) {
    if (!Number.isFinite(entry.weight) || entry.weight < 0) {
      throw new ConfigurationError(
        `Weight for ${entry.dimension} must be a non-negative number (got ${entry.weight})`,
      );
    }
  }

  const sum = weights.reduce((total, entry) => total + entry.weight, 0);
  if (Math.abs(sum - 1) > ScoringDefaults.WEIGHT_SUM_EPSILON) {
    throw new ConfigurationError(`Weights must sum to 1.0 (got ${sum})`);
  }

  const bySignal = new Map<string, ScoringDimension[]>();
  for (const { dimension } of weights) {
    const signal = DIMENSION_SIGNALS[dimension];
    bySignal.set(signal, [...(bySignal.get(signal) ?? []), dimension]);
  }
  for (const [signal, dimensions] of bySignal) {
    if (dimensions.length > 1) {
      throw new ConfigurationError(
        `Signal ${signal} is weighted by ${dimensions.length} entries (${dimensions.join(", ")})`,
      );
    }
  }

  const usesDepartment = weights.some((w) => w.dimension === "department");
  if (usesDepartment && !options.departmentResolver) {
    throw new ConfigurationError(
      "The department dimension requires a department resolver",
    );
  }
};

/**
 * Weighted base score and cancellation-adjusted final score
 */
export class Scorer {
  private readonly departmentResolver?: DepartmentResolver;

  constructor(
    private readonly config: ScoringConfig,
    options: ScorerOptions = {},
  ) {
    validateWeights(config.weights, options);
    this.departmentResolver = options.departmentResolver;
  }

  scoreAll(
    profiles: NormalizedAgentProfile[],
    customer: CustomerProfile,
  ): ScoredAgentProfile[] {
    const department = this.departmentResolver
      ? this.departmentResolver(customer)
      : null;

    return profiles.map((profile) => {
      const baseScore = this.config.weights.reduce(
        (total, { dimension, weight }) =>
          total + weight * this.dimensionValue(dimension, profile, department),
        0,
      );

      return {
        ...profile,
        baseScore,
        finalScore: baseScore * (1 - profile.cancellationRate),
      };
    });
  }

  /**
   * Value of one dimension for a profile, baseline when the agent has no
   * qualifying history for it
   */
  dimensionValue(
    dimension: ScoringDimension,
    profile: NormalizedAgentProfile,
    department: string | null = null,
  ): number {
    const baseline = this.config.baselineRating;

    switch (dimension) {
      case "rating":
        return profile.rating;
      case "leadSourceRating":
        return profile.leadSourceRating ?? baseline;
      case "destinationRating":
        return profile.destinationRating ?? baseline;
      case "communicationRating":
        return profile.communicationRating ?? baseline;
      case "serviceYears":
        return profile.normalizedServiceYears;
      case "tripVolume":
        return profile.normalizedTripVolume;
      // Match indicator on the rating scale, independent of the rating signal
      case "department":
        return department !== null && department === profile.departmentName
          ? ScoringDefaults.TARGET_MAX
          : baseline;
    }
  }
}
