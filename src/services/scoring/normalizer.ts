import { ScoringDefaults } from "../../constants/scoring.constants";
import {
  AgentPerformanceProfile,
  NormalizationDomain,
  NormalizedAgentProfile,
  ScoringConfig,
} from "../../types/ranking.types";
import { ConfigurationError } from "../../utils/errors";

export const TARGET_RANGE: NormalizationDomain = {
  min: ScoringDefaults.TARGET_MIN,
  max: ScoringDefaults.TARGET_MAX,
};

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Throws unless the domain is a non-empty, finite interval
 */
export const assertDomain = (
  domain: NormalizationDomain,
  label: string,
): void => {
  if (!Number.isFinite(domain.min) || !Number.isFinite(domain.max)) {
    throw new ConfigurationError(
      `Normalization domain for ${label} must be finite`,
    );
  }
  if (domain.max <= domain.min) {
    throw new ConfigurationError(
      `Normalization domain for ${label} requires max > min (got [${domain.min}, ${domain.max}])`,
    );
  }
};

/**
 * Linear interpolation of `value` from `domain` onto `target`, clamped into
 * `target` even when the value lies outside the domain.
 */
export const normalize = (
  value: number,
  domain: NormalizationDomain,
  target: NormalizationDomain = TARGET_RANGE,
): number => {
  assertDomain(domain, "metric");
  const raw =
    target.min +
    ((value - domain.min) * (target.max - target.min)) /
      (domain.max - domain.min);
  return clamp(raw, target.min, target.max);
};

/**
 * Min/max of confirmed bookings across the pool, or null when every agent
 * has the same count.
 */
export const observedTripVolumeDomain = (
  profiles: AgentPerformanceProfile[],
): NormalizationDomain | null => {
  if (profiles.length === 0) return null;

  const { min, max } = profiles.reduce(
    (range, p) => ({
      min: Math.min(range.min, p.confirmedBookings),
      max: Math.max(range.max, p.confirmedBookings),
    }),
    { min: Infinity, max: -Infinity },
  );

  return max > min ? { min, max } : null;
};

export const validateNormalization = (config: ScoringConfig): void => {
  assertDomain(config.normalization.serviceYears, "serviceYears");
  const tripVolume = config.normalization.tripVolume;
  if (tripVolume.mode === "static") {
    assertDomain(tripVolume, "tripVolume");
  }
};

export class Normalizer {
  constructor(private readonly config: ScoringConfig) {
    validateNormalization(config);
  }

  /**
   * Adds normalized tenure and trip volume to every profile
   */
  normalizeAll(profiles: AgentPerformanceProfile[]): NormalizedAgentProfile[] {
    const tripVolume = this.resolveTripVolumeDomain(profiles);
    const midpoint = (TARGET_RANGE.min + TARGET_RANGE.max) / 2;

    return profiles.map((profile) => ({
      ...profile,
      normalizedServiceYears: normalize(
        profile.yearsOfService,
        this.config.normalization.serviceYears,
      ),
      // A collapsed observed domain carries no signal
      normalizedTripVolume: tripVolume
        ? normalize(profile.confirmedBookings, tripVolume)
        : midpoint,
    }));
  }

  private resolveTripVolumeDomain(
    profiles: AgentPerformanceProfile[],
  ): NormalizationDomain | null {
    const tripVolume = this.config.normalization.tripVolume;
    if (tripVolume.mode === "static") {
      return { min: tripVolume.min, max: tripVolume.max };
    }
    return observedTripVolumeDomain(profiles);
  }
}
