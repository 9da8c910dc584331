import { z } from "zod";
import { SCORING_DIMENSIONS, ScoringDefaults } from "../constants/scoring.constants";

const domainSchema = z.object({
  min: z.number(),
  max: z.number(),
});

export const scoringConfigSchema = z.object({
  baselineRating: z
    .number()
    .min(ScoringDefaults.RATING_MIN)
    .max(ScoringDefaults.RATING_MAX)
    .default(ScoringDefaults.BASELINE_RATING),
  tieTolerance: z.number().nonnegative().default(ScoringDefaults.TIE_TOLERANCE),
  weights: z
    .array(
      z.object({
        dimension: z.enum(SCORING_DIMENSIONS),
        weight: z.number().nonnegative(),
      }),
    )
    .min(1, "At least one weight entry is required"),
  normalization: z.object({
    serviceYears: domainSchema.default({
      min: ScoringDefaults.SERVICE_YEARS_MIN,
      max: ScoringDefaults.SERVICE_YEARS_MAX,
    }),
    tripVolume: z
      .discriminatedUnion("mode", [
        domainSchema.extend({ mode: z.literal("static") }),
        z.object({ mode: z.literal("observed") }),
      ])
      .default({ mode: "observed" }),
  }).default({}),
});

export const scoringRegimeFileSchema = z.object({
  defaultRegime: z.string().min(1),
  regimes: z.record(z.string(), scoringConfigSchema),
});

export type ScoringConfigInput = z.input<typeof scoringConfigSchema>;
