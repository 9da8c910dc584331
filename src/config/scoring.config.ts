import fs from "fs";
import path from "path";
import { z } from "zod";
import {
  ScoringConfigInput,
  scoringConfigSchema,
  scoringRegimeFileSchema,
} from "../schemas/scoringConfig.schemas";
import { validateNormalization } from "../services/scoring/normalizer";
import { ScorerOptions, validateWeights } from "../services/scoring/scorer.service";
import { ScoringConfig } from "../types/ranking.types";
import { ConfigurationError } from "../utils/errors";

export interface ScoringRegimes {
  defaultRegime: string;
  regimes: Record<string, ScoringConfig>;
}

const describeZodError = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");

/**
 * Parse and fully validate one regime. Throws ConfigurationError on any
 * defect, so a returned config is safe to score with.
 */
export const createScoringConfig = (
  input: ScoringConfigInput,
  options: ScorerOptions = {},
): ScoringConfig => {
  const result = scoringConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid scoring configuration: ${describeZodError(result.error)}`,
    );
  }

  const scoringConfig: ScoringConfig = result.data;
  validateWeights(scoringConfig.weights, options);
  validateNormalization(scoringConfig);

  return scoringConfig;
};

/**
 * Validate a parsed regime file (every regime, and the default's presence)
 */
export const parseScoringRegimes = (
  raw: unknown,
  options: ScorerOptions = {},
): ScoringRegimes => {
  const result = scoringRegimeFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid scoring regime file: ${describeZodError(result.error)}`,
    );
  }

  const regimes: Record<string, ScoringConfig> = {};
  for (const [name, regime] of Object.entries(result.data.regimes)) {
    try {
      regimes[name] = createScoringConfig(regime, options);
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw new ConfigurationError(`Regime "${name}": ${error.message}`);
      }
      throw error;
    }
  }

  if (!Object.hasOwn(regimes, result.data.defaultRegime)) {
    throw new ConfigurationError(
      `Default regime "${result.data.defaultRegime}" is not defined`,
    );
  }

  return { defaultRegime: result.data.defaultRegime, regimes };
};

/**
 * Load the regime file from disk. `defaultOverride` replaces the file's
 * default regime, e.g. from SCORING_REGIME.
 */
export const loadScoringRegimes = (
  filePath: string,
  defaultOverride?: string,
  options: ScorerOptions = {},
): ScoringRegimes => {
  const resolved = path.resolve(process.cwd(), filePath);

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read scoring configuration ${resolved}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const loaded = parseScoringRegimes(raw, options);

  if (defaultOverride) {
    if (!Object.hasOwn(loaded.regimes, defaultOverride)) {
      throw new ConfigurationError(
        `Default regime "${defaultOverride}" is not defined in ${resolved}`,
      );
    }
    return { ...loaded, defaultRegime: defaultOverride };
  }

  return loaded;
};
