import dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../utils/errors";

dotenv.config();

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    PORT: z.string().default("3000").transform(Number),

    // Metric Store
    METRIC_STORE: z.enum(["postgres", "memory"]).default("postgres"),
    METRIC_FIXTURE_PATH: z.string().default("./config/metric-fixture.json"),

    // Database
    DB_HOST: z.string().optional(),
    DB_NAME: z.string().optional(),
    DB_USER: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_PORT: z.string().default("5432").transform(Number),
    DB_MAX_CONNECTIONS: z.string().default("10").transform(Number),
    DB_SSL: z
      .enum(["true", "false"])
      .default("false")
      .transform((value) => value === "true"),

    // Scoring
    SCORING_CONFIG_PATH: z.string().default("./config/scoring.json"),
    SCORING_REGIME: z.string().optional(),

    // Logging
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
    LOG_FILE_PATH: z.string().default("./logs"),
    LOG_FILE: z
      .enum(["true", "false"])
      .default("true")
      .transform((value) => value === "true"),

    CORS_ORIGIN: z.string().default("*"),
  })
  .superRefine((env, ctx) => {
    if (env.METRIC_STORE !== "postgres") return;

    for (const key of ["DB_HOST", "DB_NAME", "DB_USER", "DB_PASSWORD"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when METRIC_STORE=postgres`,
        });
      }
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

export const parseEnv = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const missing = error.issues
        .map((issue) => issue.path.join("."))
        .join(", ");

      throw new ConfigurationError(
        `Missing or invalid environment variables: ${missing}`,
      );
    }
    throw error;
  }
};

export const config = parseEnv();
