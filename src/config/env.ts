import { z } from "zod";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates the environment variables the ledger reads. Unknown variables are
 * ignored; a present but invalid value throws a ZodError.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  return envSchema.parse({
    NODE_ENV: source.NODE_ENV,
    LOG_LEVEL: source.LOG_LEVEL,
  });
}
