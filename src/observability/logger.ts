import pino from "pino";
import type { Logger } from "pino";
import { loadEnv } from "../config/env";

export type { Logger } from "pino";

/**
 * Pino logger for ledger instances. Level comes from LOG_LEVEL; output is
 * disabled when NODE_ENV is test.
 */
export function createLogger(bindings?: Record<string, unknown>): Logger {
  const env = loadEnv();

  return pino({
    level: env.LOG_LEVEL,
    enabled: env.NODE_ENV !== "test",
    base: { ...bindings, service: "stable-debt-ledger" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createNoopLogger(): Logger {
  return pino({ enabled: false });
}
