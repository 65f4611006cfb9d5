/**
 * Pino logger factory. JSON to stdout; pipe through pino-pretty for humans.
 * Reads NODE_ENV, PINO_LOG_LEVEL and VITEST directly so it is safe to call at module scope.
 */

import type { Logger } from "pino";
import { pino } from "pino";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = process.env.PINO_LOG_LEVEL ?? "info";

  return pino({
    level,
    // silent under test tooling
    enabled: !(isVitest || nodeEnv === "test"),
    base: { ...bindings, app: "job-sequencer" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** For tests: keeps the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
