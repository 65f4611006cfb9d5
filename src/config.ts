import type { Logger } from "pino";
import { z } from "zod";

import { ConfigError } from "./errors.js";
import { makeLogger } from "./logger.js";
import type {
  Clock,
  JobErrorPolicy,
  SequencerOptions,
  TimerSequencerOptions,
} from "./types.js";
import { systemClock } from "./utils.js";

const JobErrorPolicySchema = z.enum(["halt", "continue"]);

export const SequencerSettingsSchema = z.object({
  // jobs never run unless one carries this index
  initialIndex: z.number().int().default(0),
  delayMs: z.number().int().nonnegative().default(50),
  drainPollMs: z.number().int().positive().default(10),
  onJobError: JobErrorPolicySchema.optional(),
});

export const TimerSettingsSchema = SequencerSettingsSchema.extend({
  tickMs: z.number().int().positive().default(5),
});

export type SequencerConfig = {
  initialIndex: number;
  delayMs: number;
  drainPollMs: number;
  onJobError: JobErrorPolicy;
  clock: Clock;
  logger: Logger;
};

export type TimerSequencerConfig = SequencerConfig & { tickMs: number };

export function resolveSequencerConfig(
  options: SequencerOptions,
  defaultPolicy: JobErrorPolicy,
  component = "job-sequencer",
): SequencerConfig {
  const settings = parseSettings(SequencerSettingsSchema, options);
  return {
    ...settings,
    onJobError: settings.onJobError ?? defaultPolicy,
    clock: options.clock ?? systemClock,
    logger: options.logger ?? makeLogger({ component }),
  };
}

export function resolveTimerSequencerConfig(
  options: TimerSequencerOptions,
  defaultPolicy: JobErrorPolicy,
): TimerSequencerConfig {
  const { tickMs } = parseSettings(TimerSettingsSchema, options);
  return { ...resolveSequencerConfig(options, defaultPolicy, "timer-sequencer"), tickMs };
}

function parseSettings<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid sequencer options: ${issues}`, parsed.error);
  }
  return parsed.data;
}
