import type { Logger } from "pino";

export type JobFn = () => Promise<void>;

export interface Job {
  index: number;
  fn: JobFn;
}

/**
 * What an engine does when a job body rejects.
 *
 * - `halt`: the cursor stays on the failed index until it is resubmitted or the sequencer is reset.
 * - `continue`: the failure is reported and the cursor moves on.
 */
export type JobErrorPolicy = "halt" | "continue";

export type CancelTrigger = () => void;

export interface Clock {
  sleep(ms: number): Promise<void>;
  every(ms: number, tick: () => void): CancelTrigger;
}

export interface SequencerOptions {
  initialIndex?: number;
  delayMs?: number; // pause after each job settles
  drainPollMs?: number;
  onJobError?: JobErrorPolicy;
  clock?: Clock;
  logger?: Logger;
}

export interface TimerSequencerOptions extends SequencerOptions {
  tickMs?: number;
}

// listener arguments per event name
export interface SequencerEvents {
  enqueue: [job: Job];
  start: [job: Job];
  success: [job: Job];
  failed: [job: Job, error: unknown];
  advance: [index: number];
  reset: [generation: number];
  disposed: [];
}
