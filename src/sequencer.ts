import { EventEmitter } from "events";
import type { Logger } from "pino";

import type { SequencerConfig } from "./config.js";
import { DisposedError, JobFailedError, describeError } from "./errors.js";
import { SequenceState } from "./state.js";
import type { Job, JobFn, SequencerEvents } from "./types.js";
import { Worker, type JobOutcome } from "./worker.js";

export type Settlement = "advanced" | "halted" | "retired";

/**
 * Admission, index derivation, draining and reset shared by both engines.
 *
 * Subclasses decide how a due job gets started: from the admission call itself or from a tick.
 */
export abstract class Sequencer extends EventEmitter {
  protected readonly config: SequencerConfig;
  protected readonly logger: Logger;
  protected readonly state: SequenceState;
  private halted: JobFailedError | null = null;

  protected constructor(config: SequencerConfig) {
    super();
    this.config = config;
    this.logger = config.logger;
    this.state = new SequenceState(config.initialIndex);
  }

  get initialIndex() {
    return this.state.initialIndex;
  }

  get currentIndex() {
    return this.state.currentIndex;
  }

  get generation() {
    return this.state.generation;
  }

  get executingIndex() {
    return this.state.executingIndex;
  }

  get pendingIndexes() {
    return this.state.pendingIndexes;
  }

  /** The failure the sequence is stuck on under the "halt" policy, if any. */
  get haltedOn(): JobFailedError | null {
    return this.halted;
  }

  hasPendingJobs(): boolean {
    return this.state.hasPendingJobs();
  }

  getNextIndex(): number {
    return this.state.nextIndex();
  }

  /**
   * Clears pending jobs and rewinds the cursor to the initial index.
   *
   * A job already running keeps running; its settlement no longer touches the sequence.
   */
  reset(): void {
    this.state.reset();
    this.halted = null;
    this.logger.debug({ generation: this.state.generation }, "sequence reset");
    this.emitEvent("reset", this.state.generation);
  }

  /** Waits for every pending and running job to settle, then resets. */
  async waitAndReset(): Promise<void> {
    try {
      await this.drain();
    } finally {
      this.reset();
    }
  }

  /** True once the instance accepts no more work. */
  protected isRetired(): boolean {
    return false;
  }

  protected admit(job: Job): void {
    if (this.isRetired()) {
      throw new DisposedError();
    }
    this.state.admit(job);
    // resubmitting the index the sequence halted on resumes it
    if (this.halted?.index === job.index) this.halted = null;
    this.logger.debug({ index: job.index, cursor: this.state.currentIndex }, "job admitted");
    this.emitEvent("enqueue", job);
  }

  protected buildJob(fn: JobFn, index?: number): Job {
    return { index: index ?? this.getNextIndex(), fn };
  }

  /** Occupies the executing slot for `job` and returns the generation it runs under. */
  protected start(job: Job): number {
    const generation = this.state.begin(job.index);
    this.logger.debug({ index: job.index, generation }, "job started");
    this.emitEvent("start", job);
    return generation;
  }

  protected spawn(job: Job): Worker {
    return new Worker(job, (outcome) => {
      if (outcome.success) {
        this.emitEvent("success", job);
        return;
      }
      this.logger.warn(
        { index: job.index, err: describeError(outcome.error), policy: this.config.onJobError },
        "job failed",
      );
      this.emitEvent("failed", job, outcome.error);
    });
  }

  /** Applies the bookkeeping of a settled job unless a reset or dispose retired it meanwhile. */
  protected settle(job: Job, generation: number, outcome: JobOutcome): Settlement {
    if (!this.state.isCurrent(generation) || this.isRetired()) {
      this.logger.debug({ index: job.index, generation }, "stale job retired");
      return "retired";
    }

    const advance = outcome.success || this.config.onJobError === "continue";
    if (outcome.success) {
      this.halted = null;
    } else if (!advance) {
      this.halted = new JobFailedError(job.index, outcome.error);
    }

    this.state.finish(generation, advance);
    if (!advance) return "halted";

    this.emitEvent("advance", this.state.currentIndex);
    return "advanced";
  }

  /**
   * Resolves once nothing is pending or executing, or as soon as `stopWhen` holds. Rejects with
   * the recorded failure when the "halt" policy stopped the sequence.
   */
  protected async drain(stopWhen: () => boolean = () => false): Promise<void> {
    while (this.hasPendingJobs() && !stopWhen()) {
      if (this.halted) throw this.halted;
      if (this.state.executingIndex !== null) {
        await this.state.settled();
      } else {
        await this.config.clock.sleep(this.config.drainPollMs);
      }
    }
    if (this.halted) throw this.halted;
  }

  protected emitEvent<E extends keyof SequencerEvents>(event: E, ...args: SequencerEvents[E]) {
    return this.emit(event, ...args);
  }
}
