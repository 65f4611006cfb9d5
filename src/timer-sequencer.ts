import { resolveTimerSequencerConfig } from "./config.js";
import { describeError } from "./errors.js";
import { Sequencer } from "./sequencer.js";
import type { CancelTrigger, Job, JobFn, TimerSequencerOptions } from "./types.js";

/**
 * Tick-driven sequencer. A periodic trigger checks whether the job at the cursor has arrived and
 * nothing is running, and if so launches it; admissions never start work themselves.
 *
 * Job failures default to the "continue" policy: the failure is reported through the `failed`
 * event and the log, and the cursor moves on. Callers that need the outcome should record it from
 * inside the job body.
 */
export class TimerSequencer extends Sequencer {
  private cancelTrigger: CancelTrigger | null = null;
  private disposed = false;

  constructor(options: TimerSequencerOptions = {}) {
    const config = resolveTimerSequencerConfig(options, "continue");
    super(config);
    this.cancelTrigger = config.clock.every(config.tickMs, this.tick);
    this.logger.debug({ tickMs: config.tickMs }, "trigger started");
  }

  get isDisposed() {
    return this.disposed;
  }

  /** Admits `job`; the next tick at which it is due starts it. */
  addJob(job: Job): void {
    this.admit(job);
  }

  createAndAdd(fn: JobFn, index?: number): Job {
    const job = this.buildJob(fn, index);
    this.addJob(job);
    return job;
  }

  /**
   * Stops the trigger and drops all pending jobs. Permanent: later admissions throw
   * `DisposedError`. A job already running finishes on its own.
   */
  dispose(): void {
    if (this.disposed) return;

    this.disposed = true;
    this.cancelTrigger?.();
    this.cancelTrigger = null;
    this.state.clear();
    this.logger.debug("sequencer disposed");
    this.emitEvent("disposed");
  }

  /** Waits for every pending and running job to settle, then disposes. */
  async waitAndDispose(): Promise<void> {
    try {
      await this.drain(() => this.disposed);
    } finally {
      this.dispose();
    }
  }

  protected override isRetired(): boolean {
    return this.disposed;
  }

  private tick = () => {
    if (this.disposed || this.state.executingIndex !== null) return;

    const job = this.state.takeDue();
    if (!job) return;

    const generation = this.start(job);
    this.execute(job, generation).catch((err) => {
      this.logger.error({ index: job.index, err: describeError(err) }, "job settlement failed");
    });
  };

  private async execute(job: Job, generation: number): Promise<void> {
    const outcome = await this.spawn(job).run();
    await this.config.clock.sleep(this.config.delayMs);
    this.settle(job, generation, outcome);
  }
}
