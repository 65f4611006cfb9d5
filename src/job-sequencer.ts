import { resolveSequencerConfig } from "./config.js";
import { Sequencer } from "./sequencer.js";
import type { Job, JobFn, SequencerOptions } from "./types.js";

export interface AdmittedJob extends Job {
  /** The run this admission triggered; see {@link JobSequencer.addJob}. */
  done: Promise<void>;
}

/**
 * Runs jobs in index order, one at a time, driven by the admissions themselves: whoever adds the
 * due job starts a run that keeps taking the next due job until the buffer has none.
 *
 * Indices must form a gap-free sequence starting at `initialIndex`, otherwise the sequence waits
 * forever at the first missing index.
 *
 * Job failures default to the "halt" policy: the run rejects with a `JobFailedError` and the cursor
 * stays on the failed index until that index is submitted again or the sequencer is reset.
 */
export class JobSequencer extends Sequencer {
  constructor(options: SequencerOptions = {}) {
    super(resolveSequencerConfig(options, "halt"));
  }

  /**
   * Admits `job` and starts a run if it is due.
   *
   * Admission errors are thrown synchronously. The returned promise settles when the run this call
   * started goes idle; it resolves at once when the job is not due yet, since an earlier admission's
   * run will pick it up.
   */
  addJob(job: Job): Promise<void> {
    this.admit(job);
    return this.run();
  }

  /**
   * Builds a job for `fn` and admits it. Without an explicit index the next free one is derived;
   * callers deriving concurrently may race to the same index and get a `DuplicateIndexError`.
   */
  createAndAdd(fn: JobFn, index?: number): AdmittedJob {
    const job = this.buildJob(fn, index);
    return { ...job, done: this.addJob(job) };
  }

  private async run(): Promise<void> {
    for (;;) {
      const job = this.state.takeDue();
      if (!job) return;

      const generation = this.start(job);
      const outcome = await this.spawn(job).run();
      await this.config.clock.sleep(this.config.delayMs);

      const settlement = this.settle(job, generation, outcome);
      if (settlement === "retired") return;
      if (settlement === "halted" && this.haltedOn) throw this.haltedOn;
    }
  }
}
