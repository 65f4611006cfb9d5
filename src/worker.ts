import type { Job } from "./types.js";

export type JobOutcome = { success: true } | { success: false; error: unknown };

export class Worker {
  private job: Job;
  private onComplete: (outcome: JobOutcome) => void;

  constructor(job: Job, onComplete: (outcome: JobOutcome) => void = () => {}) {
    this.job = job;
    this.onComplete = onComplete;
  }

  /** Runs the job body once; resolves with its outcome and never rejects. */
  async run(): Promise<JobOutcome> {
    let outcome: JobOutcome;
    try {
      await this.job.fn();
      outcome = { success: true };
    } catch (error) {
      outcome = { success: false, error };
    }
    this.onComplete(outcome);
    return outcome;
  }
}
