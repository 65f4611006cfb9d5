import { DuplicateIndexError, InvalidIndexError, ReentrantExecutionError } from "./errors.js";
import type { Job } from "./types.js";
import { deferred, type Deferred } from "./utils.js";

/**
 * Pending buffer, cursor, executing slot and generation of one sequencer.
 *
 * Every method runs to completion without awaiting, so each check-and-update is atomic with
 * respect to other admissions, ticks and continuations on the event loop.
 */
export class SequenceState {
  private readonly pending = new Map<number, Job>();
  private executing: number | null = null;
  private cursor: number;
  private epoch = 0;
  private inFlight: Deferred | null = null;

  constructor(readonly initialIndex: number) {
    this.cursor = initialIndex;
  }

  get currentIndex() {
    return this.cursor;
  }

  get generation() {
    return this.epoch;
  }

  get executingIndex() {
    return this.executing;
  }

  get pendingIndexes(): number[] {
    return [...this.pending.keys()].sort((a, b) => a - b);
  }

  hasPendingJobs(): boolean {
    return this.pending.size > 0 || this.executing !== null;
  }

  admit(job: Job): void {
    if (!Number.isInteger(job.index)) {
      throw new InvalidIndexError(job.index);
    }
    if (this.pending.has(job.index) || this.executing === job.index) {
      throw new DuplicateIndexError(job.index);
    }
    this.pending.set(job.index, job);
  }

  takeDue(): Job | undefined {
    const job = this.pending.get(this.cursor);
    if (job) this.pending.delete(this.cursor);
    return job;
  }

  /** Occupies the executing slot and returns the generation the job runs under. */
  begin(index: number): number {
    if (this.executing !== null) {
      throw new ReentrantExecutionError(index);
    }
    this.executing = index;
    this.inFlight = deferred();
    return this.epoch;
  }

  isCurrent(generation: number): boolean {
    return generation === this.epoch;
  }

  /**
   * Settles the job started under `generation`. A stale generation means a reset happened while
   * the job ran; nothing is touched then. Returns whether the bookkeeping was applied.
   */
  finish(generation: number, advance: boolean): boolean {
    if (!this.isCurrent(generation)) return false;
    if (advance) this.cursor++;
    this.executing = null;
    this.releaseInFlight();
    return true;
  }

  /** Highest known index plus one, by numeric maximum rather than insertion order. */
  nextIndex(): number {
    if (!this.hasPendingJobs()) return this.initialIndex;
    let highest = this.executing ?? Number.NEGATIVE_INFINITY;
    for (const index of this.pending.keys()) {
      if (index > highest) highest = index;
    }
    return highest + 1;
  }

  /** Resolves once the in-flight job settles, or at once when nothing runs. */
  settled(): Promise<void> {
    return this.inFlight?.promise ?? Promise.resolve();
  }

  reset(): void {
    this.cursor = this.initialIndex;
    this.executing = null;
    this.pending.clear();
    this.epoch++;
    this.releaseInFlight();
  }

  /** Drops pending jobs and detaches the in-flight one without touching cursor or generation. */
  clear(): void {
    this.executing = null;
    this.pending.clear();
    this.releaseInFlight();
  }

  private releaseInFlight() {
    this.inFlight?.resolve();
    this.inFlight = null;
  }
}
