import { describe, expect, it } from "vitest";

import { concurrencyProbe, gate } from "./__tests__/helpers.js";
import { DuplicateIndexError, JobFailedError } from "./errors.js";
import { JobSequencer } from "./job-sequencer.js";
import { makeNoopLogger } from "./logger.js";
import type { SequencerOptions } from "./types.js";

function createSequencer(options: SequencerOptions = {}) {
  return new JobSequencer({ delayMs: 0, drainPollMs: 1, logger: makeNoopLogger(), ...options });
}

describe("JobSequencer", () => {
  it("executes out-of-order submissions in index order", async () => {
    const sequencer = createSequencer();
    const log: number[] = [];
    const record = (index: number) => async () => {
      log.push(index);
    };

    const runs = [2, 0, 1, 3].map((index) => sequencer.addJob({ index, fn: record(index) }));
    await Promise.all(runs);

    expect(log).toEqual([0, 1, 2, 3]);
    expect(sequencer.currentIndex).toBe(4);
    expect(sequencer.hasPendingJobs()).toBe(false);
  });

  it("never runs two jobs at once", async () => {
    const sequencer = createSequencer({ delayMs: 1 });
    const probe = concurrencyProbe();

    const runs = [3, 1, 4, 0, 2].map((index) => sequencer.addJob({ index, fn: probe.job(5) }));
    await Promise.all(runs);

    expect(probe.max).toBe(1);
  });

  it("starts deriving indices at the initial index and rewinds to it on reset", async () => {
    const sequencer = createSequencer({ initialIndex: 10 });
    expect(sequencer.initialIndex).toBe(10);
    expect(sequencer.getNextIndex()).toBe(10);

    await sequencer.addJob({ index: 10, fn: async () => {} });
    expect(sequencer.currentIndex).toBe(11);

    sequencer.reset();
    expect(sequencer.currentIndex).toBe(sequencer.initialIndex);
  });

  it("derives the next index from the highest known index", async () => {
    const sequencer = createSequencer();
    const first = gate();

    const pending = sequencer.addJob({ index: 5, fn: async () => {} });
    const running = sequencer.addJob({ index: 0, fn: first.wait });

    expect(sequencer.executingIndex).toBe(0);
    expect(sequencer.pendingIndexes).toEqual([5]);
    expect(sequencer.getNextIndex()).toBe(6);

    first.open();
    await Promise.all([pending, running]);
  });

  it("derives indices in createAndAdd", async () => {
    const sequencer = createSequencer();
    const log: number[] = [];

    const a = sequencer.createAndAdd(async () => {
      log.push(0);
    });
    const b = sequencer.createAndAdd(async () => {
      log.push(1);
    });
    await Promise.all([a.done, b.done]);

    expect([a.index, b.index]).toEqual([0, 1]);
    expect(log).toEqual([0, 1]);
  });

  it("rejects duplicate indices and leaves the buffer unchanged", async () => {
    const sequencer = createSequencer();
    const first = gate();
    const running = sequencer.addJob({ index: 0, fn: first.wait });
    const pending = sequencer.addJob({ index: 1, fn: async () => {} });

    expect(() => sequencer.addJob({ index: 1, fn: async () => {} })).toThrow(DuplicateIndexError);
    expect(() => sequencer.addJob({ index: 0, fn: async () => {} })).toThrow(DuplicateIndexError);
    expect(sequencer.pendingIndexes).toEqual([1]);
    expect(sequencer.executingIndex).toBe(0);

    first.open();
    await Promise.all([running, pending]);
  });

  it("emits lifecycle events in order", async () => {
    const sequencer = createSequencer();
    const events: string[] = [];
    sequencer.on("enqueue", (job) => events.push(`enqueue:${job.index}`));
    sequencer.on("start", (job) => events.push(`start:${job.index}`));
    sequencer.on("success", (job) => events.push(`success:${job.index}`));
    sequencer.on("advance", (index) => events.push(`advance:${index}`));

    await sequencer.addJob({ index: 0, fn: async () => {} });

    expect(events).toEqual(["enqueue:0", "start:0", "success:0", "advance:1"]);
  });

  describe("reset", () => {
    it("detaches the running job and accepts its index again", async () => {
      const sequencer = createSequencer();
      const old = gate();
      const log: string[] = [];

      const oldRun = sequencer.addJob({
        index: 0,
        fn: async () => {
          await old.wait();
          log.push("old");
        },
      });
      const discarded = sequencer.addJob({
        index: 1,
        fn: async () => {
          log.push("discarded");
        },
      });

      sequencer.reset();

      expect(sequencer.hasPendingJobs()).toBe(false);
      expect(sequencer.currentIndex).toBe(0);
      expect(sequencer.generation).toBe(1);

      const newRun = sequencer.addJob({
        index: 0,
        fn: async () => {
          log.push("new");
        },
      });
      old.open();
      await Promise.all([oldRun, discarded, newRun]);

      expect(log).toEqual(["new", "old"]);
      expect(sequencer.currentIndex).toBe(1);
      expect(sequencer.hasPendingJobs()).toBe(false);
    });

    it("waitAndReset returns once everything settled", async () => {
      const sequencer = createSequencer({ delayMs: 1 });
      const log: number[] = [];
      const runs = [1, 2, 0].map((index) =>
        sequencer.addJob({
          index,
          fn: async () => {
            await new Promise((resolve) => setTimeout(resolve, 5));
            log.push(index);
          },
        }),
      );

      await sequencer.waitAndReset();

      expect(log).toEqual([0, 1, 2]);
      expect(sequencer.hasPendingJobs()).toBe(false);
      expect(sequencer.currentIndex).toBe(0);
      await Promise.all(runs);
    });
  });

  describe("job failures", () => {
    it("halts on the failed index by default and surfaces the failure", async () => {
      const sequencer = createSequencer();
      const log: string[] = [];
      const boom = new Error("boom");

      const failing = sequencer.addJob({
        index: 0,
        fn: async () => {
          throw boom;
        },
      });
      const waiting = sequencer.addJob({
        index: 1,
        fn: async () => {
          log.push("1");
        },
      });

      await expect(failing).rejects.toBeInstanceOf(JobFailedError);
      await waiting;

      expect(sequencer.haltedOn?.index).toBe(0);
      expect(sequencer.haltedOn?.cause).toBe(boom);
      expect(sequencer.currentIndex).toBe(0);
      expect(sequencer.pendingIndexes).toEqual([1]);
      expect(log).toEqual([]);
    });

    it("resumes when the failed index is submitted again", async () => {
      const sequencer = createSequencer();
      const log: string[] = [];

      const failing = sequencer.addJob({
        index: 0,
        fn: async () => {
          throw new Error("boom");
        },
      });
      const waiting = sequencer.addJob({
        index: 1,
        fn: async () => {
          log.push("1");
        },
      });
      await expect(failing).rejects.toThrow("Job 0 failed: boom");
      await waiting;

      await sequencer.addJob({
        index: 0,
        fn: async () => {
          log.push("0 again");
        },
      });

      expect(log).toEqual(["0 again", "1"]);
      expect(sequencer.haltedOn).toBeNull();
      expect(sequencer.currentIndex).toBe(2);
    });

    it("drains the resumed sequence once the failed index is resubmitted", async () => {
      const sequencer = createSequencer();
      const log: string[] = [];
      const failing = sequencer.addJob({
        index: 0,
        fn: async () => {
          throw new Error("boom");
        },
      });
      const waiting = sequencer.addJob({
        index: 1,
        fn: async () => {
          log.push("1");
        },
      });
      await expect(failing).rejects.toBeInstanceOf(JobFailedError);
      await waiting;

      const retry = gate();
      const resumed = sequencer.addJob({
        index: 0,
        fn: async () => {
          await retry.wait();
          log.push("0 again");
        },
      });
      expect(sequencer.haltedOn).toBeNull();

      const draining = sequencer.waitAndReset();
      retry.open();

      await expect(draining).resolves.toBeUndefined();
      await resumed;
      expect(log).toEqual(["0 again", "1"]);
      expect(sequencer.hasPendingJobs()).toBe(false);
    });

    it("waitAndReset rejects with the halting failure and still resets", async () => {
      const sequencer = createSequencer();
      const failing = sequencer.addJob({
        index: 0,
        fn: async () => {
          throw new Error("boom");
        },
      });
      const waiting = sequencer.addJob({ index: 1, fn: async () => {} });
      await expect(failing).rejects.toBeInstanceOf(JobFailedError);
      await waiting;

      await expect(sequencer.waitAndReset()).rejects.toBeInstanceOf(JobFailedError);

      expect(sequencer.haltedOn).toBeNull();
      expect(sequencer.hasPendingJobs()).toBe(false);
    });

    it("swallows the failure and advances under the continue policy", async () => {
      const sequencer = createSequencer({ onJobError: "continue" });
      const log: number[] = [];
      const failed: number[] = [];
      sequencer.on("failed", (job) => failed.push(job.index));

      const runs = [0, 1, 2].map((index) =>
        sequencer.addJob({
          index,
          fn: async () => {
            log.push(index);
            if (index === 1) throw new Error("boom");
          },
        }),
      );
      await Promise.all(runs);

      expect(log).toEqual([0, 1, 2]);
      expect(failed).toEqual([1]);
      expect(sequencer.currentIndex).toBe(3);
      expect(sequencer.haltedOn).toBeNull();
    });
  });
});
