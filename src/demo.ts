import type { Logger } from "pino";
import { z } from "zod";

import { describeError } from "./errors.js";
import { JobSequencer } from "./job-sequencer.js";
import { makeLogger } from "./logger.js";
import { TimerSequencer } from "./timer-sequencer.js";
import type { JobFn } from "./types.js";
import { now, randomInt, shuffle, sleep } from "./utils.js";

export const DemoOptionsSchema = z.object({
  engine: z.enum(["self", "timer"]).default("timer"),
  jobs: z.number().int().positive().default(5),
  delayMs: z.number().int().nonnegative().default(10),
  tickMs: z.number().int().positive().default(5),
  // chunks arrive after a random wait up to this bound
  maxArrivalMs: z.number().int().nonnegative().default(30),
  maxWorkMs: z.number().int().nonnegative().default(100),
  // the chunk at this index throws instead of playing
  failIndex: z.number().int().nonnegative().optional(),
});

export type DemoOptions = z.input<typeof DemoOptionsSchema>;

/**
 * Simulates chunks arriving out of order (think audio segments off the network) and plays them
 * through a sequencer. Returns the indices in the order they were played.
 */
export async function runDemo(
  input: DemoOptions = {},
  logger: Logger = makeLogger({ component: "demo" }),
): Promise<number[]> {
  const options = DemoOptionsSchema.parse(input);
  const played: number[] = [];
  const startedAt = now();

  const chunk =
    (index: number): JobFn =>
    async () => {
      await sleep(randomInt(options.maxWorkMs + 1));
      if (index === options.failIndex) throw new Error(`chunk ${index} is corrupt`);
      played.push(index);
      logger.info({ index, elapsedMs: now() - startedAt }, "chunk played");
    };

  const arrivals = shuffle(Array.from({ length: options.jobs }, (_, i) => i));
  logger.info({ engine: options.engine, arrivals }, "demo started");

  if (options.engine === "self") {
    const sequencer = new JobSequencer({ delayMs: options.delayMs, logger });
    const runs: Promise<void>[] = [];
    for (const index of arrivals) {
      await sleep(randomInt(options.maxArrivalMs + 1));
      // waitAndReset rethrows the failure that stopped the run
      const run = sequencer.addJob({ index, fn: chunk(index) }).catch((err: unknown) => {
        logger.warn({ index, err: describeError(err) }, "run stopped");
      });
      runs.push(run);
    }
    await Promise.all(runs);
    await sequencer.waitAndReset();
  } else {
    const sequencer = new TimerSequencer({ delayMs: options.delayMs, tickMs: options.tickMs, logger });
    for (const index of arrivals) {
      await sleep(randomInt(options.maxArrivalMs + 1));
      sequencer.addJob({ index, fn: chunk(index) });
    }
    await sequencer.waitAndDispose();
  }

  logger.info({ played }, "demo completed");
  return played;
}
