import type { JobFn } from "../types.js";
import { deferred } from "../utils.js";

export type Gate = {
  wait: JobFn;
  open: () => void;
};

/** A job body that stays pending until `open` is called. */
export function gate(): Gate {
  const signal = deferred();
  return { wait: () => signal.promise, open: signal.resolve };
}

export type ConcurrencyProbe = {
  job: (ms: number) => JobFn;
  readonly max: number;
};

export function concurrencyProbe(): ConcurrencyProbe {
  let running = 0;
  let max = 0;
  return {
    job: (ms) => async () => {
      running++;
      max = Math.max(max, running);
      await new Promise((resolve) => setTimeout(resolve, ms));
      running--;
    },
    get max() {
      return max;
    },
  };
}
