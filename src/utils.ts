import type { CancelTrigger, Clock } from "./types.js";

export function now() {
  return Date.now();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function every(ms: number, tick: () => void): CancelTrigger {
  const timer = setInterval(tick, ms);
  return () => clearInterval(timer);
}

export const systemClock: Clock = { sleep, every };

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

export function randomInt(maxExclusive: number) {
  return Math.floor(Math.random() * maxExclusive);
}

// Fisher-Yates, returns a new array
export function shuffle<T>(items: readonly T[]): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
