import { setTimeout as delay } from "node:timers/promises";

/** Resolves true after `ms`, or false as soon as `signal` aborts. Never rejects on abort. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<boolean>;

export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
};
