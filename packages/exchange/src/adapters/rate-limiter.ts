import { setTimeout as sleep } from "node:timers/promises";

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<unknown>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => sleep(ms, undefined, { signal }),
};

/**
 * Minimum gap between request starts. Each caller reserves the next free slot
 * synchronously, so concurrent callers queue up in call order.
 */
export class RateLimiter {
  private nextSlot = 0;
  private readonly minIntervalMs: number;
  private readonly clock: Clock;

  constructor(minIntervalMs: number, clock: Clock = systemClock) {
    this.minIntervalMs = minIntervalMs;
    this.clock = clock;
  }

  async acquire(): Promise<void> {
    const now = this.clock.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const wait = slot - now;
    if (wait > 0) await this.clock.sleep(wait);
  }
}
