import type { DailyCounters } from "../types/trading.js";

export function utcDay(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

/** Trade count and realized PnL for the current UTC day. Rolls over lazily on access. */
export class DailyLedger {
  private counters: DailyCounters;

  constructor(private readonly now: () => number = Date.now) {
    this.counters = { day: utcDay(now()), trades: 0, realizedPnl: 0 };
  }

  private current(): DailyCounters {
    const day = utcDay(this.now());
    if (day !== this.counters.day) {
      this.counters = { day, trades: 0, realizedPnl: 0 };
    }
    return this.counters;
  }

  recordTrade(): void {
    this.current().trades++;
  }

  recordPnl(pnl: number): void {
    if (!Number.isFinite(pnl)) return;
    this.current().realizedPnl += pnl;
  }

  /** Today's realized loss as a positive number; zero when flat or up. */
  dailyLossUsd(): number {
    return Math.max(0, -this.current().realizedPnl);
  }

  snapshot(): DailyCounters {
    return { ...this.current() };
  }
}
