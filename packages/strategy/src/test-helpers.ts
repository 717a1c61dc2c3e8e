import type { Candle } from "./types/candle.js";
import type { StrategyInput } from "./types/strategy.js";

export const T0 = Date.UTC(2024, 0, 1);

export function makeCandles(closeSeries: readonly number[], volumeSeries?: readonly number[], intervalMs = 300_000): Candle[] {
  return closeSeries.map((c, i) => ({
    t: T0 + i * intervalMs,
    o: c,
    h: c,
    l: c,
    c,
    v: volumeSeries?.[i] ?? 100,
  }));
}

export function makeInput(overrides: Partial<StrategyInput> = {}): StrategyInput {
  return {
    symbol: "BTC_USDT",
    price: 0,
    balance: 1000,
    candles: [],
    now: T0,
    ...overrides,
  };
}

/** 15 closes whose RSI(14) is exactly 25: three +1 changes, nine −1, two flat. */
export const RSI_25_CLOSES = [100, 101, 102, 103, 102, 101, 100, 99, 98, 97, 96, 95, 94, 94, 94];

/** Mirror of RSI_25_CLOSES: RSI(14) is 75. */
export const RSI_75_CLOSES = [100, 99, 98, 97, 98, 99, 100, 101, 102, 103, 104, 105, 106, 106, 106];
