import { RSI } from "trading-signals";
import { streamValues } from "./stream-indicator.js";

/**
 * Relative Strength Index with Wilder's smoothing.
 * Same length as input; the first `period` values are NaN because
 * `period` price changes are needed for the first reading.
 */
export function rsi(values: readonly number[], period: number): number[] {
  if (values.length === 0) return [];
  if (period < 1) throw new Error("RSI period must be >= 1");
  if (values.length <= period) return new Array<number>(values.length).fill(NaN);

  return streamValues(values, new RSI(period));
}
