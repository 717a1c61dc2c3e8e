import { SMA } from "trading-signals";
import { streamValues } from "./stream-indicator.js";

/** Simple Moving Average. Same length as input; the first `period - 1` values are NaN. */
export function sma(values: readonly number[], period: number): number[] {
  if (values.length === 0) return [];
  if (period < 1) throw new Error("SMA period must be >= 1");
  if (period > values.length) return new Array<number>(values.length).fill(NaN);

  return streamValues(values, new SMA(period));
}
