import { EMA, MACD } from "trading-signals";

export interface MacdResult {
  macd: number[];
  signal: number[];
  histogram: number[];
}

/**
 * MACD line (fast EMA − slow EMA), its signal EMA and the histogram (via trading-signals).
 * All arrays match the input length. Entries are NaN until `slow` values are in;
 * the signal EMA is seeded with the first MACD value.
 */
export function macd(values: readonly number[], fast = 12, slow = 26, signalPeriod = 9): MacdResult {
  const len = values.length;
  if (fast >= slow) throw new Error("MACD fast period must be shorter than slow period");

  const line = new Array<number>(len).fill(NaN);
  const signal = new Array<number>(len).fill(NaN);
  const histogram = new Array<number>(len).fill(NaN);

  const indicator = new MACD({ indicator: EMA, shortInterval: fast, longInterval: slow, signalInterval: signalPeriod });
  for (let i = 0; i < len; i++) {
    const result = indicator.add(values[i]);
    if (result) {
      line[i] = Number(result.macd);
      signal[i] = Number(result.signal);
      histogram[i] = Number(result.histogram);
    }
  }

  return { macd: line, signal, histogram };
}
