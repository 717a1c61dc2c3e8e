import { BollingerBands } from "trading-signals";

export interface BollingerResult {
  upper: number[];
  middle: number[];
  lower: number[];
}

/**
 * Bollinger Bands (via trading-signals): SMA middle band ± `stdDev` population
 * standard deviations. Entries are NaN until the indicator reports its first band.
 */
export function bollinger(values: readonly number[], period = 20, stdDev = 2): BollingerResult {
  if (period < 1) throw new Error("Bollinger period must be >= 1");
  const len = values.length;
  const upper = new Array<number>(len).fill(NaN);
  const middle = new Array<number>(len).fill(NaN);
  const lower = new Array<number>(len).fill(NaN);

  const indicator = new BollingerBands(period, stdDev);
  for (let i = 0; i < len; i++) {
    const bands = indicator.add(values[i]);
    if (bands) {
      upper[i] = Number(bands.upper);
      middle[i] = Number(bands.middle);
      lower[i] = Number(bands.lower);
    }
  }

  return { upper, middle, lower };
}
