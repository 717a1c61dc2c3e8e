import { z } from "zod";

export interface Candle {
  t: number; // open time, ms
  o: number;
  h: number;
  l: number;
  c: number;
  v: number; // base volume
}

export const CandleSchema = z.object({
  t: z.number(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number(),
});

export const CandleInterval = ["1m", "5m", "15m", "30m", "1h", "4h", "8h", "12h", "1d"] as const;

export type CandleInterval = (typeof CandleInterval)[number];

const INTERVAL_MS: Record<CandleInterval, number> = {
  "1m": 60_000,
  "5m": 300_000,
  "15m": 900_000,
  "30m": 1_800_000,
  "1h": 3_600_000,
  "4h": 14_400_000,
  "8h": 28_800_000,
  "12h": 43_200_000,
  "1d": 86_400_000,
};

export function intervalToMs(interval: CandleInterval): number {
  return INTERVAL_MS[interval];
}

export function closes(candles: readonly Candle[]): number[] {
  return candles.map((c) => c.c);
}

export function volumes(candles: readonly Candle[]): number[] {
  return candles.map((c) => c.v);
}
