import { z } from "zod";
import { rsi } from "../indicators/rsi.js";
import { lastFinite } from "../indicators/stream-indicator.js";
import { holdSignal, type Signal } from "../types/signal.js";
import { CandleInterval } from "../types/candle.js";

const ThresholdPairSchema = z.object({
  short: z.number().min(0).max(100),
  long: z.number().min(0).max(100),
});

export const RsiFilterConfigSchema = z.object({
  enabled: z.boolean().default(false),
  /**
   * normal: both timeframes must be past their thresholds.
   * reduced: only the short timeframe is checked, for longs and shorts alike.
   */
  mode: z.enum(["normal", "reduced"]).default("normal"),
  period: z.number().int().min(2).default(14),
  /** Candles behind each reading, fetched apart from the strategy's own. */
  timeframes: z.object({
    short: z.enum(CandleInterval).default("5m"),
    long: z.enum(CandleInterval).default("1h"),
  }).default({}),
  bars: z.number().int().min(2).default(100),
  thresholds: z.object({
    long: ThresholdPairSchema.default({ short: 30, long: 50 }),
    short: ThresholdPairSchema.default({ short: 70, long: 50 }),
  }).default({}),
});

export type RsiFilterConfig = z.infer<typeof RsiFilterConfigSchema>;

export interface RsiFilterResult {
  valid: boolean;
  message: string;
}

/** Gate a trade direction on short/long timeframe RSI readings. */
export function checkRsiFilter(
  config: RsiFilterConfig,
  direction: "long" | "short",
  rsiShort: number,
  rsiLong: number,
): RsiFilterResult {
  if (!config.enabled) return { valid: true, message: "RSI filter disabled" };
  if (!Number.isFinite(rsiShort) || (config.mode === "normal" && !Number.isFinite(rsiLong))) {
    return { valid: false, message: "Unable to calculate RSI values" };
  }

  const t = config.thresholds[direction];
  const s = rsiShort.toFixed(2);
  const dir = direction.toUpperCase();

  if (config.mode === "reduced") {
    const valid = direction === "long" ? rsiShort < t.short : rsiShort > t.short;
    const op = direction === "long" ? "<" : ">";
    return { valid, message: `Reduced mode ${dir}: RSI short (${s}) ${op} ${t.short}` };
  }

  const l = rsiLong.toFixed(2);
  const valid = direction === "long"
    ? rsiShort < t.short && rsiLong < t.long
    : rsiShort > t.short && rsiLong > t.long;
  const op = direction === "long" ? "<" : ">";
  return { valid, message: `Normal mode ${dir}: RSI short (${s}) ${op} ${t.short} AND RSI long (${l}) ${op} ${t.long}` };
}

/**
 * Apply the filter to a directional signal. Blocked signals become HOLD
 * with the filter's message as the reason; HOLD passes through untouched.
 */
export function applyRsiFilter(
  signal: Signal,
  config: RsiFilterConfig,
  shortCloses: readonly number[],
  longCloses: readonly number[],
): Signal {
  if (signal.side === "HOLD" || !config.enabled) return signal;

  const direction = signal.side === "BUY" ? "long" : "short";
  const result = checkRsiFilter(
    config,
    direction,
    lastFinite(rsi(shortCloses, config.period)),
    lastFinite(rsi(longCloses, config.period)),
  );
  if (result.valid) return signal;
  return holdSignal(signal.symbol, signal.strategyName, `RSI filter blocked: ${result.message}`, signal.timestamp);
}
