import type { Candle, CandleInterval } from "./candle.js";
import type { Signal } from "./signal.js";

export const StrategyKind = ["RSI", "RSIMultiTF", "VolumeFilter", "Advanced", "Grid", "DCA", "Breakout"] as const;

export type StrategyKind = (typeof StrategyKind)[number];

export interface StrategyParam {
  value: number;
  min: number;
  max: number;
  step: number;
  description?: string;
}

export interface StrategyInput {
  symbol: string;
  /** Latest ticker price. Non-positive means unknown: strategies fall back to the last close. */
  price: number;
  /** Quote balance available for sizing. */
  balance: number;
  /** Base timeframe series, oldest first. */
  candles: readonly Candle[];
  /** Confirmation timeframe series, only for strategies that declare one. */
  higherTimeframe?: readonly Candle[];
  now: number;
}

export interface CandleRequirement {
  interval: CandleInterval;
  higherInterval?: CandleInterval;
  bars: number;
}

/**
 * A pure strategy. `evaluate` must not keep state between calls:
 * identical inputs always yield identical signals.
 */
export interface Strategy {
  kind: StrategyKind;
  name: string;
  params: Record<string, StrategyParam>;
  candles: CandleRequirement;
  evaluate(input: StrategyInput): Signal;
}
