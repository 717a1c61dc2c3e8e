import { rsi } from "../indicators/rsi.js";
import { closes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";

const DEFAULT_PARAMS = {
  rsiPeriod: { value: 14, min: 2, max: 50, step: 1, description: "RSI lookback" },
  oversold: { value: 30, min: 5, max: 50, step: 1, description: "Buy below this RSI" },
  overbought: { value: 70, min: 50, max: 95, step: 1, description: "Sell above this RSI" },
  ...SIZING_PARAMS,
} satisfies Record<string, StrategyParam>;

export type RsiVote = "BUY" | "SELL" | null;

export function rsiVote(value: number, oversold: number, overbought: number): RsiVote {
  if (!Number.isFinite(value)) return null;
  if (value < oversold) return "BUY";
  if (value > overbought) return "SELL";
  return null;
}

/** 0.6 at the threshold, rising linearly to 1.0 at the RSI extreme. */
export function rsiConfidence(value: number, vote: "BUY" | "SELL", oversold: number, overbought: number): number {
  const depth = vote === "BUY"
    ? (oversold - value) / oversold
    : (value - overbought) / (100 - overbought);
  return 0.6 + 0.4 * Math.max(0, Math.min(1, depth));
}

/**
 * Single-timeframe RSI mean reversion.
 *
 * BUY below `oversold`, SELL above `overbought`, with stop and target
 * a fixed percentage from the entry price.
 */
export function createRsiStrategy(overrides?: ParamOverrides): Strategy {
  const name = "RSI";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "RSI",
    name,
    params: p.params,
    candles: { interval: "5m", bars: 100 },

    evaluate(input: StrategyInput): Signal {
      const series = closes(input.candles);
      const price = resolvePrice(input.price, series);
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const values = rsi(series, p.get("rsiPeriod"));
      const current = values[values.length - 1];
      if (current === undefined || !Number.isFinite(current)) {
        return holdSignal(input.symbol, name, "Insufficient candle data", input.now);
      }

      const oversold = p.get("oversold");
      const overbought = p.get("overbought");
      const vote = rsiVote(current, oversold, overbought);
      if (!vote) return holdSignal(input.symbol, name, `RSI neutral (${current.toFixed(2)})`, input.now);

      return entrySignal({
        symbol: input.symbol,
        side: vote,
        price,
        quantity: (input.balance * p.get("positionSize")) / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence: rsiConfidence(current, vote, oversold, overbought),
        reason: vote === "BUY" ? `RSI oversold (${current.toFixed(2)})` : `RSI overbought (${current.toFixed(2)})`,
        timestamp: input.now,
      });
    },
  };
}
