import { closes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";
import { resolveBreakout } from "./resolve-breakout.js";

const DEFAULT_PARAMS = {
  lookback: { value: 20, min: 3, max: 200, step: 1, description: "Bars forming the range" },
  bufferPct: { value: 1, min: -5, max: 5, step: 0.1, description: "Distance beyond the range edge, percent" },
  ...SIZING_PARAMS,
} satisfies Record<string, StrategyParam>;

/**
 * Range breakout on closes. Levels are the high and low of the `lookback` closes before the latest,
 * pushed out by `bufferPct`. Direction goes through `resolveBreakout`, so a tie never trades.
 */
export function createBreakoutStrategy(overrides?: ParamOverrides): Strategy {
  const name = "Breakout";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "Breakout",
    name,
    params: p.params,
    candles: { interval: "15m", bars: 100 },

    evaluate(input: StrategyInput): Signal {
      const series = closes(input.candles);
      const lookback = p.get("lookback");
      if (series.length <= lookback) return holdSignal(input.symbol, name, "Insufficient candle data", input.now);

      const price = resolvePrice(input.price, series);
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const range = series.slice(series.length - 1 - lookback, series.length - 1);
      const buffer = p.get("bufferPct") / 100;
      const longLevel = Math.max(...range) * (1 + buffer);
      const shortLevel = Math.min(...range) * (1 - buffer);

      const { direction, longDistance, shortDistance } = resolveBreakout(price, longLevel, shortLevel);
      if (direction === "CONFLICT") {
        return holdSignal(input.symbol, name, `Breakout conflict: equal distance past both levels (${longDistance.toFixed(4)})`, input.now);
      }
      if (direction === "NONE") {
        return holdSignal(input.symbol, name, `Inside range [${shortLevel.toFixed(2)}, ${longLevel.toFixed(2)}]`, input.now);
      }

      const side = direction === "LONG" ? "BUY" : "SELL";
      const distance = direction === "LONG" ? longDistance : shortDistance;
      return entrySignal({
        symbol: input.symbol,
        side,
        price,
        quantity: (input.balance * p.get("positionSize")) / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence: 0.7,
        reason: `${direction === "LONG" ? "Bullish" : "Bearish"} breakout ${distance.toFixed(4)} past ${(direction === "LONG" ? longLevel : shortLevel).toFixed(2)}`,
        timestamp: input.now,
      });
    },
  };
}
