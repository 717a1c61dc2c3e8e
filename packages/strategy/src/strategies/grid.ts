import { sma } from "../indicators/sma.js";
import { closes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";

const DEFAULT_PARAMS = {
  levels: { value: 10, min: 2, max: 50, step: 1, description: "Grid lines around the anchor" },
  spacingPct: { value: 1, min: 0.1, max: 10, step: 0.1, description: "Gap between lines, percent of anchor" },
  anchorPeriod: { value: 20, min: 2, max: 200, step: 1, description: "SMA period of the grid anchor" },
  ...SIZING_PARAMS,
  positionSize: { ...SIZING_PARAMS.positionSize, value: 0.1 },
} satisfies Record<string, StrategyParam>;

/** Grid lines `anchor × (1 + (i − ⌊n/2⌋) × spacing)` for i in [0, n). */
export function gridLevels(anchor: number, levels: number, spacingPct: number): number[] {
  const half = Math.floor(levels / 2);
  return Array.from({ length: levels }, (_, i) => anchor * (1 + ((i - half) * spacingPct) / 100));
}

/** Grid around a moving-average anchor: buy below the nearest line, sell above it. */
export function createGridStrategy(overrides?: ParamOverrides): Strategy {
  const name = "Grid";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "Grid",
    name,
    params: p.params,
    candles: { interval: "5m", bars: 100 },

    evaluate(input: StrategyInput): Signal {
      const series = closes(input.candles);
      const price = resolvePrice(input.price, series);
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const anchor = sma(series, p.get("anchorPeriod"))[series.length - 1];
      if (anchor === undefined || !Number.isFinite(anchor)) {
        return holdSignal(input.symbol, name, "Insufficient candle data", input.now);
      }

      const lines = gridLevels(anchor, p.get("levels"), p.get("spacingPct"));
      const closest = lines.reduce((best, line) => (Math.abs(line - price) < Math.abs(best - price) ? line : best));

      if (price === closest) {
        return holdSignal(input.symbol, name, `At grid level ${closest.toFixed(2)}`, input.now);
      }

      const side = price < closest ? "BUY" : "SELL";
      return entrySignal({
        symbol: input.symbol,
        side,
        price,
        quantity: (input.balance * p.get("positionSize")) / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence: 0.6,
        reason: `Grid ${side.toLowerCase()} at ${price.toFixed(2)} (level ${closest.toFixed(2)})`,
        timestamp: input.now,
      });
    },
  };
}
