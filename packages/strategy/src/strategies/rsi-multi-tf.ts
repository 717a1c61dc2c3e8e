import { rsi } from "../indicators/rsi.js";
import { lastFinite } from "../indicators/stream-indicator.js";
import { closes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";
import { rsiVote } from "./rsi.js";

const DEFAULT_PARAMS = {
  rsiPeriod: { value: 14, min: 2, max: 50, step: 1 },
  oversold: { value: 30, min: 5, max: 50, step: 1 },
  overbought: { value: 70, min: 50, max: 95, step: 1 },
  requiredVotes: { value: 2, min: 1, max: 2, step: 1, description: "Timeframes that must agree" },
  ...SIZING_PARAMS,
} satisfies Record<string, StrategyParam>;

/** RSI on the base (5m) and confirmation (1h) timeframes; each oversold/overbought reading is one vote. */
export function createRsiMultiTfStrategy(overrides?: ParamOverrides): Strategy {
  const name = "RSIMultiTF";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "RSIMultiTF",
    name,
    params: p.params,
    candles: { interval: "5m", higherInterval: "1h", bars: 100 },

    evaluate(input: StrategyInput): Signal {
      const base = closes(input.candles);
      const higher = closes(input.higherTimeframe ?? []);
      if (base.length === 0 || higher.length === 0) {
        return holdSignal(input.symbol, name, "No market data available", input.now);
      }

      const price = resolvePrice(input.price, base);
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const period = p.get("rsiPeriod");
      const rsiBase = lastFinite(rsi(base, period));
      const rsiHigher = lastFinite(rsi(higher, period));
      if (!Number.isFinite(rsiBase) || !Number.isFinite(rsiHigher)) {
        return holdSignal(input.symbol, name, "Insufficient candle data", input.now);
      }

      const votes = [rsiBase, rsiHigher].map((v) => rsiVote(v, p.get("oversold"), p.get("overbought")));
      const buys = votes.filter((v) => v === "BUY").length;
      const sells = votes.filter((v) => v === "SELL").length;
      const required = p.get("requiredVotes");
      const detail = `base:${rsiBase.toFixed(2)}, higher:${rsiHigher.toFixed(2)}`;

      const side = buys >= required ? "BUY" : sells >= required ? "SELL" : null;
      if (!side) {
        return holdSignal(input.symbol, name, `Multi-TF RSI: mixed signals - ${buys} buy, ${sells} sell (${detail})`, input.now);
      }

      const count = side === "BUY" ? buys : sells;
      return entrySignal({
        symbol: input.symbol,
        side,
        price,
        quantity: (input.balance * p.get("positionSize")) / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence: 0.4 + 0.2 * count,
        reason: `Multi-TF RSI: ${count}/2 ${side.toLowerCase()} signals (${detail})`,
        timestamp: input.now,
      });
    },
  };
}
