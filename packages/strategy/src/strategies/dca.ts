import { closes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";

const DEFAULT_PARAMS = {
  amount: { value: 100, min: 1, max: 1_000_000, step: 1, description: "Quote amount bought each cycle" },
  stopLossPct: SIZING_PARAMS.stopLossPct,
  takeProfitPct: SIZING_PARAMS.takeProfitPct,
} satisfies Record<string, StrategyParam>;

/** Dollar-cost averaging: buy a fixed quote amount every cycle. */
export function createDcaStrategy(overrides?: ParamOverrides): Strategy {
  const name = "DCA";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "DCA",
    name,
    params: p.params,
    candles: { interval: "1h", bars: 2 },

    evaluate(input: StrategyInput): Signal {
      const price = resolvePrice(input.price, closes(input.candles));
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const amount = p.get("amount");
      if (input.balance < amount) {
        return holdSignal(input.symbol, name, `Insufficient balance for DCA ($${input.balance.toFixed(2)} < $${amount})`, input.now);
      }

      return entrySignal({
        symbol: input.symbol,
        side: "BUY",
        price,
        quantity: amount / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence: 1,
        reason: `DCA buy $${amount}`,
        timestamp: input.now,
      });
    },
  };
}
