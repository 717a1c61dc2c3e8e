import { ema } from "../indicators/ema.js";
import { rsi } from "../indicators/rsi.js";
import { closes, volumes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";
import { rsiConfidence, rsiVote } from "./rsi.js";

const DEFAULT_PARAMS = {
  rsiPeriod: { value: 14, min: 2, max: 50, step: 1 },
  oversold: { value: 30, min: 5, max: 50, step: 1 },
  overbought: { value: 70, min: 50, max: 95, step: 1 },
  volumeEmaPeriod: { value: 20, min: 2, max: 100, step: 1, description: "Volume EMA lookback" },
  volumeMultiplier: { value: 1.5, min: 1, max: 5, step: 0.1, description: "Last volume must exceed EMA × this" },
  ...SIZING_PARAMS,
} satisfies Record<string, StrategyParam>;

/** RSI entries taken only on bars whose volume clears `EMA(volume) × multiplier`. */
export function createVolumeFilterStrategy(overrides?: ParamOverrides): Strategy {
  const name = "VolumeFilter";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "VolumeFilter",
    name,
    params: p.params,
    candles: { interval: "5m", bars: 100 },

    evaluate(input: StrategyInput): Signal {
      const series = closes(input.candles);
      const vols = volumes(input.candles);
      if (series.length === 0) return holdSignal(input.symbol, name, "No market data available", input.now);

      const price = resolvePrice(input.price, series);
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const volumeEma = ema(vols, p.get("volumeEmaPeriod"));
      const lastIdx = vols.length - 1;
      const currentVolume = vols[lastIdx];
      const currentRsi = rsi(series, p.get("rsiPeriod"))[lastIdx];
      if (!Number.isFinite(volumeEma[lastIdx]) || !Number.isFinite(currentRsi)) {
        return holdSignal(input.symbol, name, "Insufficient candle data", input.now);
      }

      const threshold = volumeEma[lastIdx] * p.get("volumeMultiplier");
      if (currentVolume <= threshold) {
        return holdSignal(input.symbol, name, `Low volume (${currentVolume.toFixed(2)} <= ${threshold.toFixed(2)})`, input.now);
      }

      const oversold = p.get("oversold");
      const overbought = p.get("overbought");
      const vote = rsiVote(currentRsi, oversold, overbought);
      if (!vote) {
        return holdSignal(input.symbol, name, `High volume but RSI neutral (${currentRsi.toFixed(2)})`, input.now);
      }

      return entrySignal({
        symbol: input.symbol,
        side: vote,
        price,
        quantity: (input.balance * p.get("positionSize")) / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence: Math.min(1, rsiConfidence(currentRsi, vote, oversold, overbought) + 0.1),
        reason: `Volume filter: ${currentVolume.toFixed(2)} > ${threshold.toFixed(2)}, RSI ${currentRsi.toFixed(2)}`,
        timestamp: input.now,
      });
    },
  };
}
