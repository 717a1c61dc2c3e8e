import { bollinger } from "../indicators/bollinger.js";
import { ema } from "../indicators/ema.js";
import { macd } from "../indicators/macd.js";
import { rsi } from "../indicators/rsi.js";
import { closes, volumes } from "../types/candle.js";
import { entrySignal, holdSignal, type Signal } from "../types/signal.js";
import type { Strategy, StrategyInput, StrategyParam } from "../types/strategy.js";
import { resolveParams, resolvePrice, SIZING_PARAMS, type ParamOverrides } from "./params.js";
import { rsiVote } from "./rsi.js";

const DEFAULT_PARAMS = {
  rsiPeriod: { value: 14, min: 2, max: 50, step: 1 },
  oversold: { value: 30, min: 5, max: 50, step: 1 },
  overbought: { value: 70, min: 50, max: 95, step: 1 },
  emaPeriod: { value: 20, min: 5, max: 200, step: 1, description: "Trend EMA" },
  macdFast: { value: 12, min: 2, max: 50, step: 1 },
  macdSlow: { value: 26, min: 5, max: 100, step: 1 },
  macdSignal: { value: 9, min: 2, max: 50, step: 1 },
  bbPeriod: { value: 20, min: 5, max: 100, step: 1 },
  bbStdDev: { value: 2, min: 1, max: 4, step: 0.5 },
  volumeEmaPeriod: { value: 20, min: 2, max: 100, step: 1 },
  volumeMultiplier: { value: 1.5, min: 1, max: 5, step: 0.1 },
  ...SIZING_PARAMS,
} satisfies Record<string, StrategyParam>;

export interface AdvancedVotes {
  bullish: number;
  bearish: number;
}

/**
 * Majority vote among three indicators:
 * RSI oversold/overbought (no vote when neutral), price vs EMA, MACD vs its signal line.
 */
export function countVotes(rsiValue: number, oversold: number, overbought: number, price: number, emaValue: number, macdValue: number, macdSignal: number): AdvancedVotes {
  let bullish = 0;
  let bearish = 0;

  const vote = rsiVote(rsiValue, oversold, overbought);
  if (vote === "BUY") bullish++;
  else if (vote === "SELL") bearish++;

  if (price > emaValue) bullish++;
  else bearish++;

  if (macdValue > macdSignal) bullish++;
  else bearish++;

  return { bullish, bearish };
}

/**
 * Combined strategy. Direction comes from the three-way vote; Bollinger position
 * and a volume spike only add confidence.
 */
export function createAdvancedStrategy(overrides?: ParamOverrides): Strategy {
  const name = "Advanced";
  const p = resolveParams(name, DEFAULT_PARAMS, overrides);

  return {
    kind: "Advanced",
    name,
    params: p.params,
    candles: { interval: "5m", bars: 100 },

    evaluate(input: StrategyInput): Signal {
      const series = closes(input.candles);
      if (series.length === 0) return holdSignal(input.symbol, name, "No market data available", input.now);

      const price = resolvePrice(input.price, series);
      if (price <= 0) return holdSignal(input.symbol, name, "Unable to get current price", input.now);

      const i = series.length - 1;
      const rsiValue = rsi(series, p.get("rsiPeriod"))[i];
      const emaValue = ema(series, p.get("emaPeriod"))[i];
      const m = macd(series, p.get("macdFast"), p.get("macdSlow"), p.get("macdSignal"));
      const macdValue = m.macd[i];
      const macdSignal = m.signal[i];
      if (![rsiValue, emaValue, macdValue, macdSignal].every(Number.isFinite)) {
        return holdSignal(input.symbol, name, "Insufficient candle data", input.now);
      }

      const { bullish, bearish } = countVotes(rsiValue, p.get("oversold"), p.get("overbought"), price, emaValue, macdValue, macdSignal);
      const detail = `RSI:${rsiValue.toFixed(2)}, EMA:${emaValue.toFixed(2)}, MACD:${macdValue.toFixed(4)}`;

      const side = bullish >= 2 ? "BUY" : bearish >= 2 ? "SELL" : null;
      if (!side) {
        return holdSignal(input.symbol, name, `Advanced: mixed signals - ${bullish} buy, ${bearish} sell (${detail})`, input.now);
      }

      const bands = bollinger(series, p.get("bbPeriod"), p.get("bbStdDev"));
      const middle = bands.middle[i];
      const bandConfirms = Number.isFinite(middle) && (side === "BUY" ? price > middle : price < middle);

      const vols = volumes(input.candles);
      const volEma = ema(vols, p.get("volumeEmaPeriod"))[i];
      const volumeConfirms = Number.isFinite(volEma) && vols[i] > volEma * p.get("volumeMultiplier");

      const votes = side === "BUY" ? bullish : bearish;
      const confidence = votes / 3 + (bandConfirms ? 0.05 : 0) + (volumeConfirms ? 0.05 : 0);

      return entrySignal({
        symbol: input.symbol,
        side,
        price,
        quantity: (input.balance * p.get("positionSize")) / price,
        stopLossPct: p.get("stopLossPct"),
        takeProfitPct: p.get("takeProfitPct"),
        strategyName: name,
        confidence,
        reason: `Advanced: ${votes}/3 ${side.toLowerCase()} signals (${detail})`,
        timestamp: input.now,
      });
    },
  };
}
