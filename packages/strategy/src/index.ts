// Types
export type { Candle } from "./types/candle.js";
export { CandleSchema, CandleInterval, intervalToMs, closes, volumes } from "./types/candle.js";
export type { Signal, SignalSide, OrderType, EntrySignalInput } from "./types/signal.js";
export { holdSignal, entrySignal, isActionable } from "./types/signal.js";
export type { Strategy, StrategyInput, StrategyParam, CandleRequirement } from "./types/strategy.js";
export { StrategyKind } from "./types/strategy.js";

// Indicators
export { rsi } from "./indicators/rsi.js";
export { ema } from "./indicators/ema.js";
export { sma } from "./indicators/sma.js";
export { macd } from "./indicators/macd.js";
export type { MacdResult } from "./indicators/macd.js";
export { bollinger } from "./indicators/bollinger.js";
export type { BollingerResult } from "./indicators/bollinger.js";
export { lastFinite } from "./indicators/stream-indicator.js";

// Strategies
export { createStrategy, createFallbackStrategy, StrategyConfigSchema } from "./strategies/create-strategy.js";
export type { StrategyConfig } from "./strategies/create-strategy.js";
export { createRsiStrategy, rsiVote } from "./strategies/rsi.js";
export { createRsiMultiTfStrategy } from "./strategies/rsi-multi-tf.js";
export { createVolumeFilterStrategy } from "./strategies/volume-filter.js";
export { createAdvancedStrategy, countVotes } from "./strategies/advanced.js";
export { createGridStrategy, gridLevels } from "./strategies/grid.js";
export { createDcaStrategy } from "./strategies/dca.js";
export { createBreakoutStrategy } from "./strategies/breakout.js";
export { resolveBreakout } from "./strategies/resolve-breakout.js";
export type { BreakoutDirection, BreakoutResolution } from "./strategies/resolve-breakout.js";
export type { ParamOverrides } from "./strategies/params.js";

// Filters and analysis
export { checkRsiFilter, applyRsiFilter, RsiFilterConfigSchema } from "./filters/rsi-filter.js";
export type { RsiFilterConfig, RsiFilterResult } from "./filters/rsi-filter.js";
export { analyzePriceAction } from "./analysis/price-action.js";
export type { PriceAction, MarketStructure } from "./analysis/price-action.js";

// Exits
export { trailingStopFor, improvesStop, favorableMovePct } from "./exits/trailing-stop.js";
export type { PositionSide } from "./exits/trailing-stop.js";
