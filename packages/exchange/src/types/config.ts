import { z } from "zod";
import { RsiFilterConfigSchema, StrategyConfigSchema } from "@tradeloop/strategy";
import { toExchangeSymbol } from "../domain/symbol.js";

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

export const ExchangeSettingsSchema = z.object({
  dialect: z.enum(["spot", "futures"]).default("spot"),
  baseUrl: z.string().url(),
  wsUrls: z.array(z.string().url()).min(1),
  retryAttempts: z.number().int().positive().default(3),
  /** Seconds; transient failure n sleeps `retryBackoff ** n`. */
  retryBackoff: z.number().positive().default(2),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  minRequestIntervalMs: z.number().int().nonnegative().default(100),
  maxRateLimitWaits: z.number().int().positive().default(5),
  defaultRetryAfterSec: z.number().positive().default(60),
  clockSyncIntervalMs: z.number().int().positive().default(300_000),
});

export const FeedSettingsSchema = z.object({
  reconnectDelayMs: z.number().int().positive().default(5_000),
  maxReconnectAttempts: z.number().int().positive().default(10),
  staleAfterMs: z.number().int().positive().default(60_000),
});

export const TradingHoursSchema = z.object({
  enabled: z.boolean().default(false),
  start: z.string().regex(HHMM).default("00:00"),
  end: z.string().regex(HHMM).default("23:59"),
  timezone: z.string().min(1).default("UTC"),
});

export const RiskLimitsSchema = z.object({
  maxDailyLossUsd: z.number().positive().default(100),
  // nonnegative allows 0 as a kill switch (blocks all trades)
  maxDailyTrades: z.number().int().nonnegative().default(50),
  minConfidence: z.number().min(0).max(1).default(0.6),
  marginBuffer: z.number().min(1).default(1.2),
  maxConcentration: z.number().positive().max(1).default(0.8),
  maintenanceMargin: z.number().nonnegative().max(0.5).default(0.05),
  autoClose: z.boolean().default(false),
});

export const PositionSettingsSchema = z.object({
  tp1Pct: z.number().positive().default(1.5),
  tp2Pct: z.number().positive().default(3),
  breakevenPct: z.number().positive().default(1),
  trailingEnabled: z.boolean().default(true),
  trailingDistancePct: z.number().positive().default(0.5),
  trailingStepPct: z.number().positive().default(0.2),
}).refine((s) => s.tp2Pct > s.tp1Pct, { message: "tp2Pct must be greater than tp1Pct" });

export const InstanceConfigSchema = z.object({
  id: z.string().min(1),
  /** Normalized to the exchange form, so `BTCUSDT` and `BTC_USDT` name one market. */
  symbol: z.string().min(1).transform((symbol) => toExchangeSymbol(symbol)),
  enabled: z.boolean().default(false),
  leverage: z.number().int().positive().default(1),
  /** The first entry is evaluated each cycle. */
  strategies: z.array(StrategyConfigSchema).min(1),
  rsiFilter: RsiFilterConfigSchema.default({}),
  heartbeatIntervalMs: z.number().int().positive().default(60_000),
  errorBackoffMs: z.number().int().positive().default(30_000),
  evaluationTimeoutMs: z.number().int().positive().default(30_000),
  minBalanceUsd: z.number().nonnegative().default(10),
  fillCheckDelayMs: z.number().int().positive().default(2_000),
  fillCheckAttempts: z.number().int().positive().default(5),
  stopTimeoutMs: z.number().int().positive().default(5_000),
  restartDelayMs: z.number().int().nonnegative().default(2_000),
  tradingHours: TradingHoursSchema.default({}),
  risk: RiskLimitsSchema.default({}),
  positions: PositionSettingsSchema.default({}),
});

export const WatchdogSettingsSchema = z.object({
  intervalMs: z.number().int().positive().default(60_000),
  maxFailures: z.number().int().positive().default(3),
  autoRestart: z.boolean().default(true),
  maxRestartCount: z.number().int().positive().default(10),
  maxRestartsBeforeDisable: z.number().int().positive().default(3),
  memoryThresholdMb: z.number().positive().default(80),
  cpuThresholdPct: z.number().positive().default(80),
  restartHistorySize: z.number().int().positive().default(50),
  heartbeatFile: z.string().min(1).default("data/heartbeat.json"),
});

export const EngineConfigSchema = z.object({
  port: z.number().int().positive().default(3300),
  dataDir: z.string().min(1).default("data"),
  quoteAsset: z.string().min(1).default("USDT"),
  dryRun: z.boolean().default(false),
  exchange: ExchangeSettingsSchema,
  feed: FeedSettingsSchema.default({}),
  watchdog: WatchdogSettingsSchema.default({}),
  instances: z.array(InstanceConfigSchema).min(1)
    .refine((list) => new Set(list.map((i) => i.id)).size === list.length, { message: "instance ids must be unique" }),
  logLevels: z.record(z.string()).default({}),
}).transform((config) => ({
  ...config,
  instances: config.instances.map((instance) => ({ ...instance, symbol: toExchangeSymbol(instance.symbol, config.quoteAsset) })),
}));

export type ExchangeSettings = z.infer<typeof ExchangeSettingsSchema>;
export type FeedSettings = z.infer<typeof FeedSettingsSchema>;
export type TradingHours = z.infer<typeof TradingHoursSchema>;
export type RiskLimits = z.infer<typeof RiskLimitsSchema>;
export type PositionSettings = z.infer<typeof PositionSettingsSchema>;
export type InstanceConfig = z.infer<typeof InstanceConfigSchema>;
export type WatchdogSettings = z.infer<typeof WatchdogSettingsSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
