// Types
export type {
  EngineConfig,
  ExchangeSettings,
  FeedSettings,
  InstanceConfig,
  PositionSettings,
  RiskLimits,
  TradingHours,
  WatchdogSettings,
} from "./types/config.js";
export { EngineConfigSchema, InstanceConfigSchema, WatchdogSettingsSchema } from "./types/config.js";
export type { EngineEvent, EventType } from "./types/events.js";
export type { ExchangeClient, Order, OrderSide, OrderStatus, Balance, Ticker, PlaceOrderRequest } from "./types/exchange-client.js";
export type { Position, CloseReason, ExecutionRecord, HeartbeatRecord } from "./types/trading.js";
export type {
  ConfigProvider,
  EventRecorder,
  NotificationSink,
  PersistenceStore,
  TradeRecord,
  UserSettings,
} from "./types/collaborators.js";

// Domain
export { PositionBook } from "./domain/position-book.js";
export { advancePosition } from "./domain/position-state-machine.js";
export type { PositionTransition, AdvanceResult } from "./domain/position-state-machine.js";
export { checkPreTrade, assessPortfolio, liquidationPrice } from "./domain/risk-manager.js";
export type { RiskAction, PortfolioAssessment } from "./domain/risk-manager.js";
export { isWithinTradingHours } from "./domain/trading-hours.js";
export { DailyLedger } from "./domain/daily-ledger.js";

// Adapters
export { HttpExchangeClient } from "./adapters/exchange-client.js";
export type { Credentials } from "./adapters/exchange-client.js";
export { DryRunExchangeClient } from "./adapters/dry-run-client.js";
export { spotDialect, futuresDialect, getDialect } from "./adapters/dialects.js";
export { signRequest } from "./adapters/signing.js";
export { MarketDataFeed } from "./adapters/market-data-feed.js";
export type { FeedState } from "./adapters/feed-machine.js";
export { SqliteStore } from "./adapters/sqlite-store.js";
export { EventLog } from "./adapters/event-log.js";
export { JsonConfigProvider, StaticConfigProvider } from "./adapters/json-config-provider.js";
export { WebhookNotificationSink, LogNotificationSink } from "./adapters/notifier.js";

// Application
export { ExecutionHarness, validateSignal } from "./application/execution-harness.js";
export type { CycleResult } from "./application/execution-harness.js";
export { TradingInstance } from "./application/trading-instance.js";
export type { InstanceStatus, PortfolioSnapshot, TradingMode } from "./application/trading-instance.js";
export { InstanceRegistry } from "./application/instance-registry.js";
export { Watchdog } from "./application/watchdog.js";
export type { WatchdogStatus, HealthReport } from "./application/watchdog.js";

// Errors
export {
  EngineError,
  NetworkError,
  ExchangeError,
  RateLimitedError,
  ExhaustedError,
  ValidationError,
  NotFoundError,
  EvaluationTimeoutError,
  FatalError,
} from "./lib/errors.js";

// Server
export { createApp } from "./create-app.js";
