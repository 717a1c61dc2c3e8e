import pTimeout, { TimeoutError } from "p-timeout";
import { createStrategy, type Strategy, type StrategyConfig, type StrategyKind } from "@tradeloop/strategy";
import { isSanePrice } from "@tradeloop/kit";
import { logger } from "../lib/logger.js";
import { NotFoundError, ValidationError, errorMessage } from "../lib/errors.js";
import { abortableSleep, type Sleep } from "../lib/abortable-sleep.js";
import { DailyLedger } from "../domain/daily-ledger.js";
import { PositionBook } from "../domain/position-book.js";
import { isWithinTradingHours } from "../domain/trading-hours.js";
import type { InstanceConfig } from "../types/config.js";
import type { EventRecorder, NotificationSink, PersistenceStore } from "../types/collaborators.js";
import type { ExchangeClient, Order } from "../types/exchange-client.js";
import type { DailyCounters, ExecutionRecord, Position } from "../types/trading.js";
import { ExecutionHarness, type CycleResult } from "./execution-harness.js";
import { FillMonitor } from "./fill-monitor.js";
import { PositionManager } from "./position-manager.js";

const log = logger.createChild("tradingInstance");

export type TradingMode = "live" | "dry-run";

/** The slice of the market-data feed an instance cares about. */
export interface PriceFeedState {
  isConnected(): boolean;
}

export interface TradingInstanceDeps {
  config: InstanceConfig;
  mode: TradingMode;
  quoteAsset: string;
  client: ExchangeClient;
  store: PersistenceStore;
  notifier: NotificationSink;
  events: EventRecorder;
  /** Without a connected feed, positions are priced from the REST ticker. */
  feed?: PriceFeedState;
  now?: () => number;
  sleep?: Sleep;
}

export interface InstanceStatus {
  id: string;
  pair: string;
  mode: TradingMode;
  running: boolean;
  enabled: boolean;
  restartCount: number;
  lastRestart: number | null;
  lastSeen: number | null;
  consecutiveErrors: number;
  tradingHoursActive: boolean;
  strategies: string[];
  lastCycle: { action: CycleResult["action"]; reason: string } | null;
}

export interface PortfolioSnapshot {
  balance: number | null;
  positions: Position[];
  openOrders: Order[];
  executionStats: ExecutionRecord[];
  daily: DailyCounters;
}

/**
 * One trading pair's loop: cycle, position tick, sleep. Control operations
 * (start, stop, enable, disable, restart, strategy edits) run one at a time.
 */
export class TradingInstance {
  readonly id: string;
  private deps: TradingInstanceDeps;
  private config: InstanceConfig;
  private now: () => number;
  private sleep: Sleep;

  private positions = new PositionBook();
  private ledger: DailyLedger;
  private fillMonitor: FillMonitor;
  private harness: ExecutionHarness;
  private positionManager: PositionManager;

  private strategyConfigs: readonly StrategyConfig[];
  private strategies: readonly Strategy[];
  private enabled: boolean;

  private running = false;
  private controller: AbortController | null = null;
  private loopDone: Promise<void> | null = null;
  private lock: Promise<void> = Promise.resolve();
  private consecutiveErrors = 0;
  private restartCount = 0;
  private lastRestart: number | null = null;
  private lastSeen: number | null = null;
  private lastCycle: CycleResult | null = null;
  private lastPrice: number | null = null;

  constructor(deps: TradingInstanceDeps) {
    this.deps = deps;
    this.id = deps.config.id;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;

    const saved = deps.store.getUserSettings(this.id);
    this.enabled = saved?.enabled ?? deps.config.enabled;
    this.strategyConfigs = saved?.strategies ?? deps.config.strategies;
    this.strategies = this.strategyConfigs.map(createStrategy);

    this.ledger = new DailyLedger(this.now);
    const shared = {
      instanceId: this.id,
      client: deps.client,
      positions: this.positions,
      store: deps.store,
      notifier: deps.notifier,
      events: deps.events,
      now: this.now,
    };
    this.fillMonitor = new FillMonitor({
      ...shared,
      mode: deps.mode,
      delayMs: this.config.fillCheckDelayMs,
      attempts: this.config.fillCheckAttempts,
      leverage: this.config.leverage,
      sleep: this.sleep,
    });
    this.harness = new ExecutionHarness({
      ...shared,
      mode: deps.mode,
      quoteAsset: deps.quoteAsset,
      ledger: this.ledger,
      fillMonitor: this.fillMonitor,
    });
    this.positionManager = new PositionManager({ ...shared, ledger: this.ledger, config: () => this.config, sleep: this.sleep });
  }

  get symbol(): string {
    return this.config.symbol;
  }

  isRunning(): boolean {
    return this.running;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getRestartCount(): number {
    return this.restartCount;
  }

  getStrategyConfigs(): StrategyConfig[] {
    return this.strategyConfigs.map((s) => ({ kind: s.kind, params: { ...s.params } }));
  }

  start(): Promise<void> {
    return this.serialize(async () => this.startLoop());
  }

  stop(): Promise<void> {
    return this.serialize(() => this.stopLoop());
  }

  enable(): Promise<void> {
    return this.serialize(async () => {
      this.enabled = true;
      this.persist();
      this.startLoop();
    });
  }

  disable(reason: string = "operator"): Promise<void> {
    return this.serialize(async () => {
      this.enabled = false;
      this.persist();
      await this.stopLoop();
      log.warn({ action: "disable", instanceId: this.id, reason }, "Auto-trading disabled");
      this.deps.events.record("instance_disabled", { instanceId: this.id, reason });
    });
  }

  restart(): Promise<void> {
    return this.serialize(async () => {
      this.restartCount++;
      this.lastRestart = this.now();
      log.info({ action: "restart", instanceId: this.id, restartCount: this.restartCount }, "Restarting instance");
      await this.stopLoop();
      await this.sleep(this.config.restartDelayMs);
      if (this.enabled) this.startLoop();
      this.deps.events.record("instance_restarted", { instanceId: this.id, restartCount: this.restartCount, running: this.running });
    });
  }

  /** Replace the strategy of the same kind, or append. Persisted as a user setting. */
  addStrategy(config: StrategyConfig): Promise<StrategyConfig[]> {
    return this.serialize(async () => {
      let strategy: Strategy;
      try {
        strategy = createStrategy(config);
      } catch (err) {
        throw new ValidationError(errorMessage(err));
      }
      const index = this.strategyConfigs.findIndex((s) => s.kind === config.kind);
      const configs = [...this.strategyConfigs];
      const strategies = [...this.strategies];
      if (index === -1) {
        configs.push(config);
        strategies.push(strategy);
      } else {
        configs[index] = config;
        strategies[index] = strategy;
      }
      this.strategyConfigs = configs;
      this.strategies = strategies;
      this.persist();
      log.info({ action: "addStrategy", instanceId: this.id, kind: config.kind }, "Strategy added");
      return this.getStrategyConfigs();
    });
  }

  removeStrategy(kind: StrategyKind): Promise<StrategyConfig[]> {
    return this.serialize(async () => {
      const index = this.strategyConfigs.findIndex((s) => s.kind === kind);
      if (index === -1) throw new NotFoundError(`Strategy ${kind} not configured on ${this.id}`);
      if (this.strategyConfigs.length === 1) throw new ValidationError(`Cannot remove the last strategy of ${this.id}`);
      this.strategyConfigs = this.strategyConfigs.filter((_, i) => i !== index);
      this.strategies = this.strategies.filter((_, i) => i !== index);
      this.persist();
      log.info({ action: "removeStrategy", instanceId: this.id, kind }, "Strategy removed");
      return this.getStrategyConfigs();
    });
  }

  /** Config reload. Strategies saved as user settings keep precedence. */
  updateConfig(config: InstanceConfig): void {
    this.config = config;
    const saved = this.deps.store.getUserSettings(this.id);
    if (!saved?.strategies) {
      this.strategyConfigs = config.strategies;
      this.strategies = config.strategies.map(createStrategy);
    }
  }

  /** Streamed price for this instance's symbol. */
  onPrice(price: number): void {
    if (!isSanePrice(price)) return;
    this.lastPrice = price;
    if (!this.running) return;
    this.positionManager.onPrice(this.config.symbol, price).catch((err: unknown) => {
      log.error({ action: "onPrice", instanceId: this.id, err }, "Position tick failed");
    });
  }

  getStatus(): InstanceStatus {
    return {
      id: this.id,
      pair: this.config.symbol,
      mode: this.deps.mode,
      running: this.running,
      enabled: this.enabled,
      restartCount: this.restartCount,
      lastRestart: this.lastRestart,
      lastSeen: this.lastSeen,
      consecutiveErrors: this.consecutiveErrors,
      tradingHoursActive: isWithinTradingHours(this.config.tradingHours, this.now()),
      strategies: this.strategies.map((s) => s.name),
      lastCycle: this.lastCycle ? { action: this.lastCycle.action, reason: this.lastCycle.reason } : null,
    };
  }

  async getPortfolioSnapshot(): Promise<PortfolioSnapshot> {
    const { client, quoteAsset } = this.deps;
    const [balance, openOrders] = await Promise.all([
      client.getQuoteBalance(quoteAsset).catch((err: unknown) => {
        log.warn({ action: "portfolio", instanceId: this.id, err }, "Balance unavailable");
        return null;
      }),
      client.getOpenOrders(this.config.symbol).catch((err: unknown) => {
        log.warn({ action: "portfolio", instanceId: this.id, err }, "Open orders unavailable");
        return this.fillMonitor.pending();
      }),
    ]);
    return {
      balance,
      positions: this.positions.getAll(),
      openOrders,
      executionStats: this.harness.getExecutionStats(),
      daily: this.ledger.snapshot(),
    };
  }

  private serialize<T>(op: () => Promise<T>): Promise<T> {
    const run = this.lock.then(op);
    this.lock = run.then(() => undefined, () => undefined);
    return run;
  }

  private persist(): void {
    try {
      this.deps.store.saveUserSettings(this.id, { enabled: this.enabled, strategies: [...this.strategyConfigs] });
    } catch (err) {
      log.error({ action: "persist", instanceId: this.id, err }, "Saving user settings failed");
    }
  }

  private startLoop(): void {
    if (this.running) return;
    this.running = true;
    this.consecutiveErrors = 0;
    const controller = new AbortController();
    this.controller = controller;
    this.loopDone = this.loop(controller.signal);
    log.info({ action: "start", instanceId: this.id, symbol: this.config.symbol, mode: this.deps.mode }, "Instance started");
    this.deps.events.record("instance_started", { instanceId: this.id, symbol: this.config.symbol });
  }

  private async stopLoop(): Promise<void> {
    if (!this.running && this.loopDone === null) return;
    this.running = false;
    this.controller?.abort();
    const done = this.loopDone;
    this.loopDone = null;
    this.controller = null;

    if (done) {
      try {
        await pTimeout(done, { milliseconds: this.config.stopTimeoutMs });
      } catch (err) {
        if (!(err instanceof TimeoutError)) throw err;
        log.warn({ action: "stop", instanceId: this.id, timeoutMs: this.config.stopTimeoutMs }, "Loop did not stop in time");
      }
    }
    await this.fillMonitor.stop();
    log.info({ action: "stop", instanceId: this.id }, "Instance stopped");
    this.deps.events.record("instance_stopped", { instanceId: this.id });
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (this.running) {
      let delayMs = this.config.heartbeatIntervalMs;
      try {
        this.lastCycle = await this.harness.runCycle({
          config: this.config,
          strategies: this.strategies,
          signal,
          lastPrice: this.lastPrice,
        });
        this.lastSeen = this.now();
        if (!signal.aborted) await this.positionTick(signal);
        this.consecutiveErrors = 0;
      } catch (err) {
        this.consecutiveErrors++;
        delayMs = this.config.errorBackoffMs;
        log.error({ action: "loop", instanceId: this.id, err, consecutiveErrors: this.consecutiveErrors }, "Instance loop error");
        this.deps.events.record("error", { instanceId: this.id, message: errorMessage(err), consecutiveErrors: this.consecutiveErrors });
      }
      if (!(await this.sleep(delayMs, signal))) break;
    }
  }

  /** REST-priced exit check when the feed is down, then the portfolio review. */
  private async positionTick(signal: AbortSignal): Promise<void> {
    if (this.positions.count() === 0) return;
    const { client, feed, quoteAsset } = this.deps;
    const symbol = this.config.symbol;

    if (!feed?.isConnected()) {
      const ticker = await client.getTicker(symbol, { signal });
      this.lastPrice = ticker.price;
      await this.positionManager.onPrice(symbol, ticker.price);
    }

    if (this.positions.count() === 0) return;
    const balance = await client.getQuoteBalance(quoteAsset, { signal });
    await this.positionManager.review(balance);
  }
}
