import {
  applyRsiFilter,
  closes,
  createFallbackStrategy,
  isActionable,
  type Candle,
  type CandleInterval,
  type Signal,
  type Strategy,
} from "@tradeloop/strategy";
import { logger } from "../lib/logger.js";
import { ValidationError, errorMessage } from "../lib/errors.js";
import { classifyHealth, type HealthAssessment } from "../domain/health.js";
import { checkPreTrade } from "../domain/risk-manager.js";
import { isWithinTradingHours } from "../domain/trading-hours.js";
import type { DailyLedger } from "../domain/daily-ledger.js";
import type { PositionBook } from "../domain/position-book.js";
import type { InstanceConfig } from "../types/config.js";
import type { EventRecorder, NotificationSink, PersistenceStore } from "../types/collaborators.js";
import type { ExchangeClient, Order } from "../types/exchange-client.js";
import type { ExecutionRecord } from "../types/trading.js";
import { formatOrderMessage, notifySafely } from "../adapters/notifier.js";
import { evaluateWithDeadline } from "./evaluate-with-deadline.js";
import type { FillMonitor } from "./fill-monitor.js";

const log = logger.createChild("executionHarness");

export type CycleAction = "BUY" | "SELL" | "HOLD";

export interface CycleResult {
  action: CycleAction;
  reason: string;
  signal?: Signal;
  order?: Order;
  health?: HealthAssessment;
}

export interface CycleContext {
  config: InstanceConfig;
  /** The first entry is evaluated. */
  strategies: readonly Strategy[];
  /** Aborted when the owning instance stops. */
  signal?: AbortSignal;
  /** Latest streamed price, when the feed has one. */
  lastPrice?: number | null;
}

export interface ExecutionHarnessDeps {
  instanceId: string;
  mode: string;
  quoteAsset: string;
  client: ExchangeClient;
  positions: PositionBook;
  ledger: DailyLedger;
  fillMonitor: FillMonitor;
  store: PersistenceStore;
  notifier: NotificationSink;
  events: EventRecorder;
  now?: () => number;
}

function hold(reason: string, health?: HealthAssessment): CycleResult {
  return { action: "HOLD", reason, health };
}

/** Returns the signal's stop. Rejects signals that would place it on the wrong side of the entry. */
export function validateSignal(signal: Signal): number {
  if (!isActionable(signal)) {
    throw new ValidationError(`Signal not actionable: quantity ${signal.quantity}, price ${signal.price}`);
  }
  if (signal.stopLoss === null || !Number.isFinite(signal.stopLoss) || signal.stopLoss <= 0) {
    throw new ValidationError("Signal has no stop loss");
  }
  const wrongSide = signal.side === "BUY" ? signal.stopLoss >= signal.price : signal.stopLoss <= signal.price;
  if (wrongSide) {
    throw new ValidationError(`Stop loss ${signal.stopLoss} on the wrong side of ${signal.side} at ${signal.price}`);
  }
  return signal.stopLoss;
}

/**
 * One trading cycle: hours, balance, health, bounded evaluation with a single
 * fallback, risk gate, submission. Never throws; every failure becomes HOLD.
 */
export class ExecutionHarness {
  private deps: ExecutionHarnessDeps;
  private now: () => number;
  private records = new Map<string, ExecutionRecord>();

  constructor(deps: ExecutionHarnessDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  getExecutionStats(): ExecutionRecord[] {
    return [...this.records.values()].map((r) => ({ ...r }));
  }

  async runCycle(ctx: CycleContext): Promise<CycleResult> {
    const t0 = performance.now();
    let result: CycleResult;
    try {
      result = await this.cycle(ctx);
    } catch (err) {
      log.error({ action: "runCycle", instanceId: this.deps.instanceId, err }, "Unexpected cycle failure");
      result = hold(`Cycle failed: ${errorMessage(err)}`);
    }
    const latencyMs = Math.round(performance.now() - t0);
    log.info({ action: "runCycle", instanceId: this.deps.instanceId, result: result.action, reason: result.reason, latencyMs }, "Cycle complete");
    this.deps.events.record("cycle_completed", { instanceId: this.deps.instanceId, action: result.action, reason: result.reason, latencyMs });
    return result;
  }

  private async cycle(ctx: CycleContext): Promise<CycleResult> {
    const { config, strategies } = ctx;
    const { client, quoteAsset, instanceId } = this.deps;

    if (!isWithinTradingHours(config.tradingHours, this.now())) {
      return hold("Outside trading hours");
    }

    let balance: number | null = null;
    try {
      balance = await client.getQuoteBalance(quoteAsset, { signal: ctx.signal });
    } catch (err) {
      log.warn({ action: "balance", instanceId, err }, "Balance fetch failed");
    }
    if (balance !== null && balance < config.minBalanceUsd) {
      return hold(`Insufficient balance ($${balance.toFixed(2)} < $${config.minBalanceUsd})`);
    }

    const health = classifyHealth({
      apiReachable: balance !== null || (await this.probeApi(ctx.signal)),
      balanceAvailable: balance !== null && balance > 0,
      configComplete: config.symbol.length > 0 && config.strategies.length > 0,
      strategiesLoaded: strategies.length > 0,
    });
    if (health.status === "UNHEALTHY") {
      return hold(`Unhealthy: ${health.failed.join(", ")} failed`, health);
    }
    if (health.status === "DEGRADED") {
      log.warn({ action: "health", instanceId, failed: health.failed }, "Health degraded, proceeding");
    }

    const primary = strategies[0];
    if (!primary) return hold("No strategy loaded", health);

    const evaluation = await this.evaluate(primary, ctx, balance ?? 0);
    if ("error" in evaluation) return hold(evaluation.error, health);
    const signal = evaluation.signal;

    if (signal.side === "HOLD") {
      return { action: "HOLD", reason: signal.reason, signal, health };
    }
    this.deps.events.record("signal_generated", { instanceId, side: signal.side, quantity: signal.quantity, price: signal.price, strategy: signal.strategyName, reason: signal.reason });
    return this.execute(signal, config, balance ?? 0, health, ctx.signal);
  }

  private async probeApi(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.deps.client.getServerTime({ signal });
      return true;
    } catch {
      return false;
    }
  }

  private async evaluate(
    primary: Strategy,
    ctx: CycleContext,
    balance: number,
  ): Promise<{ signal: Signal } | { error: string }> {
    try {
      return { signal: await this.evaluateTimed(primary, ctx, balance) };
    } catch (err) {
      const reason = errorMessage(err);
      log.warn({ action: "evaluate", instanceId: this.deps.instanceId, strategy: primary.name, err }, "Evaluation failed, trying fallback");
      this.deps.events.record("evaluation_failed", { instanceId: this.deps.instanceId, strategy: primary.name, reason });

      if (ctx.signal?.aborted) return { error: reason };
      const fallback = createFallbackStrategy();
      try {
        return { signal: await this.evaluateTimed(fallback, ctx, balance) };
      } catch (fallbackErr) {
        return { error: `${reason}; fallback ${fallback.name} failed: ${errorMessage(fallbackErr)}` };
      }
    }
  }

  private async evaluateTimed(strategy: Strategy, ctx: CycleContext, balance: number): Promise<Signal> {
    const t0 = performance.now();
    try {
      const signal = await evaluateWithDeadline(
        (abort) => this.evaluateOnce(strategy, ctx, balance, abort),
        { timeoutMs: ctx.config.evaluationTimeoutMs, strategyName: strategy.name, parentSignal: ctx.signal },
      );
      this.record(strategy.name, true, performance.now() - t0);
      return signal;
    } catch (err) {
      this.record(strategy.name, false, performance.now() - t0);
      throw err;
    }
  }

  private async evaluateOnce(strategy: Strategy, ctx: CycleContext, balance: number, abort: AbortSignal): Promise<Signal> {
    const { client } = this.deps;
    const { symbol, rsiFilter } = ctx.config;
    const req = strategy.candles;

    const candles = await client.getKlines(symbol, req.interval, req.bars, { signal: abort });
    abort.throwIfAborted();
    let higher: Candle[] | undefined;
    if (req.higherInterval) {
      higher = await client.getKlines(symbol, req.higherInterval, req.bars, { signal: abort });
      abort.throwIfAborted();
    }

    const raw = strategy.evaluate({
      symbol,
      price: ctx.lastPrice ?? 0,
      balance,
      candles,
      higherTimeframe: higher,
      now: this.now(),
    });
    abort.throwIfAborted();
    if (raw.side === "HOLD" || !rsiFilter.enabled) return raw;

    // the filter reads its own timeframes; reuse a series already fetched for the strategy
    const fetched = new Map<CandleInterval, Candle[]>([[req.interval, candles]]);
    if (req.higherInterval && higher) fetched.set(req.higherInterval, higher);
    const series = async (interval: CandleInterval): Promise<number[]> => {
      let list = fetched.get(interval);
      if (!list) {
        list = await client.getKlines(symbol, interval, rsiFilter.bars, { signal: abort });
        abort.throwIfAborted();
        fetched.set(interval, list);
      }
      return closes(list);
    };
    const shortCloses = await series(rsiFilter.timeframes.short);
    const longCloses = rsiFilter.mode === "normal" ? await series(rsiFilter.timeframes.long) : [];
    return applyRsiFilter(raw, rsiFilter, shortCloses, longCloses);
  }

  private record(strategyName: string, success: boolean, elapsedMs: number): void {
    const rec = this.records.get(strategyName) ?? { strategyName, successCount: 0, failureCount: 0, totalTimeMs: 0 };
    if (success) rec.successCount++;
    else rec.failureCount++;
    rec.totalTimeMs += Math.round(elapsedMs);
    this.records.set(strategyName, rec);
  }

  private async execute(
    signal: Signal,
    config: InstanceConfig,
    balance: number,
    health: HealthAssessment,
    abort?: AbortSignal,
  ): Promise<CycleResult> {
    const { client, positions, ledger, fillMonitor, store, notifier, events, instanceId, mode } = this.deps;

    let stopLoss: number;
    try {
      stopLoss = validateSignal(signal);
    } catch (err) {
      return { action: "HOLD", reason: `Invalid signal: ${errorMessage(err)}`, signal, health };
    }

    let exchangeOrders: Order[];
    try {
      exchangeOrders = await client.getOpenOrders(signal.symbol, { signal: abort });
    } catch (err) {
      return { action: "HOLD", reason: `Open orders unavailable: ${errorMessage(err)}`, signal, health };
    }

    const daily = ledger.snapshot();
    const risk = checkPreTrade({
      symbol: signal.symbol,
      side: signal.side === "BUY" ? "BUY" : "SELL",
      quantity: signal.quantity,
      price: signal.price,
      confidence: signal.confidence,
      leverage: config.leverage,
      availableBalance: balance,
      dailyLossUsd: ledger.dailyLossUsd(),
      tradesToday: daily.trades,
      positions: positions.getAll(),
      openOrders: [...exchangeOrders, ...fillMonitor.pending()],
    }, config.risk);

    if (!risk.passed) {
      const reason = `Risk check failed: ${risk.reason}`;
      log.info({ action: "riskCheck", instanceId, symbol: signal.symbol, reason: risk.reason }, "Signal rejected by risk manager");
      events.record("risk_check_failed", { instanceId, symbol: signal.symbol, side: signal.side, reason: risk.reason });
      return { action: "HOLD", reason, signal, health };
    }

    const side = signal.side === "BUY" ? "BUY" : "SELL";
    const t0 = performance.now();
    let order: Order;
    try {
      order = await client.placeOrder({
        symbol: signal.symbol,
        side,
        type: signal.orderType,
        quantity: signal.quantity,
        price: signal.price,
        strategyName: signal.strategyName,
      }, { signal: abort });
    } catch (err) {
      log.error({ action: "placeOrder", instanceId, symbol: signal.symbol, side, latencyMs: Math.round(performance.now() - t0), err }, "Order submission failed");
      return { action: "HOLD", reason: `Order failed: ${errorMessage(err)}`, signal, health };
    }
    log.info({ action: "placeOrder", instanceId, orderId: order.id, symbol: order.symbol, side, quantity: order.quantity, latencyMs: Math.round(performance.now() - t0) }, "Order placed");

    ledger.recordTrade();
    store.appendTrade({
      instanceId,
      orderId: order.id,
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      price: order.price,
      status: order.status,
      strategyName: signal.strategyName,
      reason: signal.reason,
      realizedPnl: null,
      timestamp: this.now(),
    });
    events.record("order_placed", { instanceId, orderId: order.id, symbol: order.symbol, side, quantity: order.quantity, price: order.price });
    void notifySafely(notifier, "Order placed", formatOrderMessage(order, instanceId, mode));

    fillMonitor.track(order, { stopLoss });

    return { action: side, reason: signal.reason, signal, order, health };
  }
}
