import { isSanePrice } from "@tradeloop/kit";
import { logger } from "../lib/logger.js";
import { ExchangeError, errorMessage } from "../lib/errors.js";
import { abortableSleep, type Sleep } from "../lib/abortable-sleep.js";
import { isTerminal } from "../domain/order-status.js";
import { advancePosition } from "../domain/position-state-machine.js";
import { positionKey, unrealizedPnl, type PositionBook } from "../domain/position-book.js";
import { assessPortfolio, type PortfolioAssessment, type RiskAction } from "../domain/risk-manager.js";
import type { DailyLedger } from "../domain/daily-ledger.js";
import type { InstanceConfig } from "../types/config.js";
import type { EventRecorder, NotificationSink, PersistenceStore } from "../types/collaborators.js";
import type { ExchangeClient, Order, OrderSide } from "../types/exchange-client.js";
import type { CloseReason, Position } from "../types/trading.js";
import { formatCloseMessage, notifySafely } from "../adapters/notifier.js";

const log = logger.createChild("positionManager");

export interface PositionManagerDeps {
  instanceId: string;
  client: ExchangeClient;
  positions: PositionBook;
  ledger: DailyLedger;
  store: PersistenceStore;
  notifier: NotificationSink;
  events: EventRecorder;
  /** Read on every call so a config reload takes effect on the next tick. */
  config: () => InstanceConfig;
  now?: () => number;
  sleep?: Sleep;
}

function exitSide(position: Position): OrderSide {
  return position.side === "long" ? "SELL" : "BUY";
}

/**
 * Applies price ticks and risk advice to the instance's open positions.
 * A position leaves the book only once its reduce-only close is FILLED.
 */
export class PositionManager {
  private deps: PositionManagerDeps;
  private now: () => number;
  private sleep: Sleep;
  private inFlight = new Set<string>();

  constructor(deps: PositionManagerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;
  }

  /**
   * Every position is advanced and written back before any close is awaited,
   * so a tick arriving mid-close never sees a copy older than the book.
   */
  async onPrice(symbol: string, price: number): Promise<void> {
    if (!isSanePrice(price)) return;
    const { positions, events, instanceId } = this.deps;
    const settings = this.deps.config().positions;
    const closes: Promise<boolean>[] = [];

    for (const current of positions.forSymbol(symbol)) {
      if (this.inFlight.has(positionKey(current.symbol, current.side))) continue;

      const result = advancePosition(current, price, settings);
      positions.update(result.position);

      for (const t of result.transitions) {
        log.info({ action: "transition", instanceId, symbol, side: current.side, kind: t.kind, price: t.price, stopLossPrice: t.stopLossPrice }, "Position transition");
        events.record("position_transition", { instanceId, symbol, side: current.side, kind: t.kind, price: t.price, stopLossPrice: t.stopLossPrice });
      }

      if (result.close) {
        closes.push(this.close(result.position, result.close, price));
      }
    }

    await Promise.all(closes);
  }

  /**
   * Submit a reduce-only market close. Returns false when the exchange refused,
   * the request failed or only part of the order filled; the position then
   * stays open with its exit pending and the rest is retried on the next tick.
   */
  async close(position: Position, reason: CloseReason, price: number): Promise<boolean> {
    const { positions, notifier, events, instanceId } = this.deps;
    const key = positionKey(position.symbol, position.side);
    if (this.inFlight.has(key)) return false;
    this.inFlight.add(key);

    if (!position.exitTriggered) {
      positions.update({ ...position, exitTriggered: true, exitReason: reason });
    }

    try {
      const order = await this.submitReduce(position, position.size, price);
      const exitPrice = order.avgFillPrice > 0 ? order.avgFillPrice : price;

      if (order.status !== "FILLED") {
        const latest = positions.get(position.symbol, position.side) ?? position;
        const pnl = this.recordExit(latest, order, order.filledQuantity, exitPrice, reason);
        const size = latest.size - order.filledQuantity;
        positions.update({
          ...latest,
          size,
          realizedPnl: latest.realizedPnl + pnl,
          unrealizedPnl: unrealizedPnl(latest.side, latest.entryPrice, latest.markPrice, size),
        });
        log.warn({ action: "close", instanceId, symbol: position.symbol, side: position.side, reason, filledQuantity: order.filledQuantity, remaining: size }, "Close partially filled, retrying next tick");
        events.record("close_failed", { instanceId, symbol: position.symbol, side: position.side, reason, message: `partial fill ${order.filledQuantity}/${position.size}` });
        return false;
      }

      const pnl = this.recordExit(position, order, position.size, exitPrice, reason);
      const totalPnl = pnl + position.realizedPnl;
      positions.close(position.symbol, position.side);
      events.record("position_closed", { instanceId, symbol: position.symbol, side: position.side, reason, exitPrice, realizedPnl: totalPnl });
      log.info({ action: "close", instanceId, symbol: position.symbol, side: position.side, reason, exitPrice, realizedPnl: totalPnl }, "Position closed");
      void notifySafely(notifier, "Position closed", formatCloseMessage(position, reason, exitPrice, totalPnl));
      return true;
    } catch (err) {
      log.error({ action: "close", instanceId, symbol: position.symbol, side: position.side, reason, err }, "Close failed, retrying next tick");
      events.record("close_failed", { instanceId, symbol: position.symbol, side: position.side, reason, message: errorMessage(err) });
      return false;
    } finally {
      this.inFlight.delete(key);
    }
  }

  /** Close half of the position; the rest keeps its exit rules. */
  async reduce(position: Position, price: number): Promise<boolean> {
    const { positions, events, instanceId } = this.deps;
    const key = positionKey(position.symbol, position.side);
    if (this.inFlight.has(key)) return false;
    this.inFlight.add(key);

    try {
      const order = await this.submitReduce(position, position.size / 2, price);
      const quantity = order.status === "FILLED" ? position.size / 2 : order.filledQuantity;
      const exitPrice = order.avgFillPrice > 0 ? order.avgFillPrice : price;
      const latest = positions.get(position.symbol, position.side) ?? position;
      const pnl = this.recordExit(latest, order, quantity, exitPrice, "risk_reduce");
      const size = latest.size - quantity;

      positions.update({
        ...latest,
        size,
        realizedPnl: latest.realizedPnl + pnl,
        unrealizedPnl: unrealizedPnl(latest.side, latest.entryPrice, latest.markPrice, size),
      });
      events.record("position_transition", { instanceId, symbol: position.symbol, side: position.side, kind: "reduce", price: exitPrice, size });
      log.info({ action: "reduce", instanceId, symbol: position.symbol, side: position.side, quantity, realizedPnl: pnl }, "Position reduced");
      return true;
    } catch (err) {
      log.error({ action: "reduce", instanceId, symbol: position.symbol, side: position.side, err }, "Reduce failed");
      events.record("close_failed", { instanceId, symbol: position.symbol, side: position.side, reason: "risk_reduce", message: errorMessage(err) });
      return false;
    } finally {
      this.inFlight.delete(key);
    }
  }

  /** Advisory only unless `autoClose`: then CLOSE closes and REDUCE halves. */
  async applyRiskActions(actions: readonly RiskAction[], autoClose: boolean): Promise<void> {
    const { positions, events, notifier, instanceId } = this.deps;

    for (const action of actions) {
      events.record("risk_advisory", { instanceId, type: action.type, symbol: action.symbol, side: action.side, reason: action.reason, applied: autoClose });

      if (!autoClose) {
        log.warn({ action: "riskAdvisory", instanceId, type: action.type, symbol: action.symbol, side: action.side, reason: action.reason }, "Risk advisory");
        void notifySafely(notifier, "Risk advisory", `${action.type} ${action.symbol} ${action.side}: ${action.reason}`);
        continue;
      }

      const position = positions.get(action.symbol, action.side);
      if (!position) continue;
      if (action.type === "CLOSE_POSITION") {
        await this.close(position, "risk_reduce", position.markPrice);
      } else {
        await this.reduce(position, position.markPrice);
      }
    }
  }

  /** Portfolio review against the instance's risk limits; applies the resulting actions. */
  async review(totalBalance: number): Promise<PortfolioAssessment> {
    const risk = this.deps.config().risk;
    const assessment = assessPortfolio(this.deps.positions.getAll(), totalBalance, risk);
    if (assessment.actions.length > 0) {
      await this.applyRiskActions(assessment.actions, risk.autoClose);
    }
    return assessment;
  }

  /** Books the realized PnL of `quantity` leaving the position and appends the trade. */
  private recordExit(position: Position, order: Order, quantity: number, exitPrice: number, reason: CloseReason): number {
    const pnl = unrealizedPnl(position.side, position.entryPrice, exitPrice, quantity);
    this.deps.ledger.recordPnl(pnl);
    this.deps.store.appendTrade({
      instanceId: this.deps.instanceId,
      orderId: order.id,
      symbol: position.symbol,
      side: order.side,
      quantity,
      price: exitPrice,
      status: order.status,
      strategyName: null,
      reason,
      realizedPnl: pnl,
      timestamp: this.now(),
    });
    return pnl;
  }

  /**
   * Places the reduce-only order and follows it to a terminal state. Resolves
   * FILLED, or CANCELED with a partial fill; throws when nothing filled.
   */
  private async submitReduce(position: Position, quantity: number, price: number): Promise<Order> {
    const t0 = performance.now();
    const placed = await this.deps.client.placeOrder({
      symbol: position.symbol,
      side: exitSide(position),
      type: "MARKET",
      quantity,
      price,
      reduceOnly: true,
    });
    log.info({ action: "placeOrder", instanceId: this.deps.instanceId, orderId: placed.id, symbol: position.symbol, reduceOnly: true, latencyMs: Math.round(performance.now() - t0) }, "Reduce-only order placed");

    const order = await this.awaitFill(placed);
    if (order.status !== "FILLED" && order.filledQuantity <= 0) {
      throw new ExchangeError(order.status, `reduce-only order ${order.id} ${order.status.toLowerCase()}`);
    }
    return order;
  }

  private async awaitFill(placed: Order): Promise<Order> {
    const { client, instanceId } = this.deps;
    const { fillCheckDelayMs, fillCheckAttempts } = this.deps.config();
    let latest = placed;

    for (let attempt = 1; attempt <= fillCheckAttempts && !isTerminal(latest.status); attempt++) {
      await this.sleep(fillCheckDelayMs);
      try {
        latest = await client.getOrder(placed.symbol, placed.id);
      } catch (err) {
        log.warn({ action: "awaitFill", instanceId, orderId: placed.id, attempt, err }, "Close order status check failed");
      }
    }
    if (isTerminal(latest.status)) return latest;

    log.warn({ action: "awaitFill", instanceId, orderId: placed.id, status: latest.status, attempts: fillCheckAttempts }, "Close order not filled in time, cancelling");
    await client.cancelOrder(placed.symbol, placed.id);
    return { ...latest, status: "CANCELED" };
  }
}
