import { logger } from "../lib/logger.js";
import { errorMessage } from "../lib/errors.js";
import { abortableSleep, type Sleep } from "../lib/abortable-sleep.js";
import { isTerminal } from "../domain/order-status.js";
import { sideToPosition } from "../domain/risk-manager.js";
import type { PositionBook } from "../domain/position-book.js";
import type { EventRecorder, NotificationSink, PersistenceStore } from "../types/collaborators.js";
import type { ExchangeClient, Order } from "../types/exchange-client.js";
import { formatOrderMessage, notifySafely } from "../adapters/notifier.js";

const log = logger.createChild("fillMonitor");

export interface FillMonitorDeps {
  instanceId: string;
  mode: string;
  client: ExchangeClient;
  positions: PositionBook;
  store: PersistenceStore;
  notifier: NotificationSink;
  events: EventRecorder;
  delayMs: number;
  attempts: number;
  leverage: number;
  now?: () => number;
  sleep?: Sleep;
}

export interface FillContext {
  stopLoss: number;
}

/**
 * Follows submitted orders to a terminal state. A fill opens (or extends) the
 * position; an order still open after the last check is cancelled and any
 * partial fill is kept.
 */
export class FillMonitor {
  private deps: FillMonitorDeps;
  private now: () => number;
  private sleep: Sleep;
  private tracked = new Map<string, Order>();
  private tasks = new Set<Promise<void>>();
  private controller = new AbortController();

  constructor(deps: FillMonitorDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;
  }

  /** Orders submitted but not yet resolved. */
  pending(): Order[] {
    return [...this.tracked.values()];
  }

  track(order: Order, ctx: FillContext): void {
    if (isTerminal(order.status)) {
      this.resolve(order, ctx);
      return;
    }
    this.tracked.set(order.id, order);
    const task = this.poll(order, ctx)
      .catch((err: unknown) => {
        log.error({ action: "poll", orderId: order.id, err }, "Fill monitor failed");
      })
      .finally(() => {
        this.tracked.delete(order.id);
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  /** Wait for every in-flight poll. */
  async drain(): Promise<void> {
    await Promise.all([...this.tasks]);
  }

  /** Abort polling; orders stay on the exchange untouched. */
  async stop(): Promise<void> {
    this.controller.abort();
    await this.drain();
    this.controller = new AbortController();
  }

  private async poll(order: Order, ctx: FillContext): Promise<void> {
    const { client, delayMs, attempts } = this.deps;
    const signal = this.controller.signal;
    let latest = order;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      if (!(await this.sleep(delayMs, signal))) {
        log.debug({ action: "poll", orderId: order.id }, "Fill polling aborted");
        return;
      }
      try {
        latest = await client.getOrder(order.symbol, order.id, { signal });
      } catch (err) {
        log.warn({ action: "poll", orderId: order.id, attempt, err }, "Order status check failed");
        continue;
      }
      this.tracked.set(order.id, latest);
      if (isTerminal(latest.status)) {
        this.resolve(latest, ctx);
        return;
      }
    }

    log.warn({ action: "poll", orderId: order.id, status: latest.status, attempts }, "Order not filled in time, cancelling");
    try {
      await client.cancelOrder(order.symbol, order.id, { signal });
    } catch (err) {
      log.error({ action: "cancel", orderId: order.id, err }, "Cancel failed");
      this.deps.events.record("error", { instanceId: this.deps.instanceId, orderId: order.id, message: errorMessage(err) });
      return;
    }
    this.resolve({ ...latest, status: "CANCELED" }, ctx);
  }

  private resolve(order: Order, ctx: FillContext): void {
    const { instanceId, store, events, notifier, mode } = this.deps;
    const filled = order.filledQuantity > 0;
    const type = order.status === "FILLED" ? "order_filled" : order.status === "REJECTED" ? "order_rejected" : "order_cancelled";

    events.record(type, { instanceId, orderId: order.id, symbol: order.symbol, filledQuantity: order.filledQuantity });
    store.appendTrade({
      instanceId,
      orderId: order.id,
      symbol: order.symbol,
      side: order.side,
      quantity: order.filledQuantity,
      price: order.avgFillPrice > 0 ? order.avgFillPrice : order.price,
      status: order.status,
      strategyName: order.strategyName,
      reason: null,
      realizedPnl: null,
      timestamp: this.now(),
    });

    if (!filled) {
      log.info({ action: "resolve", orderId: order.id, status: order.status }, "Order ended without fill");
      return;
    }

    this.applyFill(order, ctx);
    void notifySafely(notifier, "Order filled", formatOrderMessage(order, instanceId, mode));
  }

  private applyFill(order: Order, ctx: FillContext): void {
    const { positions, events, instanceId, leverage } = this.deps;
    const side = sideToPosition(order.side);
    const price = order.avgFillPrice > 0 ? order.avgFillPrice : order.price;

    if (positions.has(order.symbol, side)) {
      const extended = positions.extend(order.symbol, side, order.filledQuantity, price);
      log.info({ action: "extend", symbol: order.symbol, side, size: extended?.size }, "Position extended");
      return;
    }

    positions.open({
      symbol: order.symbol,
      side,
      size: order.filledQuantity,
      entryPrice: price,
      leverage,
      stopLossPrice: ctx.stopLoss,
      openedAt: this.now(),
    });
    events.record("position_opened", { instanceId, symbol: order.symbol, side, size: order.filledQuantity, entryPrice: price, stopLoss: ctx.stopLoss });
    log.info({ action: "open", symbol: order.symbol, side, size: order.filledQuantity, entryPrice: price }, "Position opened");
  }
}
