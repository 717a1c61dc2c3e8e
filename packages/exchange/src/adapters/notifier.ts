import got, { RequestError } from "got";
import { logger } from "../lib/logger.js";
import type { NotificationSink } from "../types/collaborators.js";
import type { Order } from "../types/exchange-client.js";
import type { CloseReason, Position } from "../types/trading.js";

const log = logger.createChild("notifier");

function networkErrorContext(err: unknown): Record<string, unknown> {
  if (!(err instanceof RequestError)) return { err };
  const body = err.response?.body;
  return {
    err,
    endpoint: err.options.url?.toString(),
    statusCode: err.response?.statusCode,
    responseBody: typeof body === "string" ? body.slice(0, 200) : undefined,
    code: err.code,
  };
}

function formatUsd(n: number): string {
  return n.toLocaleString("en-US", { style: "currency", currency: "USD" });
}

export function formatOrderMessage(order: Order, instanceId: string, mode: string): string {
  return [
    `${order.side} ${order.symbol} ${order.status}`,
    `Qty: ${order.quantity}`,
    `Price: ${formatUsd(order.price)}`,
    `Strategy: ${order.strategyName ?? "-"}`,
    `Instance: ${instanceId} (${mode})`,
  ].join("\n");
}

export function formatCloseMessage(position: Position, reason: CloseReason, exitPrice: number, realizedPnl: number): string {
  const sign = realizedPnl >= 0 ? "+" : "-";
  return [
    `${position.symbol} ${position.side.toUpperCase()} closed (${reason})`,
    `Entry: ${formatUsd(position.entryPrice)} -> Exit: ${formatUsd(exitPrice)}`,
    `PnL: ${sign}${formatUsd(Math.abs(realizedPnl))}`,
  ].join("\n");
}

/** Posts `{title, message}` JSON to a webhook. Failures are logged and rethrown. */
export class WebhookNotificationSink implements NotificationSink {
  private url: string;

  constructor(url: string) {
    this.url = url;
  }

  async notify(title: string, message: string): Promise<void> {
    const t0 = performance.now();
    try {
      await got.post(this.url, {
        json: { title, message },
        timeout: { request: 10_000 },
        retry: { limit: 1 },
      });
      log.info({ action: "notify", title, latencyMs: Math.round(performance.now() - t0) }, "Notification sent");
    } catch (err) {
      log.warn({ action: "notify", title, latencyMs: Math.round(performance.now() - t0), ...networkErrorContext(err) }, "Notification failed");
      throw err;
    }
  }
}

/** Used when no webhook is configured. */
export class LogNotificationSink implements NotificationSink {
  async notify(title: string, message: string): Promise<void> {
    log.info({ action: "notify", title, message }, "Notification");
  }
}

/** Notify without letting a delivery failure reach the trading path. */
export async function notifySafely(sink: NotificationSink, title: string, message: string): Promise<void> {
  try {
    await sink.notify(title, message);
  } catch (err) {
    log.warn({ action: "notifySafely", title, err }, "Notification dropped");
  }
}
