import { describe, it, expect, vi } from "vitest";
import { FillMonitor, type FillMonitorDeps } from "./fill-monitor.js";
import { PositionBook } from "../domain/position-book.js";
import {
  NOW,
  createMockClient,
  createMockEvents,
  createMockNotifier,
  createMockStore,
  makeOrder,
  recordedTypes,
} from "../test-helpers.js";

function createMonitor(overrides: Partial<FillMonitorDeps> = {}) {
  const deps: FillMonitorDeps = {
    instanceId: "main",
    mode: "live",
    client: createMockClient(),
    positions: new PositionBook(),
    store: createMockStore(),
    notifier: createMockNotifier(),
    events: createMockEvents(),
    delayMs: 2_000,
    attempts: 3,
    leverage: 1,
    now: () => NOW,
    sleep: vi.fn(async () => true),
    ...overrides,
  };
  return { monitor: new FillMonitor(deps), deps };
}

const filled = makeOrder({ status: "FILLED", filledQuantity: 1, avgFillPrice: 101 });

describe("FillMonitor", () => {
  it("opens a position straight away for an order that is already filled", () => {
    const { monitor, deps } = createMonitor();

    monitor.track(filled, { stopLoss: 98 });

    expect(deps.client.getOrder).not.toHaveBeenCalled();
    expect(deps.positions.get("BTC_USDT", "long")).toMatchObject({ size: 1, entryPrice: 101, stopLossPrice: 98, openedAt: NOW });
    expect(recordedTypes(deps.events)).toEqual(["order_filled", "position_opened"]);
    expect(deps.store.appendTrade).toHaveBeenCalledWith(expect.objectContaining({ orderId: "ORD-1", status: "FILLED", quantity: 1, price: 101 }));
    expect(deps.notifier.notify).toHaveBeenCalledWith("Order filled", expect.stringContaining("BUY BTC_USDT FILLED"));
  });

  it("polls until the order fills", async () => {
    const getOrder = vi.fn()
      .mockResolvedValueOnce(makeOrder({ status: "PENDING" }))
      .mockResolvedValueOnce(filled);
    const { monitor, deps } = createMonitor({ client: createMockClient({ getOrder }) });

    monitor.track(makeOrder(), { stopLoss: 98 });
    expect(monitor.pending().map((o) => o.id)).toEqual(["ORD-1"]);
    await monitor.drain();

    expect(getOrder).toHaveBeenCalledTimes(2);
    expect(getOrder).toHaveBeenCalledWith("BTC_USDT", "ORD-1", expect.objectContaining({ signal: expect.any(AbortSignal) }));
    expect(deps.sleep).toHaveBeenCalledWith(2_000, expect.any(AbortSignal));
    expect(deps.positions.count()).toBe(1);
    expect(monitor.pending()).toEqual([]);
  });

  it("ends tracking on rejection without a position", async () => {
    const getOrder = vi.fn().mockResolvedValue(makeOrder({ status: "REJECTED" }));
    const { monitor, deps } = createMonitor({ client: createMockClient({ getOrder }) });

    monitor.track(makeOrder(), { stopLoss: 98 });
    await monitor.drain();

    expect(deps.positions.count()).toBe(0);
    expect(recordedTypes(deps.events)).toEqual(["order_rejected"]);
    expect(deps.notifier.notify).not.toHaveBeenCalled();
  });

  it("cancels an order still open after the last check and keeps the partial fill", async () => {
    const partial = makeOrder({ status: "PARTIALLY_FILLED", filledQuantity: 0.4, avgFillPrice: 100 });
    const client = createMockClient({ getOrder: vi.fn().mockResolvedValue(partial) });
    const { monitor, deps } = createMonitor({ client });

    monitor.track(makeOrder(), { stopLoss: 98 });
    await monitor.drain();

    expect(client.getOrder).toHaveBeenCalledTimes(3);
    expect(client.cancelOrder).toHaveBeenCalledWith("BTC_USDT", "ORD-1", expect.anything());
    expect(recordedTypes(deps.events)).toEqual(["order_cancelled", "position_opened"]);
    expect(deps.positions.get("BTC_USDT", "long")?.size).toBe(0.4);
  });

  it("keeps polling after a failed status check", async () => {
    const getOrder = vi.fn()
      .mockRejectedValueOnce(new Error("timeout"))
      .mockResolvedValueOnce(filled);
    const { monitor, deps } = createMonitor({ client: createMockClient({ getOrder }) });

    monitor.track(makeOrder(), { stopLoss: 98 });
    await monitor.drain();

    expect(deps.positions.count()).toBe(1);
  });

  it("extends an open position on a second fill", () => {
    const { monitor, deps } = createMonitor();

    monitor.track(makeOrder({ status: "FILLED", filledQuantity: 1, avgFillPrice: 100 }), { stopLoss: 98 });
    monitor.track(makeOrder({ id: "ORD-2", status: "FILLED", filledQuantity: 1, avgFillPrice: 110 }), { stopLoss: 107 });

    expect(deps.positions.get("BTC_USDT", "long")).toMatchObject({ size: 2, entryPrice: 105, stopLossPrice: 98 });
  });

  it("stops polling when stopped", async () => {
    const sleep = vi.fn((_ms: number, signal?: AbortSignal) => new Promise<boolean>((resolve) => {
      signal?.addEventListener("abort", () => resolve(false), { once: true });
    }));
    const { monitor, deps } = createMonitor({ sleep });

    monitor.track(makeOrder(), { stopLoss: 98 });
    await monitor.stop();

    expect(deps.client.getOrder).not.toHaveBeenCalled();
    expect(deps.client.cancelOrder).not.toHaveBeenCalled();
    expect(monitor.pending()).toEqual([]);
  });
});
