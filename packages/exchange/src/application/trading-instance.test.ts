import { describe, it, expect, vi } from "vitest";
import type { Candle } from "@tradeloop/strategy";
import { TradingInstance, type TradingInstanceDeps } from "./trading-instance.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import type { Sleep } from "../lib/abortable-sleep.js";
import { EngineConfigSchema, type InstanceConfig } from "../types/config.js";
import type { ExchangeClient } from "../types/exchange-client.js";
import type { PersistenceStore } from "../types/collaborators.js";
import {
  NOW,
  createMockClient,
  createMockEvents,
  createMockNotifier,
  createMockStore,
  makeInstanceConfig,
  makeOrder,
  recordedTypes,
} from "../test-helpers.js";

/** Sleeps with a signal park until aborted; sleeps without one return at once. */
function gatedSleep() {
  const calls: number[] = [];
  const sleep: Sleep = (ms, signal) => {
    calls.push(ms);
    if (!signal) return Promise.resolve(true);
    return new Promise((resolve) => {
      if (signal.aborted) return resolve(false);
      signal.addEventListener("abort", () => resolve(false), { once: true });
    });
  };
  return { sleep, calls };
}

// Strictly falling closes: RSI 0, so the RSI strategy buys at the last close.
const FALLING: Candle[] = Array.from({ length: 21 }, (_, i) => {
  const c = 120 - i;
  return { t: NOW - (21 - i) * 300_000, o: c, h: c, l: c, c, v: 10 };
});

function createInstance(opts: {
  client?: ExchangeClient;
  store?: PersistenceStore;
  config?: Partial<InstanceConfig>;
  feed?: TradingInstanceDeps["feed"];
} = {}) {
  const { sleep, calls } = gatedSleep();
  const client = opts.client ?? createMockClient();
  const store = opts.store ?? createMockStore();
  const events = createMockEvents();
  const instance = new TradingInstance({
    config: makeInstanceConfig(opts.config),
    mode: "live",
    quoteAsset: "USDT",
    client,
    store,
    notifier: createMockNotifier(),
    events,
    feed: opts.feed,
    now: () => NOW,
    sleep,
  });
  return { instance, client, store, events, calls };
}

function buyingClient(overrides: Partial<ExchangeClient> = {}): ExchangeClient {
  return createMockClient({
    getKlines: vi.fn().mockResolvedValue(FALLING),
    placeOrder: vi.fn().mockResolvedValue(makeOrder({ quantity: 5, filledQuantity: 5, avgFillPrice: 100, status: "FILLED" })),
    ...overrides,
  });
}

describe("TradingInstance loop", () => {
  it("runs a cycle, sleeps the heartbeat interval and stops on demand", async () => {
    const { instance, events, calls } = createInstance();

    await instance.start();
    await vi.waitFor(() => expect(calls).toEqual([60_000]));

    expect(instance.getStatus()).toMatchObject({
      running: true,
      pair: "BTC_USDT",
      lastSeen: NOW,
      lastCycle: { action: "HOLD", reason: "Unable to get current price" },
    });

    await instance.stop();

    expect(instance.isRunning()).toBe(false);
    expect(recordedTypes(events)).toEqual(["instance_started", "cycle_completed", "instance_stopped"]);
  });

  it("opens a position from a filled entry and reports it in the snapshot", async () => {
    const { instance, calls } = createInstance({ client: buyingClient() });

    await instance.start();
    await vi.waitFor(() => expect(calls).toEqual([60_000]));
    const snapshot = await instance.getPortfolioSnapshot();
    await instance.stop();

    expect(snapshot.balance).toBe(1000);
    expect(snapshot.daily.trades).toBe(1);
    expect(snapshot.positions).toEqual([expect.objectContaining({ symbol: "BTC_USDT", side: "long", size: 5, stopLossPrice: expect.closeTo(98.5, 8) })]);
    expect(snapshot.executionStats).toEqual([expect.objectContaining({ strategyName: "RSI", successCount: 1 })]);
  });

  it("closes from streamed prices while the feed is connected", async () => {
    const client = buyingClient();
    const { instance, calls } = createInstance({ client, feed: { isConnected: () => true } });

    await instance.start();
    await vi.waitFor(() => expect(calls).toEqual([60_000]));
    vi.mocked(client.placeOrder).mockResolvedValue(makeOrder({ id: "ORD-2", side: "SELL", quantity: 5, filledQuantity: 5, avgFillPrice: 98, status: "FILLED" }));
    instance.onPrice(98);

    await vi.waitFor(async () => expect((await instance.getPortfolioSnapshot()).positions).toEqual([]));
    await instance.stop();

    expect(client.getTicker).not.toHaveBeenCalled();
    expect(client.placeOrder).toHaveBeenLastCalledWith(expect.objectContaining({ side: "SELL", quantity: 5, reduceOnly: true }));
  });

  it("closes a position for a symbol configured without a separator", async () => {
    const parsed = EngineConfigSchema.parse({
      exchange: { baseUrl: "https://api.test", wsUrls: ["wss://ws.test"] },
      instances: [{ id: "main", symbol: "btcusdt", enabled: true, strategies: [{ kind: "RSI" }] }],
    });
    const client = buyingClient();
    const { instance, calls } = createInstance({ client, feed: { isConnected: () => true }, config: parsed.instances[0] });

    await instance.start();
    await vi.waitFor(() => expect(calls).toEqual([60_000]));
    expect(instance.symbol).toBe("BTC_USDT");
    expect((await instance.getPortfolioSnapshot()).positions).toEqual([expect.objectContaining({ symbol: "BTC_USDT", side: "long" })]);

    vi.mocked(client.placeOrder).mockResolvedValue(makeOrder({ id: "ORD-2", side: "SELL", quantity: 5, filledQuantity: 5, avgFillPrice: 98, status: "FILLED" }));
    instance.onPrice(98);

    await vi.waitFor(async () => expect((await instance.getPortfolioSnapshot()).positions).toEqual([]));
    await instance.stop();
    expect(client.placeOrder).toHaveBeenLastCalledWith(expect.objectContaining({ symbol: "BTC_USDT", side: "SELL", reduceOnly: true }));
  });

  it("backs off after a position tick fails", async () => {
    const client = buyingClient({ getTicker: vi.fn().mockRejectedValue(new Error("ticker down")) });
    const { instance, events, calls } = createInstance({ client });

    await instance.start();
    await vi.waitFor(() => expect(calls).toEqual([30_000]));

    expect(instance.getStatus().consecutiveErrors).toBe(1);
    expect(recordedTypes(events)).toContain("error");
    await instance.stop();
  });

  it("gives up joining a hung loop after stopTimeoutMs", async () => {
    const client = createMockClient({ getQuoteBalance: vi.fn(() => new Promise<number>(() => {})) });
    const { instance } = createInstance({ client, config: { stopTimeoutMs: 10 } });

    await instance.start();
    await instance.stop();

    expect(instance.isRunning()).toBe(false);
  });
});

describe("TradingInstance control", () => {
  it("persists enable and disable", async () => {
    const { instance, store, events } = createInstance({ config: { enabled: false } });

    await instance.enable();
    expect(instance.isRunning()).toBe(true);
    expect(store.saveUserSettings).toHaveBeenLastCalledWith("main", { enabled: true, strategies: [{ kind: "RSI", params: {} }] });

    await instance.disable("test");
    expect(instance.isRunning()).toBe(false);
    expect(instance.isEnabled()).toBe(false);
    expect(store.saveUserSettings).toHaveBeenLastCalledWith("main", { enabled: false, strategies: [{ kind: "RSI", params: {} }] });
    expect(recordedTypes(events)).toContain("instance_disabled");
  });

  it("restarts an enabled instance after the restart delay", async () => {
    const { instance, calls } = createInstance();

    await instance.start();
    await vi.waitFor(() => expect(calls).toEqual([60_000]));
    await instance.restart();
    await vi.waitFor(() => expect(calls).toEqual([60_000, 2_000, 60_000]));

    expect(instance.getStatus()).toMatchObject({ running: true, restartCount: 1, lastRestart: NOW });
    await instance.stop();
  });

  it("does not start a disabled instance on restart", async () => {
    const { instance } = createInstance({ config: { enabled: false } });

    await instance.restart();

    expect(instance.getStatus()).toMatchObject({ running: false, restartCount: 1 });
  });

  it("prefers saved user settings over the config", () => {
    const store = createMockStore({
      getUserSettings: vi.fn().mockReturnValue({ enabled: false, strategies: [{ kind: "Grid", params: {} }] }),
    });
    const { instance } = createInstance({ store });

    expect(instance.isEnabled()).toBe(false);
    expect(instance.getStrategyConfigs()).toEqual([{ kind: "Grid", params: {} }]);
  });
});

describe("TradingInstance strategies", () => {
  it("appends a new kind and replaces an existing one", async () => {
    const { instance, store } = createInstance();

    await instance.addStrategy({ kind: "Grid", params: {} });
    const updated = await instance.addStrategy({ kind: "RSI", params: { oversold: 25 } });

    expect(updated).toEqual([{ kind: "RSI", params: { oversold: 25 } }, { kind: "Grid", params: {} }]);
    expect(instance.getStatus().strategies).toEqual(["RSI", "Grid"]);
    expect(store.saveUserSettings).toHaveBeenLastCalledWith("main", { enabled: true, strategies: updated });
  });

  it("rejects params outside their range", async () => {
    const { instance } = createInstance();

    await expect(instance.addStrategy({ kind: "RSI", params: { rsiPeriod: 500 } })).rejects.toBeInstanceOf(ValidationError);
    expect(instance.getStrategyConfigs()).toEqual([{ kind: "RSI", params: {} }]);
  });

  it("removes a kind but never the last one", async () => {
    const { instance } = createInstance();
    await instance.addStrategy({ kind: "DCA", params: {} });

    await expect(instance.removeStrategy("Breakout")).rejects.toBeInstanceOf(NotFoundError);
    expect(await instance.removeStrategy("RSI")).toEqual([{ kind: "DCA", params: {} }]);
    await expect(instance.removeStrategy("DCA")).rejects.toThrow("Cannot remove the last strategy of main");
  });
});
