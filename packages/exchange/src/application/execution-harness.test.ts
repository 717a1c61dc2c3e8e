import { describe, it, expect, vi } from "vitest";
import { entrySignal, holdSignal, type Candle, type Signal, type Strategy, type StrategyInput } from "@tradeloop/strategy";
import { ExecutionHarness, validateSignal, type ExecutionHarnessDeps } from "./execution-harness.js";
import { FillMonitor } from "./fill-monitor.js";
import { DailyLedger } from "../domain/daily-ledger.js";
import { PositionBook } from "../domain/position-book.js";
import { ExchangeError } from "../lib/errors.js";
import type { ExchangeClient, RequestOptions } from "../types/exchange-client.js";
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

function buySignal(overrides: Partial<Parameters<typeof entrySignal>[0]> = {}): Signal {
  return entrySignal({
    symbol: "BTC_USDT",
    side: "BUY",
    price: 100,
    quantity: 1,
    stopLossPct: 2,
    takeProfitPct: 4,
    strategyName: "Fake",
    confidence: 0.8,
    reason: "test buy",
    timestamp: NOW,
    ...overrides,
  });
}

function fakeStrategy(evaluate: (input: StrategyInput) => Signal): Strategy {
  return { kind: "Advanced", name: "Fake", params: {}, candles: { interval: "5m", bars: 50 }, evaluate };
}

function createHarness(client: ExchangeClient = createMockClient()) {
  const positions = new PositionBook();
  const ledger = new DailyLedger(() => NOW);
  const store = createMockStore();
  const notifier = createMockNotifier();
  const events = createMockEvents();
  const fillMonitor = new FillMonitor({
    instanceId: "main",
    mode: "live",
    client,
    positions,
    store,
    notifier,
    events,
    delayMs: 2_000,
    attempts: 3,
    leverage: 1,
    now: () => NOW,
    sleep: async () => true,
  });
  const deps: ExecutionHarnessDeps = {
    instanceId: "main",
    mode: "live",
    quoteAsset: "USDT",
    client,
    positions,
    ledger,
    fillMonitor,
    store,
    notifier,
    events,
    now: () => NOW,
  };
  return { harness: new ExecutionHarness(deps), ...deps };
}

function candlesFrom(closeSeries: number[]): Candle[] {
  return closeSeries.map((c, i) => ({ t: NOW - (closeSeries.length - i) * 300_000, o: c, h: c, l: c, c, v: 100 }));
}

const config = makeInstanceConfig();

describe("ExecutionHarness.runCycle", () => {
  it("holds outside trading hours without touching the exchange", async () => {
    const { harness, client } = createHarness();
    const hours = { enabled: true, start: "00:00", end: "01:00", timezone: "UTC" };

    const result = await harness.runCycle({ config: { ...config, tradingHours: hours }, strategies: [fakeStrategy(buySignal)] });

    expect(result).toEqual({ action: "HOLD", reason: "Outside trading hours", health: undefined });
    expect(client.getQuoteBalance).not.toHaveBeenCalled();
  });

  it("holds when the balance is below the minimum", async () => {
    const { harness } = createHarness(createMockClient({ getQuoteBalance: vi.fn().mockResolvedValue(5) }));

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(buySignal)] });

    expect(result.reason).toBe("Insufficient balance ($5.00 < $10)");
  });

  it("holds when neither the balance nor the API answers", async () => {
    const client = createMockClient({
      getQuoteBalance: vi.fn().mockRejectedValue(new Error("down")),
      getServerTime: vi.fn().mockRejectedValue(new Error("down")),
    });
    const { harness } = createHarness(client);

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(buySignal)] });

    expect(result.action).toBe("HOLD");
    expect(result.reason).toBe("Unhealthy: apiReachable, balanceAvailable failed");
    expect(result.health?.status).toBe("UNHEALTHY");
  });

  it("proceeds when degraded", async () => {
    const client = createMockClient({ getQuoteBalance: vi.fn().mockRejectedValue(new Error("down")) });
    const { harness } = createHarness(client);
    const evaluate = vi.fn((input: StrategyInput) => holdSignal(input.symbol, "Fake", "idle", input.now));

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(evaluate)] });

    expect(result.health?.status).toBe("DEGRADED");
    expect(result.reason).toBe("idle");
    expect(evaluate).toHaveBeenCalledWith(expect.objectContaining({ balance: 0, price: 0, now: NOW }));
  });

  it("submits an approved signal and opens the filled position", async () => {
    const filled = makeOrder({ status: "FILLED", filledQuantity: 1, avgFillPrice: 100, strategyName: "Fake" });
    const client = createMockClient({ placeOrder: vi.fn().mockResolvedValue(filled) });
    const { harness, positions, ledger, events, store } = createHarness(client);

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal())], lastPrice: 100 });

    expect(result.action).toBe("BUY");
    expect(result.reason).toBe("test buy");
    expect(result.order?.id).toBe("ORD-1");
    expect(client.getKlines).toHaveBeenCalledWith("BTC_USDT", "5m", 50, { signal: expect.any(AbortSignal) });
    expect(client.placeOrder).toHaveBeenCalledWith(
      { symbol: "BTC_USDT", side: "BUY", type: "MARKET", quantity: 1, price: 100, strategyName: "Fake" },
      { signal: undefined },
    );
    expect(ledger.snapshot().trades).toBe(1);
    expect(positions.get("BTC_USDT", "long")).toMatchObject({ size: 1, entryPrice: 100, stopLossPrice: 98 });
    expect(store.appendTrade).toHaveBeenCalledTimes(2);
    expect(recordedTypes(events)).toEqual(["signal_generated", "order_placed", "order_filled", "position_opened", "cycle_completed"]);
  });

  it("passes the streamed price and balance to the strategy", async () => {
    const { harness } = createHarness();
    const evaluate = vi.fn((input: StrategyInput) => holdSignal(input.symbol, "Fake", "idle", input.now));

    await harness.runCycle({ config, strategies: [fakeStrategy(evaluate)], lastPrice: 101.5 });

    expect(evaluate).toHaveBeenCalledWith(expect.objectContaining({ symbol: "BTC_USDT", price: 101.5, balance: 1000 }));
  });

  it("returns HOLD signals as they are", async () => {
    const { harness, client } = createHarness();

    const result = await harness.runCycle({
      config,
      strategies: [fakeStrategy((input) => holdSignal(input.symbol, "Fake", "RSI neutral (50.00)", input.now))],
    });

    expect(result.action).toBe("HOLD");
    expect(result.reason).toBe("RSI neutral (50.00)");
    expect(client.placeOrder).not.toHaveBeenCalled();
  });

  it("holds on a risk rejection", async () => {
    const { harness, client, events } = createHarness();

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal({ confidence: 0.5 }))] });

    expect(result.reason).toBe("Risk check failed: Confidence 0.50 below min 0.6");
    expect(client.placeOrder).not.toHaveBeenCalled();
    expect(recordedTypes(events)).toContain("risk_check_failed");
  });

  it("gates margin on free funds", async () => {
    const { harness, client } = createHarness(createMockClient({ getQuoteBalance: vi.fn().mockResolvedValue(50) }));

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal())] });

    expect(result.reason).toBe("Risk check failed: Insufficient margin: $50.00 < $120.00 required");
    expect(client.placeOrder).not.toHaveBeenCalled();
  });

  it("refuses a second order while one is open on the exchange", async () => {
    const client = createMockClient({ getOpenOrders: vi.fn().mockResolvedValue([makeOrder()]) });
    const { harness } = createHarness(client);

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal())] });

    expect(result.reason).toBe("Risk check failed: Open BUY order already exists for BTC_USDT");
  });

  it("holds with the exchange's reason when submission fails", async () => {
    const client = createMockClient({ placeOrder: vi.fn().mockRejectedValue(new ExchangeError(50001, "bad quantity")) });
    const { harness, ledger } = createHarness(client);

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal())] });

    expect(result).toMatchObject({ action: "HOLD", reason: "Order failed: Exchange error 50001: bad quantity" });
    expect(ledger.snapshot().trades).toBe(0);
  });

  it("holds on an invalid signal", async () => {
    const { harness } = createHarness();

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal({ stopLossPct: -2 }))] });

    expect(result.reason).toBe("Invalid signal: Stop loss 102 on the wrong side of BUY at 100");
  });

  it("holds when open orders cannot be listed", async () => {
    const client = createMockClient({ getOpenOrders: vi.fn().mockRejectedValue(new Error("503")) });
    const { harness } = createHarness(client);

    const result = await harness.runCycle({ config, strategies: [fakeStrategy(() => buySignal())] });

    expect(result.reason).toBe("Open orders unavailable: 503");
  });

  it("falls back to RSI when the strategy throws", async () => {
    const { harness, events } = createHarness();
    const failing = fakeStrategy(() => {
      throw new Error("boom");
    });

    const result = await harness.runCycle({ config, strategies: [failing] });

    expect(result.action).toBe("HOLD");
    expect(result.reason).toBe("Unable to get current price");
    expect(recordedTypes(events)).toContain("evaluation_failed");
    expect(harness.getExecutionStats()).toEqual([
      expect.objectContaining({ strategyName: "Fake", successCount: 0, failureCount: 1 }),
      expect.objectContaining({ strategyName: "RSI", successCount: 1, failureCount: 0 }),
    ]);
  });

  it("times out a hung evaluation, aborts it and reports both failures", async () => {
    const getKlines = vi.fn((_symbol: string, _interval: string, _limit: number, _opts?: RequestOptions) => new Promise<Candle[]>(() => {}));
    const { harness } = createHarness(createMockClient({ getKlines }));

    const result = await harness.runCycle({
      config: { ...config, evaluationTimeoutMs: 20 },
      strategies: [fakeStrategy(() => buySignal())],
    });

    expect(result.action).toBe("HOLD");
    expect(result.reason).toBe("Strategy Fake timed out after 20ms; fallback RSI failed: Strategy RSI timed out after 20ms");
    expect(getKlines.mock.calls[0]?.[3]).toEqual({ signal: expect.objectContaining({ aborted: true }) });
  });

  it("blocks a signal the RSI filter rejects", async () => {
    const client = createMockClient({
      getKlines: vi.fn().mockResolvedValue(candlesFrom([100, 99, 98, 97, 98, 99, 100, 101, 102, 103, 104, 105, 106, 106, 106])),
    });
    const { harness } = createHarness(client);
    const filtered = { ...config, rsiFilter: { ...config.rsiFilter, enabled: true, mode: "reduced" as const } };

    const result = await harness.runCycle({ config: filtered, strategies: [fakeStrategy(() => buySignal())] });

    expect(result.reason).toBe("RSI filter blocked: Reduced mode LONG: RSI short (75.00) < 30");
    expect(client.placeOrder).not.toHaveBeenCalled();
  });

  it("reads the RSI filter from its own timeframes", async () => {
    const falling = candlesFrom(Array.from({ length: 20 }, (_, i) => 120 - i));
    const rising = candlesFrom(Array.from({ length: 20 }, (_, i) => 100 + i));
    const getKlines = vi.fn(async (_symbol: string, interval: string, _limit: number, _opts?: RequestOptions) => (interval === "1h" ? rising : falling));
    const client = createMockClient({ getKlines });
    const { harness } = createHarness(client);
    const filtered = { ...config, rsiFilter: { ...config.rsiFilter, enabled: true } };

    const result = await harness.runCycle({ config: filtered, strategies: [fakeStrategy(() => buySignal())] });

    expect(result.reason).toBe("RSI filter blocked: Normal mode LONG: RSI short (0.00) < 30 AND RSI long (100.00) < 50");
    expect(getKlines.mock.calls.map(([, interval, limit]) => [interval, limit])).toEqual([["5m", 50], ["1h", 100]]);
    expect(client.placeOrder).not.toHaveBeenCalled();
  });

  it("holds without strategies", async () => {
    const { harness } = createHarness();

    const result = await harness.runCycle({ config, strategies: [] });

    expect(result.reason).toBe("No strategy loaded");
    expect(result.health?.status).toBe("DEGRADED");
  });
});

describe("validateSignal", () => {
  it("returns the stop of a valid signal", () => {
    expect(validateSignal(buySignal())).toBe(98);
  });

  it("rejects HOLD", () => {
    expect(() => validateSignal(holdSignal("BTC_USDT", "Fake", "idle", NOW))).toThrow("Signal not actionable: quantity 0, price 0");
  });

  it("rejects a SELL with its stop below the price", () => {
    expect(() => validateSignal(buySignal({ side: "SELL", stopLossPct: -2 }))).toThrow("Stop loss 98 on the wrong side of SELL at 100");
  });
});
