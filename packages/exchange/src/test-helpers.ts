import { vi } from "vitest";
import type { ExchangeClient, Order } from "./types/exchange-client.js";
import type { Position } from "./types/trading.js";
import type { EventRecorder, NotificationSink, PersistenceStore } from "./types/collaborators.js";
import { EngineConfigSchema, InstanceConfigSchema, type EngineConfig, type InstanceConfig } from "./types/config.js";

export const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);

export function createMockClient(overrides: Partial<ExchangeClient> = {}): ExchangeClient {
  return {
    getBalances: vi.fn().mockResolvedValue([{ asset: "USDT", free: 1000, frozen: 0 }]),
    getQuoteBalance: vi.fn().mockResolvedValue(1000),
    getPositions: vi.fn().mockResolvedValue([]),
    placeOrder: vi.fn(),
    getOrder: vi.fn(),
    cancelOrder: vi.fn().mockResolvedValue(undefined),
    getOpenOrders: vi.fn().mockResolvedValue([]),
    getKlines: vi.fn().mockResolvedValue([]),
    getTicker: vi.fn().mockResolvedValue({ symbol: "BTC_USDT", price: 100, bid: null, ask: null, volume24h: null, timestamp: NOW }),
    getDepth: vi.fn().mockResolvedValue({ bids: [], asks: [], timestamp: NOW }),
    getTrades: vi.fn().mockResolvedValue([]),
    getServerTime: vi.fn().mockResolvedValue(NOW),
    ...overrides,
  };
}

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: "ORD-1",
    clientOrderId: null,
    symbol: "BTC_USDT",
    side: "BUY",
    type: "MARKET",
    quantity: 1,
    price: 100,
    filledQuantity: 0,
    avgFillPrice: 0,
    status: "PENDING",
    strategyName: "RSI",
    createdAt: NOW,
    ...overrides,
  };
}

export function makeInstanceConfig(overrides: Partial<InstanceConfig> = {}): InstanceConfig {
  return {
    ...InstanceConfigSchema.parse({ id: "main", symbol: "BTC_USDT", enabled: true, strategies: [{ kind: "RSI" }] }),
    ...overrides,
  };
}

export function makeEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...EngineConfigSchema.parse({
      exchange: { baseUrl: "https://api.test", wsUrls: ["wss://ws.test/a", "wss://ws.test/b"] },
      instances: [{ id: "main", symbol: "BTC_USDT", enabled: true, strategies: [{ kind: "RSI" }] }],
    }),
    ...overrides,
  };
}

export function makePosition(overrides: Partial<Position> = {}): Position {
  return {
    symbol: "BTC_USDT",
    side: "long",
    size: 1,
    entryPrice: 100,
    markPrice: 100,
    leverage: 1,
    unrealizedPnl: 0,
    realizedPnl: 0,
    tp1Hit: false,
    tp2Hit: false,
    breakevenMoved: false,
    trailingEnabled: false,
    trailingStopPrice: null,
    stopLossPrice: 98.5,
    lastTrailingPrice: null,
    exitTriggered: false,
    exitReason: null,
    openedAt: NOW,
    ...overrides,
  };
}

export function createMockStore(overrides: Partial<PersistenceStore> = {}): PersistenceStore {
  return {
    appendTrade: vi.fn(),
    appendLog: vi.fn(),
    getUserSettings: vi.fn().mockReturnValue(null),
    saveUserSettings: vi.fn(),
    ...overrides,
  };
}

export function createMockNotifier(): NotificationSink {
  return { notify: vi.fn().mockResolvedValue(undefined) };
}

export function createMockEvents(): EventRecorder {
  return { record: vi.fn() };
}

/** Event types passed to `record`, in call order. */
export function recordedTypes(events: EventRecorder): string[] {
  return vi.mocked(events.record).mock.calls.map(([type]) => type);
}
