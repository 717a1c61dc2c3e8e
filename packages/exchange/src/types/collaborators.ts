import { z } from "zod";
import { StrategyConfigSchema } from "@tradeloop/strategy";
import type { EngineConfig } from "./config.js";
import type { EventType } from "./events.js";
import type { OrderSide, OrderStatus } from "./exchange-client.js";

/** Hands out a fresh copy on every `get`; a reload never changes a copy already handed out. */
export interface ConfigProvider {
  get(): EngineConfig;
  reload(): Promise<EngineConfig>;
}

export interface TradeRecord {
  instanceId: string;
  orderId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  price: number;
  status: OrderStatus;
  strategyName: string | null;
  reason: string | null;
  realizedPnl: number | null;
  timestamp: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  instanceId: string;
  level: LogLevel;
  message: string;
  timestamp: number;
}

export const UserSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  strategies: z.array(StrategyConfigSchema).min(1).optional(),
});

export type UserSettings = z.infer<typeof UserSettingsSchema>;

export interface PersistenceStore {
  appendTrade(trade: TradeRecord): void;
  appendLog(entry: LogEntry): void;
  getUserSettings(instanceId: string): UserSettings | null;
  saveUserSettings(instanceId: string, settings: UserSettings): void;
}

export interface NotificationSink {
  notify(title: string, message: string): Promise<void>;
}

export interface EventRecorder {
  record(type: EventType, data?: Record<string, unknown>): void;
}
