import Database from "better-sqlite3";
import {
  UserSettingsSchema,
  type LogEntry,
  type LogLevel,
  type PersistenceStore,
  type TradeRecord,
  type UserSettings,
} from "../types/collaborators.js";
import type { OrderSide, OrderStatus } from "../types/exchange-client.js";

interface TradeRow {
  id: number;
  instance_id: string;
  order_id: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  price: number;
  status: OrderStatus;
  strategy_name: string | null;
  reason: string | null;
  realized_pnl: number | null;
  created_at: number;
}

interface LogRow {
  id: number;
  instance_id: string;
  level: LogLevel;
  message: string;
  created_at: number;
}

// Each entry runs once, in order; PRAGMA user_version records how many have run.
const MIGRATIONS = [
  `
  CREATE TABLE trades (
    id INTEGER PRIMARY KEY,
    instance_id TEXT NOT NULL,
    order_id TEXT NOT NULL,
    symbol TEXT NOT NULL,
    side TEXT NOT NULL,
    quantity REAL NOT NULL,
    price REAL NOT NULL,
    status TEXT NOT NULL,
    strategy_name TEXT,
    reason TEXT,
    realized_pnl REAL,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX idx_trades_instance ON trades(instance_id, created_at);

  CREATE TABLE logs (
    id INTEGER PRIMARY KEY,
    instance_id TEXT NOT NULL,
    level TEXT NOT NULL,
    message TEXT NOT NULL,
    created_at INTEGER NOT NULL
  );

  CREATE TABLE user_settings (
    instance_id TEXT PRIMARY KEY,
    settings TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  );
  `,
];

function toTradeRecord(row: TradeRow): TradeRecord {
  return {
    instanceId: row.instance_id,
    orderId: row.order_id,
    symbol: row.symbol,
    side: row.side,
    quantity: row.quantity,
    price: row.price,
    status: row.status,
    strategyName: row.strategy_name,
    reason: row.reason,
    realizedPnl: row.realized_pnl,
    timestamp: row.created_at,
  };
}

export class SqliteStore implements PersistenceStore {
  private db: Database.Database;

  constructor(dbPath: string = ":memory:") {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate(): void {
    const current = this.schemaVersion();
    const apply = this.db.transaction(() => {
      for (let v = current; v < MIGRATIONS.length; v++) {
        this.db.exec(MIGRATIONS[v]);
      }
      this.db.pragma(`user_version = ${MIGRATIONS.length}`);
    });
    if (current < MIGRATIONS.length) apply();
  }

  schemaVersion(): number {
    const version = this.db.pragma("user_version", { simple: true });
    return typeof version === "number" ? version : 0;
  }

  appendTrade(trade: TradeRecord): void {
    this.db.prepare(`
      INSERT INTO trades (instance_id, order_id, symbol, side, quantity, price, status, strategy_name, reason, realized_pnl, created_at)
      VALUES (@instance_id, @order_id, @symbol, @side, @quantity, @price, @status, @strategy_name, @reason, @realized_pnl, @created_at)
    `).run({
      instance_id: trade.instanceId,
      order_id: trade.orderId,
      symbol: trade.symbol,
      side: trade.side,
      quantity: trade.quantity,
      price: trade.price,
      status: trade.status,
      strategy_name: trade.strategyName,
      reason: trade.reason,
      realized_pnl: trade.realizedPnl,
      created_at: trade.timestamp,
    });
  }

  appendLog(entry: LogEntry): void {
    this.db.prepare("INSERT INTO logs (instance_id, level, message, created_at) VALUES (?, ?, ?, ?)")
      .run(entry.instanceId, entry.level, entry.message, entry.timestamp);
  }

  getUserSettings(instanceId: string): UserSettings | null {
    const row = this.db.prepare<[string], { settings: string }>("SELECT settings FROM user_settings WHERE instance_id = ?")
      .get(instanceId);
    if (!row) return null;
    return UserSettingsSchema.parse(JSON.parse(row.settings));
  }

  saveUserSettings(instanceId: string, settings: UserSettings): void {
    const parsed = UserSettingsSchema.parse(settings);
    this.db.prepare(`
      INSERT INTO user_settings (instance_id, settings, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(instance_id) DO UPDATE SET settings = excluded.settings, updated_at = excluded.updated_at
    `).run(instanceId, JSON.stringify(parsed), Date.now());
  }

  getRecentTrades(limit: number = 50, instanceId?: string): TradeRecord[] {
    const rows = instanceId === undefined
      ? this.db.prepare<[number], TradeRow>("SELECT * FROM trades ORDER BY id DESC LIMIT ?").all(limit)
      : this.db.prepare<[string, number], TradeRow>("SELECT * FROM trades WHERE instance_id = ? ORDER BY id DESC LIMIT ?").all(instanceId, limit);
    return rows.map(toTradeRecord);
  }

  getRecentLogs(instanceId: string, limit: number = 100): LogEntry[] {
    return this.db.prepare<[string, number], LogRow>("SELECT * FROM logs WHERE instance_id = ? ORDER BY id DESC LIMIT ?")
      .all(instanceId, limit)
      .map((row) => ({ instanceId: row.instance_id, level: row.level, message: row.message, timestamp: row.created_at }));
  }

  /** Sum of realized PnL recorded since `since` (ms). */
  getRealizedPnlSince(instanceId: string, since: number): number {
    const row = this.db.prepare<[string, number], { pnl: number }>(`
      SELECT COALESCE(SUM(realized_pnl), 0) AS pnl FROM trades
      WHERE instance_id = ? AND created_at >= ?
    `).get(instanceId, since);
    return row?.pnl ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
