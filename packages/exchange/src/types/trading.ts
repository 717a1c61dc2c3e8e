import type { PositionSide } from "@tradeloop/strategy";

export type { PositionSide };

export type CloseReason = "stop_loss" | "trailing_stop" | "take_profit_2" | "risk_reduce" | "manual";

/** Open position, keyed by `(symbol, side)`. */
export interface Position {
  symbol: string;
  side: PositionSide;
  size: number;
  entryPrice: number;
  markPrice: number;
  leverage: number;
  unrealizedPnl: number;
  realizedPnl: number;
  tp1Hit: boolean;
  tp2Hit: boolean;
  breakevenMoved: boolean;
  trailingEnabled: boolean;
  trailingStopPrice: number | null;
  stopLossPrice: number;
  lastTrailingPrice: number | null;
  /** Set when an exit fired but the close has not been confirmed yet. */
  exitTriggered: boolean;
  exitReason: CloseReason | null;
  openedAt: number;
}

export interface ExecutionRecord {
  strategyName: string;
  successCount: number;
  failureCount: number;
  totalTimeMs: number;
}

export interface HeartbeatRecord {
  instanceId: string;
  /** Completion time of the instance's last cycle. */
  lastSeen: number | null;
  failureCount: number;
  restartCount: number;
}

export interface DailyCounters {
  /** UTC day, YYYY-MM-DD. */
  day: string;
  trades: number;
  realizedPnl: number;
}
