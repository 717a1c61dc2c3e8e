import { favorableMovePct, improvesStop, trailingStopFor } from "@tradeloop/strategy";
import type { PositionSettings } from "../types/config.js";
import type { CloseReason, Position } from "../types/trading.js";
import { unrealizedPnl } from "./position-book.js";

export type TransitionKind = "tp1" | "breakeven" | "trailing" | "stop_hit" | "tp2";

export interface PositionTransition {
  kind: TransitionKind;
  price: number;
  stopLossPrice: number;
}

export interface AdvanceResult {
  position: Position;
  transitions: PositionTransition[];
  close?: CloseReason;
}

function stopCrossed(pos: Position, price: number): boolean {
  return pos.side === "long" ? price <= pos.stopLossPrice : price >= pos.stopLossPrice;
}

/**
 * One price tick through the exit rules: stop, TP1, breakeven, trailing, TP2.
 * Pure; the caller persists the returned position and performs the close.
 * Once TP1 is hit the stop only ever moves in the profit direction.
 */
export function advancePosition(position: Position, price: number, settings: PositionSettings): AdvanceResult {
  const pos: Position = {
    ...position,
    markPrice: price,
    unrealizedPnl: unrealizedPnl(position.side, position.entryPrice, price, position.size),
  };
  const transitions: PositionTransition[] = [];
  const record = (kind: TransitionKind) => transitions.push({ kind, price, stopLossPrice: pos.stopLossPrice });

  // close already pending: keep asking for it
  if (pos.exitTriggered && pos.exitReason) {
    return { position: pos, transitions, close: pos.exitReason };
  }

  const profitPct = favorableMovePct(pos.side, pos.entryPrice, price);

  if (stopCrossed(pos, price)) {
    const reason: CloseReason = pos.trailingStopPrice !== null ? "trailing_stop" : "stop_loss";
    pos.exitTriggered = true;
    pos.exitReason = reason;
    record("stop_hit");
    return { position: pos, transitions, close: reason };
  }

  if (!pos.tp1Hit && profitPct >= settings.tp1Pct) {
    pos.tp1Hit = true;
    pos.trailingEnabled = settings.trailingEnabled;
    pos.lastTrailingPrice = price;
    record("tp1");
  }

  if (!pos.breakevenMoved && profitPct >= settings.breakevenPct) {
    pos.breakevenMoved = true;
    if (improvesStop(pos.side, pos.entryPrice, pos.stopLossPrice)) {
      pos.stopLossPrice = pos.entryPrice;
    }
    record("breakeven");
  }

  if (pos.tp1Hit && pos.trailingEnabled && pos.lastTrailingPrice !== null) {
    if (favorableMovePct(pos.side, pos.lastTrailingPrice, price) >= settings.trailingStepPct) {
      pos.lastTrailingPrice = price;
      const candidate = trailingStopFor(pos.side, price, settings.trailingDistancePct);
      if (improvesStop(pos.side, candidate, pos.stopLossPrice)) {
        pos.stopLossPrice = candidate;
        pos.trailingStopPrice = candidate;
        record("trailing");
      }
    }
  }

  if (pos.tp1Hit && !pos.tp2Hit && profitPct >= settings.tp2Pct) {
    pos.tp2Hit = true;
    pos.exitTriggered = true;
    pos.exitReason = "take_profit_2";
    record("tp2");
    return { position: pos, transitions, close: "take_profit_2" };
  }

  return { position: pos, transitions };
}
