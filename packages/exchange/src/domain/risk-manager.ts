import type { RiskLimits } from "../types/config.js";
import type { OrderSide } from "../types/exchange-client.js";
import type { Position, PositionSide } from "../types/trading.js";
import { positionKey } from "./position-book.js";

export interface PreTradeInput {
  symbol: string;
  side: OrderSide;
  quantity: number;
  price: number;
  confidence: number;
  leverage: number;
  availableBalance: number;
  /** Realized loss today as a positive number; gains count as zero. */
  dailyLossUsd: number;
  tradesToday: number;
  positions: readonly Pick<Position, "symbol" | "side">[];
  openOrders: readonly { symbol: string; side: OrderSide }[];
}

export interface RiskCheckResult {
  passed: boolean;
  reason: string | null;
}

export function sideToPosition(side: OrderSide): PositionSide {
  return side === "BUY" ? "long" : "short";
}

/** Margin needed for an entry, inflated by the configured buffer. */
export function requiredMargin(quantity: number, price: number, leverage: number, buffer: number): number {
  return (quantity * price / Math.max(1, leverage)) * buffer;
}

/** Pre-trade gate. Checks run in a fixed order and the first failure wins. */
export function checkPreTrade(input: PreTradeInput, limits: RiskLimits): RiskCheckResult {
  if (input.dailyLossUsd > limits.maxDailyLossUsd) {
    return { passed: false, reason: `Daily loss $${input.dailyLossUsd.toFixed(2)} exceeds max $${limits.maxDailyLossUsd}` };
  }

  if (input.tradesToday >= limits.maxDailyTrades) {
    return { passed: false, reason: `Trades today ${input.tradesToday} >= max ${limits.maxDailyTrades}` };
  }

  if (input.confidence < limits.minConfidence) {
    return { passed: false, reason: `Confidence ${input.confidence.toFixed(2)} below min ${limits.minConfidence}` };
  }

  const side = sideToPosition(input.side);
  if (input.positions.some((p) => p.symbol === input.symbol && p.side === side)) {
    return { passed: false, reason: `Position already open for ${positionKey(input.symbol, side)}` };
  }

  if (input.openOrders.some((o) => o.symbol === input.symbol && o.side === input.side)) {
    return { passed: false, reason: `Open ${input.side} order already exists for ${input.symbol}` };
  }

  const margin = requiredMargin(input.quantity, input.price, input.leverage, limits.marginBuffer);
  if (input.availableBalance < margin) {
    return { passed: false, reason: `Insufficient margin: $${input.availableBalance.toFixed(2)} < $${margin.toFixed(2)} required` };
  }

  return { passed: true, reason: null };
}

export type LiquidationLevel = "LOW" | "MEDIUM" | "HIGH";

export interface LiquidationRisk {
  key: string;
  liquidationPrice: number;
  /** Fraction of mark price between mark and liquidation. */
  distance: number;
  level: LiquidationLevel;
}

export interface RiskAction {
  type: "CLOSE_POSITION" | "REDUCE_POSITION";
  symbol: string;
  side: PositionSide;
  reason: string;
}

export interface PortfolioAssessment {
  concentration: number;
  overConcentrated: boolean;
  liquidation: LiquidationRisk[];
  actions: RiskAction[];
}

export function liquidationPrice(side: PositionSide, entryPrice: number, leverage: number, maintenanceMargin: number): number {
  const lev = Math.max(1, leverage);
  return side === "long"
    ? entryPrice * (1 - 1 / lev + maintenanceMargin)
    : entryPrice * (1 + 1 / lev - maintenanceMargin);
}

export function liquidationLevel(distance: number): LiquidationLevel {
  if (distance > 0.2) return "LOW";
  if (distance > 0.1) return "MEDIUM";
  return "HIGH";
}

/**
 * Periodic portfolio review. Returns advisory actions only; applying them is
 * the position manager's job. Over-concentration closes the two highest-leverage
 * positions first.
 */
export function assessPortfolio(
  positions: readonly Position[],
  totalBalance: number,
  limits: RiskLimits,
): PortfolioAssessment {
  const largest = positions.reduce((max, p) => Math.max(max, p.size * p.markPrice), 0);
  const concentration = totalBalance > 0 ? largest / totalBalance : 0;
  const overConcentrated = concentration > limits.maxConcentration;

  const actions: RiskAction[] = [];
  const closing = new Set<string>();

  if (overConcentrated) {
    const byLeverage = [...positions].sort((a, b) => b.leverage - a.leverage).slice(0, 2);
    for (const p of byLeverage) {
      closing.add(positionKey(p.symbol, p.side));
      actions.push({
        type: "CLOSE_POSITION",
        symbol: p.symbol,
        side: p.side,
        reason: `Concentration ${(concentration * 100).toFixed(1)}% above ${(limits.maxConcentration * 100).toFixed(0)}%`,
      });
    }
  }

  const liquidation = positions.map((p): LiquidationRisk => {
    const liq = liquidationPrice(p.side, p.entryPrice, p.leverage, limits.maintenanceMargin);
    const distance = p.markPrice > 0 ? Math.abs(p.markPrice - liq) / p.markPrice : 0;
    return { key: positionKey(p.symbol, p.side), liquidationPrice: liq, distance, level: liquidationLevel(distance) };
  });

  for (const [i, risk] of liquidation.entries()) {
    if (risk.level !== "HIGH" || closing.has(risk.key)) continue;
    const p = positions[i];
    actions.push({
      type: "REDUCE_POSITION",
      symbol: p.symbol,
      side: p.side,
      reason: `Liquidation distance ${(risk.distance * 100).toFixed(1)}% at ${risk.liquidationPrice.toFixed(2)}`,
    });
  }

  return { concentration, overConcentrated, liquidation, actions };
}
