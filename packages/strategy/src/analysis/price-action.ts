import { resolveBreakout, type BreakoutDirection } from "../strategies/resolve-breakout.js";

export type MarketStructure =
  | "insufficient_data"
  | "bullish_breakout"
  | "bearish_breakout"
  | "conflicting_breakout"
  | "consolidation"
  | "trending";

export interface PriceAction {
  structure: MarketStructure;
  breakout: boolean;
  consolidation: boolean;
  rangePct: number;
  breakoutDirection: BreakoutDirection;
}

/**
 * Classify the recent market structure from closes.
 * Consolidation: last 10 closes span < 5% of their mean.
 * Breakout: last close 1% beyond the prior 19 closes' extremes.
 */
export function analyzePriceAction(values: readonly number[]): PriceAction {
  if (values.length < 20) {
    return { structure: "insufficient_data", breakout: false, consolidation: false, rangePct: 0, breakoutDirection: "NONE" };
  }

  const recent = values.slice(-10);
  const avg = recent.reduce((s, v) => s + v, 0) / recent.length;
  const rangePct = ((Math.max(...recent) - Math.min(...recent)) / avg) * 100;
  const consolidation = rangePct < 5;

  const price = values[values.length - 1];
  const prior = values.slice(-20, -1);
  const { direction } = resolveBreakout(price, Math.max(...prior) * 1.01, Math.min(...prior) * 0.99);

  let structure: MarketStructure;
  if (direction === "LONG") structure = "bullish_breakout";
  else if (direction === "SHORT") structure = "bearish_breakout";
  else if (direction === "CONFLICT") structure = "conflicting_breakout";
  else if (consolidation) structure = "consolidation";
  else structure = "trending";

  return {
    structure,
    breakout: direction === "LONG" || direction === "SHORT",
    consolidation,
    rangePct,
    breakoutDirection: direction,
  };
}
