import { describe, it, expect } from "vitest";
import { entrySignal, holdSignal, isActionable } from "./signal.js";

const base = {
  symbol: "ETH_USDT",
  price: 200,
  quantity: 0.5,
  stopLossPct: 2,
  takeProfitPct: 4,
  strategyName: "Test",
  confidence: 0.8,
  reason: "test",
  timestamp: 1,
};

describe("entrySignal", () => {
  it("puts a BUY's stop below and target above the price", () => {
    const s = entrySignal({ ...base, side: "BUY" });
    expect(s.stopLoss).toBeCloseTo(196, 10);
    expect(s.takeProfit).toBeCloseTo(208, 10);
    expect(s.orderType).toBe("MARKET");
  });

  it("mirrors the levels for a SELL", () => {
    const s = entrySignal({ ...base, side: "SELL" });
    expect(s.stopLoss).toBeCloseTo(204, 10);
    expect(s.takeProfit).toBeCloseTo(192, 10);
  });

  it("clamps confidence to 0..1", () => {
    expect(entrySignal({ ...base, side: "BUY", confidence: 1.4 }).confidence).toBe(1);
    expect(entrySignal({ ...base, side: "BUY", confidence: -1 }).confidence).toBe(0);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(entrySignal({ ...base, side: "BUY" }))).toBe(true);
  });
});

describe("isActionable", () => {
  it("rejects HOLD and non-positive sizes", () => {
    expect(isActionable(holdSignal("ETH_USDT", "Test", "idle", 1))).toBe(false);
    expect(isActionable(entrySignal({ ...base, side: "BUY" }))).toBe(true);
    expect(isActionable(entrySignal({ ...base, side: "BUY", quantity: 0 }))).toBe(false);
    expect(isActionable(entrySignal({ ...base, side: "BUY", quantity: NaN }))).toBe(false);
  });
});
