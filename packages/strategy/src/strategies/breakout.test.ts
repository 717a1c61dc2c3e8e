import { describe, it, expect } from "vitest";
import { createBreakoutStrategy } from "./breakout.js";
import { resolveBreakout } from "./resolve-breakout.js";
import { makeCandles, makeInput } from "../test-helpers.js";

describe("resolveBreakout", () => {
  it("returns NONE inside the range", () => {
    expect(resolveBreakout(100, 101, 99).direction).toBe("NONE");
  });

  it("returns the single triggered side", () => {
    expect(resolveBreakout(102, 101, 99)).toEqual({ direction: "LONG", longDistance: 1, shortDistance: -3 });
    expect(resolveBreakout(97, 101, 99).direction).toBe("SHORT");
  });

  it("picks the side further past its level when both trigger", () => {
    expect(resolveBreakout(100, 95, 102).direction).toBe("LONG");
    expect(resolveBreakout(100, 97, 104).direction).toBe("SHORT");
  });

  it("reports CONFLICT on an exact tie", () => {
    expect(resolveBreakout(100, 98, 102)).toEqual({ direction: "CONFLICT", longDistance: 2, shortDistance: 2 });
  });
});

describe("createBreakoutStrategy", () => {
  // bufferPct ±3.125 keeps the levels exact: 64 × 1.03125 = 66, 64 × 0.96875 = 62
  it("buys on a close above the buffered range high", () => {
    const strategy = createBreakoutStrategy({ lookback: 4, bufferPct: 3.125 });
    const signal = strategy.evaluate(makeInput({ candles: makeCandles([64, 64, 64, 64, 70]) }));

    expect(signal.side).toBe("BUY");
    expect(signal.confidence).toBe(0.7);
    expect(signal.reason).toBe("Bullish breakout 4.0000 past 66.00");
  });

  it("sells on a close below the buffered range low", () => {
    const strategy = createBreakoutStrategy({ lookback: 4, bufferPct: 3.125 });
    const signal = strategy.evaluate(makeInput({ candles: makeCandles([64, 64, 64, 64, 60]) }));

    expect(signal.side).toBe("SELL");
    expect(signal.reason).toBe("Bearish breakout 2.0000 past 62.00");
  });

  it("never trades when a negative buffer makes both sides trigger equally", () => {
    const strategy = createBreakoutStrategy({ lookback: 4, bufferPct: -3.125 });
    const signal = strategy.evaluate(makeInput({ candles: makeCandles([64, 64, 64, 64, 64]) }));

    expect(signal.side).toBe("HOLD");
    expect(signal.reason).toBe("Breakout conflict: equal distance past both levels (2.0000)");
  });

  it("holds inside the range", () => {
    const strategy = createBreakoutStrategy({ lookback: 4, bufferPct: 3.125 });
    const signal = strategy.evaluate(makeInput({ candles: makeCandles([64, 64, 64, 64, 65]) }));

    expect(signal.reason).toBe("Inside range [62.00, 66.00]");
  });

  it("builds the range from exactly lookback closes before the latest", () => {
    const candles = makeCandles([80, 64, 64, 64, 70]);

    expect(createBreakoutStrategy({ lookback: 3, bufferPct: 3.125 }).evaluate(makeInput({ candles })).reason)
      .toBe("Bullish breakout 4.0000 past 66.00");
    // 80 × 1.03125 = 82.5
    expect(createBreakoutStrategy({ lookback: 4, bufferPct: 3.125 }).evaluate(makeInput({ candles })).reason)
      .toBe("Inside range [62.00, 82.50]");
  });

  it("holds without a close beyond the lookback", () => {
    const strategy = createBreakoutStrategy({ lookback: 3 });
    expect(strategy.evaluate(makeInput({ candles: makeCandles([64, 64, 64]) })).reason).toBe("Insufficient candle data");
    expect(createBreakoutStrategy().evaluate(makeInput({ candles: makeCandles([64, 64]) })).reason).toBe("Insufficient candle data");
  });
});
