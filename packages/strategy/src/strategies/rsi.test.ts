import { describe, it, expect } from "vitest";
import { createRsiStrategy, rsiVote, rsiConfidence } from "./rsi.js";
import { makeCandles, makeInput, RSI_25_CLOSES, RSI_75_CLOSES } from "../test-helpers.js";

describe("rsiVote", () => {
  it("votes BUY below oversold and SELL above overbought", () => {
    expect(rsiVote(25, 30, 70)).toBe("BUY");
    expect(rsiVote(75, 30, 70)).toBe("SELL");
    expect(rsiVote(50, 30, 70)).toBeNull();
    expect(rsiVote(NaN, 30, 70)).toBeNull();
  });
});

describe("rsiConfidence", () => {
  it("is 0.6 at the threshold and 1.0 at the extreme", () => {
    expect(rsiConfidence(30, "BUY", 30, 70)).toBeCloseTo(0.6, 10);
    expect(rsiConfidence(0, "BUY", 30, 70)).toBeCloseTo(1, 10);
    expect(rsiConfidence(100, "SELL", 30, 70)).toBeCloseTo(1, 10);
  });
});

describe("createRsiStrategy", () => {
  const strategy = createRsiStrategy();

  it("buys when RSI(14) = 25 is below oversold 30, with percentage stop and target", () => {
    const signal = strategy.evaluate(makeInput({ price: 94, candles: makeCandles(RSI_25_CLOSES) }));

    expect(signal.side).toBe("BUY");
    expect(signal.price).toBe(94);
    expect(signal.quantity).toBeCloseTo((1000 * 0.5) / 94, 10);
    expect(signal.stopLoss).toBeCloseTo(94 * (1 - 0.015), 10);
    expect(signal.takeProfit).toBeCloseTo(94 * (1 + 0.025), 10);
    expect(signal.confidence).toBeCloseTo(0.6 + 0.4 * (5 / 30), 6);
    expect(signal.reason).toBe("RSI oversold (25.00)");
    expect(signal.strategyName).toBe("RSI");
  });

  it("sells when RSI is overbought, with stop above and target below", () => {
    const signal = strategy.evaluate(makeInput({ price: 106, candles: makeCandles(RSI_75_CLOSES) }));

    expect(signal.side).toBe("SELL");
    expect(signal.stopLoss).toBeCloseTo(106 * 1.015, 10);
    expect(signal.takeProfit).toBeCloseTo(106 * 0.975, 10);
    expect(signal.reason).toBe("RSI overbought (75.00)");
  });

  it("holds when RSI is neutral", () => {
    const alternating = Array.from({ length: 30 }, (_, i) => (i % 2 === 0 ? 100 : 101));
    const signal = strategy.evaluate(makeInput({ price: 100, candles: makeCandles(alternating) }));

    expect(signal.side).toBe("HOLD");
    expect(signal.reason).toMatch(/^RSI neutral/);
    expect(signal.quantity).toBe(0);
  });

  it("falls back to the last close when the ticker price is unknown", () => {
    const signal = strategy.evaluate(makeInput({ price: 0, candles: makeCandles(RSI_25_CLOSES) }));
    expect(signal.price).toBe(94);
  });

  it("holds without a price", () => {
    const signal = strategy.evaluate(makeInput({ price: 0, candles: [] }));
    expect(signal.side).toBe("HOLD");
    expect(signal.reason).toBe("Unable to get current price");
  });

  it("holds while RSI is still warming up", () => {
    const signal = strategy.evaluate(makeInput({ price: 94, candles: makeCandles(RSI_25_CLOSES.slice(0, 10)) }));
    expect(signal.reason).toBe("Insufficient candle data");
  });

  it("is deterministic for identical inputs", () => {
    const input = makeInput({ price: 94, candles: makeCandles(RSI_25_CLOSES) });
    expect(strategy.evaluate(input)).toEqual(strategy.evaluate(input));
  });

  it("honours parameter overrides", () => {
    const strict = createRsiStrategy({ oversold: 20 });
    const signal = strict.evaluate(makeInput({ price: 94, candles: makeCandles(RSI_25_CLOSES) }));
    expect(strict.params.oversold.value).toBe(20);
    expect(signal.side).toBe("HOLD");
  });

  it("rejects overrides outside the parameter range", () => {
    expect(() => createRsiStrategy({ oversold: 0 })).toThrow("RSI: param oversold=0 outside [5, 50]");
  });
});
