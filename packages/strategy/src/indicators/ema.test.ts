import { describe, it, expect } from "vitest";
import { ema } from "./ema.js";

describe("ema", () => {
  it("returns empty array for empty input", () => {
    expect(ema([], 3)).toEqual([]);
  });

  it("is all NaN when the period exceeds the data", () => {
    const result = ema([1, 2], 5);
    expect(result).toHaveLength(2);
    expect(result.every(Number.isNaN)).toBe(true);
  });

  it("rejects a non-positive period", () => {
    expect(() => ema([1, 2, 3], 0)).toThrow();
  });

  it("with period 1 follows the input", () => {
    expect(ema([10, 20, 30], 1)).toEqual([10, 20, 30]);
  });

  it("smooths with k = 2/(period+1) from a first-value seed", () => {
    // k = 0.5: 2 → 3 → 4.5 → 6.25 → 8.125, stable from the third value
    const result = ema([2, 4, 6, 8, 10], 3);
    expect(result.slice(0, 2).every(Number.isNaN)).toBe(true);
    expect(result[2]).toBeCloseTo(4.5, 10);
    expect(result[3]).toBeCloseTo(6.25, 10);
    expect(result[4]).toBeCloseTo(8.125, 10);
  });
});
