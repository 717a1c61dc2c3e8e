import { describe, it, expect } from "vitest";
import { createDcaStrategy } from "./dca.js";
import { makeInput } from "../test-helpers.js";

describe("createDcaStrategy", () => {
  it("buys the fixed amount every cycle", () => {
    const signal = createDcaStrategy().evaluate(makeInput({ price: 50 }));

    expect(signal.side).toBe("BUY");
    expect(signal.quantity).toBe(2);
    expect(signal.confidence).toBe(1);
    expect(signal.reason).toBe("DCA buy $100");
  });

  it("holds when the balance cannot cover the amount", () => {
    const signal = createDcaStrategy().evaluate(makeInput({ price: 50, balance: 50 }));

    expect(signal.side).toBe("HOLD");
    expect(signal.reason).toBe("Insufficient balance for DCA ($50.00 < $100)");
  });

  it("uses the configured amount", () => {
    const signal = createDcaStrategy({ amount: 25 }).evaluate(makeInput({ price: 50 }));
    expect(signal.quantity).toBe(0.5);
  });
});
