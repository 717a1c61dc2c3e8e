import { describe, it, expect, vi } from "vitest";
import { DryRunExchangeClient } from "./dry-run-client.js";
import { ExchangeError } from "../lib/errors.js";
import { createMockClient, NOW } from "../test-helpers.js";

function createClient(startingBalance = 1000) {
  const market = createMockClient();
  const client = new DryRunExchangeClient({ market, startingBalance, now: () => NOW });
  return { client, market };
}

describe("DryRunExchangeClient", () => {
  it("fills a buy at the requested price and moves the wallet", async () => {
    const { client } = createClient();

    const order = await client.placeOrder({ symbol: "BTCUSDT", side: "BUY", type: "MARKET", quantity: 2, price: 100 });

    expect(order).toMatchObject({ id: "dry-run-1", symbol: "BTC_USDT", status: "FILLED", filledQuantity: 2, avgFillPrice: 100, createdAt: NOW });
    expect(await client.getBalances()).toEqual([
      { asset: "USDT", free: 800, frozen: 0 },
      { asset: "BTC", free: 2, frozen: 0 },
    ]);
  });

  it("prices market orders from the ticker", async () => {
    const { client, market } = createClient();
    const order = await client.placeOrder({ symbol: "BTC_USDT", side: "BUY", type: "MARKET", quantity: 1 });
    expect(order.avgFillPrice).toBe(100);
    expect(market.getTicker).toHaveBeenCalledWith("BTC_USDT", undefined);
  });

  it("sells back into quote", async () => {
    const { client } = createClient();
    await client.placeOrder({ symbol: "BTC_USDT", side: "BUY", type: "MARKET", quantity: 2, price: 100 });
    await client.placeOrder({ symbol: "BTC_USDT", side: "SELL", type: "MARKET", quantity: 2, price: 110 });
    expect(await client.getQuoteBalance("USDT")).toBe(1020);
  });

  it("rejects orders the wallet cannot cover", async () => {
    const { client } = createClient(50);
    await expect(client.placeOrder({ symbol: "BTC_USDT", side: "BUY", type: "MARKET", quantity: 1, price: 100 }))
      .rejects.toBeInstanceOf(ExchangeError);
    await expect(client.placeOrder({ symbol: "BTC_USDT", side: "SELL", type: "MARKET", quantity: 1, price: 100 }))
      .rejects.toBeInstanceOf(ExchangeError);
  });

  it("reports placed orders as filled and nothing as open", async () => {
    const { client } = createClient();
    const placed = await client.placeOrder({ symbol: "BTC_USDT", side: "BUY", type: "LIMIT", quantity: 1, price: 90 });

    expect((await client.getOrder("BTC_USDT", placed.id)).status).toBe("FILLED");
    expect(await client.getOpenOrders()).toEqual([]);
    await expect(client.getOrder("BTC_USDT", "missing")).rejects.toThrow("Dry run: unknown order missing");
  });

  it("delegates market data", async () => {
    const getKlines = vi.fn().mockResolvedValue([{ t: 1, o: 1, h: 1, l: 1, c: 1, v: 1 }]);
    const client = new DryRunExchangeClient({ market: createMockClient({ getKlines }) });

    expect(await client.getKlines("BTC_USDT", "5m", 10)).toHaveLength(1);
    expect(getKlines).toHaveBeenCalledWith("BTC_USDT", "5m", 10, undefined);
  });
});
