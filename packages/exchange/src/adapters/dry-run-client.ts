import type { Candle, CandleInterval } from "@tradeloop/strategy";
import { logger } from "../lib/logger.js";
import { ExchangeError, ValidationError } from "../lib/errors.js";
import type {
  Balance, Depth, ExchangeClient, ExchangePosition, Order, PlaceOrderRequest, RequestOptions, Ticker, Trade,
} from "../types/exchange-client.js";
import { toExchangeSymbol } from "../domain/symbol.js";

const log = logger.createChild("dryRunClient");

export interface DryRunClientDeps {
  /** Source of public market data; its signed endpoints are never called. */
  market: ExchangeClient;
  quoteAsset?: string;
  startingBalance?: number;
  now?: () => number;
}

/**
 * Paper-trading client. Market data comes from the real exchange; orders fill
 * immediately at the requested price (or the ticker) against an in-memory wallet.
 */
export class DryRunExchangeClient implements ExchangeClient {
  private readonly market: ExchangeClient;
  private readonly quoteAsset: string;
  private readonly now: () => number;
  private readonly wallet = new Map<string, number>();
  private readonly orders = new Map<string, Order>();
  private counter = 0;

  constructor(deps: DryRunClientDeps) {
    this.market = deps.market;
    this.quoteAsset = deps.quoteAsset ?? "USDT";
    this.now = deps.now ?? Date.now;
    this.wallet.set(this.quoteAsset, deps.startingBalance ?? 1000);
  }

  async getBalances(): Promise<Balance[]> {
    return [...this.wallet].map(([asset, free]) => ({ asset, free, frozen: 0 }));
  }

  async getQuoteBalance(asset: string): Promise<number> {
    return this.wallet.get(asset.toUpperCase()) ?? 0;
  }

  async getPositions(): Promise<ExchangePosition[]> {
    return [];
  }

  async placeOrder(req: PlaceOrderRequest, opts?: RequestOptions): Promise<Order> {
    if (!Number.isFinite(req.quantity) || req.quantity <= 0) {
      throw new ValidationError(`Order quantity must be positive, got ${req.quantity}`);
    }
    const symbol = toExchangeSymbol(req.symbol, this.quoteAsset);
    const price = req.price && req.price > 0 ? req.price : (await this.market.getTicker(symbol, opts)).price;
    const base = symbol.split("_")[0];
    const notional = req.quantity * price;

    const quote = this.wallet.get(this.quoteAsset) ?? 0;
    const held = this.wallet.get(base) ?? 0;
    if (req.side === "BUY") {
      if (quote < notional) throw new ExchangeError("INSUFFICIENT_BALANCE", `Dry run: need ${notional.toFixed(2)} ${this.quoteAsset}, have ${quote.toFixed(2)}`);
      this.wallet.set(this.quoteAsset, quote - notional);
      this.wallet.set(base, held + req.quantity);
    } else {
      if (held < req.quantity) throw new ExchangeError("INSUFFICIENT_BALANCE", `Dry run: need ${req.quantity} ${base}, have ${held}`);
      this.wallet.set(base, held - req.quantity);
      this.wallet.set(this.quoteAsset, quote + notional);
    }

    this.counter++;
    const order: Order = {
      id: `dry-run-${this.counter}`,
      clientOrderId: req.clientOrderId ?? null,
      symbol,
      side: req.side,
      type: req.type,
      quantity: req.quantity,
      price,
      filledQuantity: req.quantity,
      avgFillPrice: price,
      status: "FILLED",
      strategyName: req.strategyName ?? null,
      createdAt: this.now(),
    };
    this.orders.set(order.id, order);
    log.info({ action: "DRY_RUN", method: "placeOrder", symbol, side: req.side, quantity: req.quantity, price, orderId: order.id }, "Dry-run: placeOrder");
    return { ...order };
  }

  async getOrder(_symbol: string, orderId: string): Promise<Order> {
    const order = this.orders.get(orderId);
    if (!order) throw new ExchangeError("ORDER_NOT_FOUND", `Dry run: unknown order ${orderId}`);
    return { ...order };
  }

  async cancelOrder(symbol: string, orderId: string): Promise<void> {
    // dry-run orders fill on placement, nothing is ever open
    log.info({ action: "DRY_RUN", method: "cancelOrder", symbol, orderId }, "Dry-run: cancelOrder");
  }

  async getOpenOrders(): Promise<Order[]> {
    return [];
  }

  getKlines(symbol: string, interval: CandleInterval, limit: number, opts?: RequestOptions): Promise<Candle[]> {
    return this.market.getKlines(symbol, interval, limit, opts);
  }

  getTicker(symbol: string, opts?: RequestOptions): Promise<Ticker> {
    return this.market.getTicker(symbol, opts);
  }

  getDepth(symbol: string, limit: number, opts?: RequestOptions): Promise<Depth> {
    return this.market.getDepth(symbol, limit, opts);
  }

  getTrades(symbol: string, limit: number, opts?: RequestOptions): Promise<Trade[]> {
    return this.market.getTrades(symbol, limit, opts);
  }

  getServerTime(opts?: RequestOptions): Promise<number> {
    return this.market.getServerTime(opts);
  }
}
