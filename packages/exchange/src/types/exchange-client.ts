import type { Candle, CandleInterval } from "@tradeloop/strategy";

export type OrderSide = "BUY" | "SELL";
export type OrderKind = "MARKET" | "LIMIT" | "IOC" | "FOK";
export type OrderStatus = "PENDING" | "PARTIALLY_FILLED" | "FILLED" | "CANCELED" | "REJECTED";

export interface Balance {
  asset: string;
  free: number;
  frozen: number;
}

export interface ExchangePosition {
  symbol: string;
  side: "long" | "short";
  size: number;
  entryPrice: number;
  markPrice: number;
  leverage: number;
  unrealizedPnl: number;
}

export interface Order {
  id: string;
  clientOrderId: string | null;
  symbol: string;
  side: OrderSide;
  type: OrderKind;
  quantity: number;
  price: number;
  filledQuantity: number;
  avgFillPrice: number;
  status: OrderStatus;
  strategyName: string | null;
  createdAt: number;
}

export interface Ticker {
  symbol: string;
  price: number;
  bid: number | null;
  ask: number | null;
  volume24h: number | null;
  timestamp: number;
}

export interface DepthLevel {
  price: number;
  quantity: number;
}

export interface Depth {
  bids: DepthLevel[];
  asks: DepthLevel[];
  timestamp: number;
}

export interface Trade {
  id: string;
  price: number;
  quantity: number;
  side: OrderSide;
  timestamp: number;
}

export interface PlaceOrderRequest {
  symbol: string;
  side: OrderSide;
  type: OrderKind;
  /** Base quantity. Spot MARKET buys are converted to quote amount by the dialect. */
  quantity: number;
  /** Required for LIMIT/IOC/FOK; reference price for MARKET. */
  price?: number;
  clientOrderId?: string;
  reduceOnly?: boolean;
  strategyName?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/** Normalized exchange surface. Methods return normalized data or throw an EngineError. */
export interface ExchangeClient {
  getBalances(opts?: RequestOptions): Promise<Balance[]>;
  /** Free quote funds; amounts locked in open orders are excluded. */
  getQuoteBalance(asset: string, opts?: RequestOptions): Promise<number>;
  /** Always empty on spot. */
  getPositions(opts?: RequestOptions): Promise<ExchangePosition[]>;
  placeOrder(req: PlaceOrderRequest, opts?: RequestOptions): Promise<Order>;
  getOrder(symbol: string, orderId: string, opts?: RequestOptions): Promise<Order>;
  cancelOrder(symbol: string, orderId: string, opts?: RequestOptions): Promise<void>;
  getOpenOrders(symbol: string, opts?: RequestOptions): Promise<Order[]>;
  getKlines(symbol: string, interval: CandleInterval, limit: number, opts?: RequestOptions): Promise<Candle[]>;
  getTicker(symbol: string, opts?: RequestOptions): Promise<Ticker>;
  getDepth(symbol: string, limit: number, opts?: RequestOptions): Promise<Depth>;
  getTrades(symbol: string, limit: number, opts?: RequestOptions): Promise<Trade[]>;
  getServerTime(opts?: RequestOptions): Promise<number>;
}
