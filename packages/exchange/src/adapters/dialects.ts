import { z } from "zod";
import type { Candle, CandleInterval } from "@tradeloop/strategy";
import { resolveOrderStatus } from "../domain/order-status.js";
import { ValidationError } from "../lib/errors.js";
import type {
  Balance, Depth, ExchangePosition, Order, OrderSide, OrderKind, PlaceOrderRequest, Ticker, Trade,
} from "../types/exchange-client.js";
import type { Params } from "./signing.js";

export const KLINE_LIMIT_MAX = 500;

const num = z.coerce.number();
const optNum = z.coerce.number().optional();

const INTERVALS: Record<CandleInterval, string> = {
  "1m": "1M",
  "5m": "5M",
  "15m": "15M",
  "30m": "30M",
  "1h": "1H",
  "4h": "4H",
  "8h": "8H",
  "12h": "12H",
  "1d": "1D",
};

export function toExchangeInterval(interval: CandleInterval): string {
  return INTERVALS[interval];
}

function parse<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(`Malformed ${what} payload: ${result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")}`);
  }
  return result.data;
}

// --- shared payloads -------------------------------------------------------

const KlineObjectSchema = z.object({
  time: num,
  open: num,
  high: num,
  low: num,
  close: num,
  volume: num,
});

// [openTime, open, high, low, close, volume, ...]
const KlineTupleSchema = z.tuple([num, num, num, num, num, num]).rest(z.unknown());

const KlinesSchema = z.union([
  z.object({ klines: z.array(z.union([KlineObjectSchema, KlineTupleSchema])) }),
  z.array(z.union([KlineObjectSchema, KlineTupleSchema])),
]);

export function parseKlines(data: unknown): Candle[] {
  const parsed = parse(KlinesSchema, data, "klines");
  const rows = Array.isArray(parsed) ? parsed : parsed.klines;
  return rows
    .map((row): Candle => Array.isArray(row)
      ? { t: row[0], o: row[1], h: row[2], l: row[3], c: row[4], v: row[5] }
      : { t: row.time, o: row.open, h: row.high, l: row.low, c: row.close, v: row.volume })
    .sort((a, b) => a.t - b.t);
}

const TickerRowSchema = z.object({
  symbol: z.string(),
  close: optNum,
  price: optNum,
  bid: optNum,
  ask: optNum,
  volume: optNum,
  time: optNum,
});

const TickersSchema = z.object({ tickers: z.array(TickerRowSchema) });

export function parseTicker(data: unknown, symbol: string, now: number): Ticker {
  const { tickers } = parse(TickersSchema, data, "ticker");
  const row = tickers.find((t) => t.symbol === symbol);
  const price = row?.close ?? row?.price;
  if (!row || price === undefined) throw new ValidationError(`Symbol ${symbol} not found in ticker data`);
  return {
    symbol,
    price,
    bid: row.bid ?? null,
    ask: row.ask ?? null,
    volume24h: row.volume ?? null,
    timestamp: row.time ?? now,
  };
}

const LevelSchema = z.tuple([num, num]);
const DepthSchema = z.object({
  bids: z.array(LevelSchema),
  asks: z.array(LevelSchema),
  updateTime: optNum,
});

export function parseDepth(data: unknown, now: number): Depth {
  const d = parse(DepthSchema, data, "depth");
  return {
    bids: d.bids.map(([price, quantity]) => ({ price, quantity })),
    asks: d.asks.map(([price, quantity]) => ({ price, quantity })),
    timestamp: d.updateTime ?? now,
  };
}

const TradeRowSchema = z.object({
  tradeId: z.union([z.string(), z.number()]).transform(String),
  price: num,
  size: num,
  side: z.string().transform((s) => s.toUpperCase()).pipe(z.enum(["BUY", "SELL"])),
  timestamp: num,
});

export function parseTrades(data: unknown): Trade[] {
  const { trades } = parse(z.object({ trades: z.array(TradeRowSchema) }), data, "trades");
  return trades.map((t) => ({ id: t.tradeId, price: t.price, quantity: t.size, side: t.side, timestamp: t.timestamp }));
}

const OrderRowSchema = z.object({
  orderId: z.union([z.string(), z.number()]).transform(String),
  clientOrderId: z.string().nullish(),
  symbol: z.string(),
  side: z.string().transform((s) => s.toUpperCase()).pipe(z.enum(["BUY", "SELL"])),
  type: z.string().transform((s) => s.toUpperCase()).pipe(z.enum(["MARKET", "LIMIT", "IOC", "FOK"])).catch("MARKET"),
  price: optNum,
  size: optNum,
  amount: optNum,
  filledSize: optNum,
  filledAmount: optNum,
  status: z.string().default("OPEN"),
  createTime: optNum,
});

type OrderRow = z.infer<typeof OrderRowSchema>;

function toOrder(row: OrderRow, now: number, fallback?: Partial<Order>): Order {
  const filledQuantity = row.filledSize ?? 0;
  const quantity = row.size ?? fallback?.quantity ?? filledQuantity;
  const avgFillPrice = filledQuantity > 0 && row.filledAmount !== undefined
    ? row.filledAmount / filledQuantity
    : row.price ?? 0;
  return {
    id: row.orderId,
    clientOrderId: row.clientOrderId ?? fallback?.clientOrderId ?? null,
    symbol: row.symbol,
    side: row.side,
    type: row.type,
    quantity,
    price: row.price ?? fallback?.price ?? 0,
    filledQuantity,
    avgFillPrice,
    status: resolveOrderStatus(row.status, filledQuantity, quantity),
    strategyName: fallback?.strategyName ?? null,
    createdAt: row.createTime ?? now,
  };
}

export function parseOrder(data: unknown, now: number): Order {
  return toOrder(parse(OrderRowSchema, data, "order"), now);
}

export function parseOrders(data: unknown, now: number): Order[] {
  const { orders } = parse(z.object({ orders: z.array(OrderRowSchema) }), data, "open orders");
  return orders.map((row) => toOrder(row, now));
}

const PlacedSchema = z.object({
  orderId: z.union([z.string(), z.number()]).transform(String),
  clientOrderId: z.string().nullish(),
});

/** A fresh order from the place-order acknowledgement plus what we asked for. */
export function parsePlacedOrder(data: unknown, req: PlaceOrderRequest, symbol: string, now: number): Order {
  const placed = parse(PlacedSchema, data, "place order");
  return {
    id: placed.orderId,
    clientOrderId: placed.clientOrderId ?? req.clientOrderId ?? null,
    symbol,
    side: req.side,
    type: req.type,
    quantity: req.quantity,
    price: req.price ?? 0,
    filledQuantity: 0,
    avgFillPrice: 0,
    status: "PENDING",
    strategyName: req.strategyName ?? null,
    createdAt: now,
  };
}

// Balance rows come as {coin|currency|asset, free|available, frozen|locked}
const BalanceRowSchema = z.object({
  coin: z.string().optional(),
  currency: z.string().optional(),
  asset: z.string().optional(),
  free: optNum,
  available: optNum,
  frozen: optNum,
  locked: optNum,
}).transform((r, ctx): Balance => {
  const asset = r.coin ?? r.currency ?? r.asset;
  if (!asset) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "balance row has no asset" });
    return z.NEVER;
  }
  return { asset: asset.toUpperCase(), free: r.free ?? r.available ?? 0, frozen: r.frozen ?? r.locked ?? 0 };
});

export function parseBalances(data: unknown): Balance[] {
  return parse(z.object({ balances: z.array(BalanceRowSchema) }), data, "balances").balances;
}

const PositionRowSchema = z.object({
  symbol: z.string(),
  side: z.string().optional(),
  positionSide: z.string().optional(),
  size: num,
  entryPrice: optNum,
  avgPrice: optNum,
  markPrice: optNum,
  leverage: optNum,
  unrealizedPnl: optNum,
  unrealisedPnl: optNum,
});

export function parsePositions(data: unknown): ExchangePosition[] {
  const parsed = parse(z.union([
    z.object({ positions: z.array(PositionRowSchema) }),
    z.object({ list: z.array(PositionRowSchema) }),
  ]), data, "positions");
  const rows = "positions" in parsed ? parsed.positions : parsed.list;
  return rows
    .filter((r) => r.size !== 0)
    .map((r): ExchangePosition => {
      const rawSide = (r.positionSide ?? r.side ?? (r.size > 0 ? "LONG" : "SHORT")).toUpperCase();
      const side = rawSide === "LONG" || rawSide === "BUY" ? "long" : "short";
      const entryPrice = r.entryPrice ?? r.avgPrice ?? 0;
      return {
        symbol: r.symbol,
        side,
        size: Math.abs(r.size),
        entryPrice,
        markPrice: r.markPrice ?? entryPrice,
        leverage: r.leverage ?? 1,
        unrealizedPnl: r.unrealizedPnl ?? r.unrealisedPnl ?? 0,
      };
    });
}

// --- dialects --------------------------------------------------------------

export interface DialectPaths {
  balances: string;
  positions: string | null;
  order: string;
  openOrders: string;
  klines: string;
  tickers: string;
  depth: string;
  trades: string;
}

export interface Dialect {
  name: "spot" | "futures";
  headers: { key: string; signature: string; timestamp: string };
  paths: DialectPaths;
  orderParams(req: PlaceOrderRequest, symbol: string): Params;
}

function sizeParams(side: OrderSide, type: OrderKind, quantity: number, price: number | undefined, quoteMarketBuys: boolean): Params {
  // spot market buys are sized in quote currency
  if (quoteMarketBuys && type === "MARKET" && side === "BUY") {
    if (price === undefined || price <= 0) throw new ValidationError("Market buy needs a reference price to size the quote amount");
    return { amount: String(quantity * price) };
  }
  const params: Params = { size: String(quantity) };
  if (type !== "MARKET") {
    if (price === undefined || price <= 0) throw new ValidationError(`${type} order needs a positive price`);
    params.price = String(price);
  }
  return params;
}

const HEADERS = { key: "PIONEX-KEY", signature: "PIONEX-SIGNATURE", timestamp: "PIONEX-TIMESTAMP" };

export const spotDialect: Dialect = {
  name: "spot",
  headers: HEADERS,
  paths: {
    balances: "/api/v1/account/balances",
    positions: null,
    order: "/api/v1/trade/order",
    openOrders: "/api/v1/trade/openOrders",
    klines: "/api/v1/market/klines",
    tickers: "/api/v1/market/tickers",
    depth: "/api/v1/market/depth",
    trades: "/api/v1/market/trades",
  },
  orderParams(req, symbol) {
    const params: Params = {
      symbol,
      side: req.side,
      type: req.type,
      ...sizeParams(req.side, req.type, req.quantity, req.price, true),
    };
    if (req.clientOrderId) params.clientOrderId = req.clientOrderId;
    return params;
  },
};

export const futuresDialect: Dialect = {
  name: "futures",
  headers: HEADERS,
  paths: {
    balances: "/api/v1/futures/account/balances",
    positions: "/api/v1/futures/account/positions",
    order: "/api/v1/futures/trade/order",
    openOrders: "/api/v1/futures/trade/openOrders",
    klines: "/api/v1/market/klines",
    tickers: "/api/v1/market/tickers",
    depth: "/api/v1/market/depth",
    trades: "/api/v1/market/trades",
  },
  orderParams(req, symbol) {
    const params: Params = {
      symbol,
      side: req.side,
      type: req.type,
      ...sizeParams(req.side, req.type, req.quantity, req.price, false),
    };
    if (req.reduceOnly) params.reduceOnly = true;
    if (req.clientOrderId) params.clientOrderId = req.clientOrderId;
    return params;
  },
};

export function getDialect(name: "spot" | "futures"): Dialect {
  return name === "spot" ? spotDialect : futuresDialect;
}
