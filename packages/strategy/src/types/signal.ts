export type SignalSide = "BUY" | "SELL" | "HOLD";

export type OrderType = "MARKET" | "LIMIT" | "IOC" | "FOK";

/**
 * Output of one strategy evaluation. Produced once per cycle and consumed at most once.
 * HOLD signals carry zero quantity and price and are never actionable.
 */
export interface Signal {
  readonly symbol: string;
  readonly side: SignalSide;
  readonly quantity: number;
  readonly price: number;
  readonly stopLoss: number | null;
  readonly takeProfit: number | null;
  readonly orderType: OrderType;
  readonly strategyName: string;
  /** 0..1, compared against the risk manager's minimum. */
  readonly confidence: number;
  readonly timestamp: number;
  readonly reason: string;
}

export function holdSignal(symbol: string, strategyName: string, reason: string, timestamp: number): Signal {
  const signal: Signal = {
    symbol,
    side: "HOLD",
    quantity: 0,
    price: 0,
    stopLoss: null,
    takeProfit: null,
    orderType: "MARKET",
    strategyName,
    confidence: 0,
    timestamp,
    reason,
  };
  return Object.freeze(signal);
}

export interface EntrySignalInput {
  symbol: string;
  side: "BUY" | "SELL";
  price: number;
  quantity: number;
  stopLossPct: number;
  takeProfitPct: number;
  strategyName: string;
  confidence: number;
  reason: string;
  timestamp: number;
  orderType?: OrderType;
}

/** Entry signal with stop/target placed `pct` percent away from price on the protective/profit side. */
export function entrySignal(input: EntrySignalInput): Signal {
  const { price, stopLossPct, takeProfitPct } = input;
  const isBuy = input.side === "BUY";
  const signal: Signal = {
    symbol: input.symbol,
    side: input.side,
    quantity: input.quantity,
    price,
    stopLoss: isBuy ? price * (1 - stopLossPct / 100) : price * (1 + stopLossPct / 100),
    takeProfit: isBuy ? price * (1 + takeProfitPct / 100) : price * (1 - takeProfitPct / 100),
    orderType: input.orderType ?? "MARKET",
    strategyName: input.strategyName,
    confidence: Math.max(0, Math.min(1, input.confidence)),
    timestamp: input.timestamp,
    reason: input.reason,
  };
  return Object.freeze(signal);
}

/** Actionable = directional with strictly positive quantity and price. */
export function isActionable(signal: Signal): boolean {
  return signal.side !== "HOLD"
    && Number.isFinite(signal.quantity) && signal.quantity > 0
    && Number.isFinite(signal.price) && signal.price > 0;
}
