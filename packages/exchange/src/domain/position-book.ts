import type { Position, PositionSide } from "../types/trading.js";

export type OpenPositionInput = Pick<Position, "symbol" | "side" | "size" | "entryPrice" | "leverage" | "stopLossPrice" | "openedAt">
  & Partial<Pick<Position, "trailingEnabled">>;

export function positionKey(symbol: string, side: PositionSide): string {
  return `${symbol}:${side}`;
}

export function unrealizedPnl(side: PositionSide, entryPrice: number, price: number, size: number): number {
  return side === "long" ? (price - entryPrice) * size : (entryPrice - price) * size;
}

/** Open positions keyed by `(symbol, side)`. Returned positions are copies. */
export class PositionBook {
  private positions = new Map<string, Position>();

  open(input: OpenPositionInput): Position {
    const key = positionKey(input.symbol, input.side);
    if (this.positions.has(key)) {
      throw new Error(`Position already open for ${key}`);
    }
    const position: Position = {
      ...input,
      markPrice: input.entryPrice,
      unrealizedPnl: 0,
      realizedPnl: 0,
      tp1Hit: false,
      tp2Hit: false,
      breakevenMoved: false,
      trailingEnabled: input.trailingEnabled ?? false,
      trailingStopPrice: null,
      lastTrailingPrice: null,
      exitTriggered: false,
      exitReason: null,
    };
    this.positions.set(key, position);
    return { ...position };
  }

  /** Add to an open position at a size-weighted average entry. */
  extend(symbol: string, side: PositionSide, size: number, price: number): Position | null {
    const pos = this.positions.get(positionKey(symbol, side));
    if (!pos) return null;
    const total = pos.size + size;
    pos.entryPrice = (pos.entryPrice * pos.size + price * size) / total;
    pos.size = total;
    pos.unrealizedPnl = unrealizedPnl(pos.side, pos.entryPrice, pos.markPrice, pos.size);
    return { ...pos };
  }

  get(symbol: string, side: PositionSide): Position | null {
    const pos = this.positions.get(positionKey(symbol, side));
    return pos ? { ...pos } : null;
  }

  has(symbol: string, side: PositionSide): boolean {
    return this.positions.has(positionKey(symbol, side));
  }

  /** Replace the stored position. Ignored when nothing is open under its key. */
  update(position: Position): void {
    const key = positionKey(position.symbol, position.side);
    if (!this.positions.has(key)) return;
    this.positions.set(key, { ...position });
  }

  close(symbol: string, side: PositionSide): Position | null {
    const key = positionKey(symbol, side);
    const pos = this.positions.get(key);
    if (!pos) return null;
    this.positions.delete(key);
    return pos;
  }

  getAll(): Position[] {
    return Array.from(this.positions.values(), (p) => ({ ...p }));
  }

  forSymbol(symbol: string): Position[] {
    return this.getAll().filter((p) => p.symbol === symbol);
  }

  count(): number {
    return this.positions.size;
  }
}
