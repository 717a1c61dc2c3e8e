export type PositionSide = "long" | "short";

/** Stop `distancePct` percent behind price on the losing side of the position. */
export function trailingStopFor(side: PositionSide, price: number, distancePct: number): number {
  return side === "long" ? price * (1 - distancePct / 100) : price * (1 + distancePct / 100);
}

/** True when `candidate` is strictly more protective than `current` (higher for longs, lower for shorts). */
export function improvesStop(side: PositionSide, candidate: number, current: number): boolean {
  return side === "long" ? candidate > current : candidate < current;
}

/** Favorable move from `from` to `to`, in percent of `from`. Negative when price moved against the position. */
export function favorableMovePct(side: PositionSide, from: number, to: number): number {
  const move = ((to - from) / from) * 100;
  return side === "long" ? move : -move;
}
