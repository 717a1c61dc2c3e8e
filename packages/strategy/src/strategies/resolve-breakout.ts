export type BreakoutDirection = "LONG" | "SHORT" | "CONFLICT" | "NONE";

export interface BreakoutResolution {
  direction: BreakoutDirection;
  longDistance: number;
  shortDistance: number;
}

/**
 * Resolve mutually exclusive breakout direction.
 *
 * Long triggers above `longLevel`, short below `shortLevel`. When both trigger at once the
 * side that is further past its level wins; an exact tie is a CONFLICT and must not trade.
 */
export function resolveBreakout(price: number, longLevel: number, shortLevel: number): BreakoutResolution {
  const longDistance = price - longLevel;
  const shortDistance = shortLevel - price;
  const longTriggered = longDistance > 0;
  const shortTriggered = shortDistance > 0;

  let direction: BreakoutDirection = "NONE";
  if (longTriggered && shortTriggered) {
    if (longDistance > shortDistance) direction = "LONG";
    else if (shortDistance > longDistance) direction = "SHORT";
    else direction = "CONFLICT";
  } else if (longTriggered) {
    direction = "LONG";
  } else if (shortTriggered) {
    direction = "SHORT";
  }

  return { direction, longDistance, shortDistance };
}
