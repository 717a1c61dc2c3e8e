import type { OrderStatus } from "../types/exchange-client.js";

const TERMINAL: ReadonlySet<OrderStatus> = new Set(["FILLED", "CANCELED", "REJECTED"]);

export function isTerminal(status: OrderStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Maps an exchange order status to ours.
 *
 * CLOSED is ambiguous on the wire: fully filled means FILLED, anything less
 * means the remainder was canceled. Unknown statuses stay PENDING so the fill
 * monitor keeps polling instead of dropping the order.
 */
export function resolveOrderStatus(raw: string, filledQuantity: number, quantity: number): OrderStatus {
  const status = raw.toUpperCase();
  const fullyFilled = quantity > 0 && filledQuantity >= quantity;

  if (status === "FILLED") return "FILLED";
  if (status === "CLOSED") return fullyFilled ? "FILLED" : "CANCELED";
  if (status === "CANCELED" || status === "CANCELLED" || status === "EXPIRED") return "CANCELED";
  if (status === "REJECTED") return "REJECTED";
  if (status === "PARTIALLY_FILLED") return "PARTIALLY_FILLED";
  if (status === "OPEN" || status === "NEW") return filledQuantity > 0 ? "PARTIALLY_FILLED" : "PENDING";
  return "PENDING";
}
