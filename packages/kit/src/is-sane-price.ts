/** Range check for quotes coming off the wire. Rejects zero, negatives and absurd magnitudes. */
export function isSanePrice(value: number): boolean {
  return Number.isFinite(value) && value > 0 && value < 100_000_000;
}
