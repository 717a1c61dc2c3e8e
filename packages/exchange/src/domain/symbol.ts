/** `BTCUSDT` → `BTC_USDT`; already-separated symbols pass through. */
export function toExchangeSymbol(symbol: string, quoteAsset = "USDT"): string {
  const upper = symbol.toUpperCase().replace(/[-/]/g, "_");
  if (upper.includes("_")) return upper;
  if (upper.endsWith(quoteAsset) && upper.length > quoteAsset.length) {
    return `${upper.slice(0, -quoteAsset.length)}_${quoteAsset}`;
  }
  return upper;
}
