/** Structural view of a trading-signals indicator. */
export interface StreamingIndicator {
  add(value: number): unknown;
  readonly isStable: boolean;
  getResult(): unknown;
}

/**
 * Feed every value through a streaming indicator and collect one output per input.
 * Values produced before the indicator is stable are NaN.
 */
export function streamValues(values: readonly number[], indicator: StreamingIndicator): number[] {
  return values.map((v) => {
    indicator.add(v);
    return indicator.isStable ? Number(indicator.getResult()) : NaN;
  });
}

export function lastFinite(series: readonly number[]): number {
  for (let i = series.length - 1; i >= 0; i--) {
    if (Number.isFinite(series[i])) return series[i];
  }
  return NaN;
}
