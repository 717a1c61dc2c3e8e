import type { StrategyParam } from "../types/strategy.js";

export type ParamOverrides = Readonly<Record<string, number>>;

export interface ResolvedParams<K extends string> {
  params: Record<string, StrategyParam>;
  get(key: K): number;
}

/** Merge numeric overrides into a strategy's default params, rejecting out-of-range values. */
export function resolveParams<K extends string>(
  strategyName: string,
  defaults: Record<K, StrategyParam>,
  overrides?: ParamOverrides,
): ResolvedParams<K> {
  const params: Record<string, StrategyParam> = {};
  for (const [key, defaultParam] of Object.entries<StrategyParam>(defaults)) {
    const override = overrides?.[key];
    if (typeof override === "number") {
      if (!Number.isFinite(override) || override < defaultParam.min || override > defaultParam.max) {
        throw new Error(`${strategyName}: param ${key}=${override} outside [${defaultParam.min}, ${defaultParam.max}]`);
      }
    }
    params[key] = { ...defaultParam, value: override ?? defaultParam.value };
  }
  return {
    params,
    get: (key) => params[key].value,
  };
}

/** Ticker price when known, otherwise the last close (0 if there is none). */
export function resolvePrice(price: number, candleCloses: readonly number[]): number {
  if (Number.isFinite(price) && price > 0) return price;
  const last = candleCloses[candleCloses.length - 1];
  return Number.isFinite(last) && last > 0 ? last : 0;
}

export const SIZING_PARAMS = {
  positionSize: { value: 0.5, min: 0.01, max: 1, step: 0.05, description: "Fraction of balance committed per entry" },
  stopLossPct: { value: 1.5, min: 0.1, max: 20, step: 0.1, description: "Stop distance from entry, percent" },
  takeProfitPct: { value: 2.5, min: 0.1, max: 50, step: 0.1, description: "Target distance from entry, percent" },
} satisfies Record<string, StrategyParam>;
