import { z } from "zod";
import { StrategyKind, type Strategy } from "../types/strategy.js";
import { createAdvancedStrategy } from "./advanced.js";
import { createBreakoutStrategy } from "./breakout.js";
import { createDcaStrategy } from "./dca.js";
import { createGridStrategy } from "./grid.js";
import { createRsiMultiTfStrategy } from "./rsi-multi-tf.js";
import { createRsiStrategy } from "./rsi.js";
import { createVolumeFilterStrategy } from "./volume-filter.js";

export const StrategyConfigSchema = z.object({
  kind: z.enum(StrategyKind),
  params: z.record(z.number()).default({}),
});

export type StrategyConfig = z.infer<typeof StrategyConfigSchema>;

/** Build the strategy for a tagged config. The switch is exhaustive over StrategyKind. */
export function createStrategy(config: StrategyConfig): Strategy {
  const { kind, params } = config;
  switch (kind) {
    case "RSI":
      return createRsiStrategy(params);
    case "RSIMultiTF":
      return createRsiMultiTfStrategy(params);
    case "VolumeFilter":
      return createVolumeFilterStrategy(params);
    case "Advanced":
      return createAdvancedStrategy(params);
    case "Grid":
      return createGridStrategy(params);
    case "DCA":
      return createDcaStrategy(params);
    case "Breakout":
      return createBreakoutStrategy(params);
    default: {
      const unreachable: never = kind;
      throw new Error(`Unknown strategy kind: ${String(unreachable)}`);
    }
  }
}

/** The simplest variant, used when the configured strategy fails or times out. */
export function createFallbackStrategy(): Strategy {
  return createRsiStrategy();
}
