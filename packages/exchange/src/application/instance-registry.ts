import type { StrategyConfig, StrategyKind } from "@tradeloop/strategy";
import { logger } from "../lib/logger.js";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import { toExchangeSymbol } from "../domain/symbol.js";
import type { EngineConfig } from "../types/config.js";
import type { InstanceStatus, PortfolioSnapshot, TradingInstance } from "./trading-instance.js";

const log = logger.createChild("instanceRegistry");

/** Owns every trading instance by id. Unknown ids raise NotFoundError. */
export class InstanceRegistry {
  private instances = new Map<string, TradingInstance>();

  register(instance: TradingInstance): void {
    if (this.instances.has(instance.id)) {
      throw new ValidationError(`Instance ${instance.id} already registered`);
    }
    this.instances.set(instance.id, instance);
  }

  get(id: string): TradingInstance {
    const instance = this.instances.get(id);
    if (!instance) throw new NotFoundError(`Instance ${id} not found`);
    return instance;
  }

  list(): TradingInstance[] {
    return [...this.instances.values()];
  }

  enable(id: string): Promise<void> {
    return this.get(id).enable();
  }

  disable(id: string, reason?: string): Promise<void> {
    return this.get(id).disable(reason);
  }

  restart(id: string): Promise<void> {
    return this.get(id).restart();
  }

  getStatus(id: string): InstanceStatus {
    return this.get(id).getStatus();
  }

  getPortfolioSnapshot(id: string): Promise<PortfolioSnapshot> {
    return this.get(id).getPortfolioSnapshot();
  }

  addStrategy(id: string, config: StrategyConfig): Promise<StrategyConfig[]> {
    return this.get(id).addStrategy(config);
  }

  removeStrategy(id: string, kind: StrategyKind): Promise<StrategyConfig[]> {
    return this.get(id).removeStrategy(kind);
  }

  /** Start every enabled instance. */
  async startAll(): Promise<void> {
    await Promise.all(this.list().filter((i) => i.isEnabled()).map((i) => i.start()));
    log.info({ action: "startAll", running: this.list().filter((i) => i.isRunning()).length }, "Instances started");
  }

  async stopAll(): Promise<void> {
    const results = await Promise.allSettled(this.list().map((i) => i.stop()));
    for (const [i, r] of results.entries()) {
      if (r.status === "rejected") {
        log.error({ action: "stopAll", instanceId: this.list()[i]?.id, err: r.reason }, "Instance failed to stop");
      }
    }
  }

  /** Fan a streamed price out to every instance trading `symbol`. */
  routeTicker(symbol: string, price: number): void {
    const target = toExchangeSymbol(symbol);
    for (const instance of this.instances.values()) {
      if (instance.symbol === target) instance.onPrice(price);
    }
  }

  /** Push reloaded instance configs to the instances that already exist. */
  applyConfig(config: EngineConfig): void {
    for (const instanceConfig of config.instances) {
      const instance = this.instances.get(instanceConfig.id);
      if (!instance) {
        log.warn({ action: "applyConfig", instanceId: instanceConfig.id }, "New instance in config ignored until restart");
        continue;
      }
      instance.updateConfig(instanceConfig);
    }
  }

  /** Distinct symbols across instances, for feed subscriptions. */
  symbols(): string[] {
    return [...new Set(this.list().map((i) => i.symbol))];
  }
}
