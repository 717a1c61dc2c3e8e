import { readFileSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { formatZodErrors } from "@tradeloop/kit";
import { logger } from "../lib/logger.js";
import { FatalError, ValidationError } from "../lib/errors.js";
import { EngineConfigSchema, type EngineConfig } from "../types/config.js";
import type { ConfigProvider } from "../types/collaborators.js";

const log = logger.createChild("config");

function parseConfig(raw: string, source: string): EngineConfig {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ValidationError(`${source}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  const parsed = EngineConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(`${source}: ${formatZodErrors(parsed.error).join("; ")}`);
  }
  return parsed.data;
}

/**
 * Engine config backed by a JSON file. `get()` returns a deep copy so callers
 * can hold on to it across a reload. A failed reload keeps the previous config.
 */
export class JsonConfigProvider implements ConfigProvider {
  private current: EngineConfig;

  constructor(private readonly path: string) {
    let raw: string;
    try {
      raw = readFileSync(path, "utf-8");
    } catch (err) {
      throw new FatalError(`Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }
    this.current = parseConfig(raw, path);
  }

  get(): EngineConfig {
    return structuredClone(this.current);
  }

  async reload(): Promise<EngineConfig> {
    const t0 = performance.now();
    const raw = await readFile(this.path, "utf-8");
    try {
      this.current = parseConfig(raw, this.path);
    } catch (err) {
      log.error({ action: "reload", path: this.path, err }, "Config reload rejected, keeping previous config");
      throw err;
    }
    log.info({ action: "reload", path: this.path, instances: this.current.instances.length, latencyMs: Math.round(performance.now() - t0) }, "Config reloaded");
    return this.get();
  }
}

/** In-memory provider for tests and embedding. */
export class StaticConfigProvider implements ConfigProvider {
  constructor(private config: EngineConfig) {}

  get(): EngineConfig {
    return structuredClone(this.config);
  }

  async reload(): Promise<EngineConfig> {
    return this.get();
  }
}
