import { mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { logger } from "../lib/logger.js";
import { FatalError, errorMessage } from "../lib/errors.js";
import { abortableSleep, type Sleep } from "../lib/abortable-sleep.js";
import type { HealthStatus } from "../domain/health.js";
import type { WatchdogSettings } from "../types/config.js";
import type { EventRecorder, NotificationSink } from "../types/collaborators.js";
import type { ExchangeClient } from "../types/exchange-client.js";
import type { HeartbeatRecord } from "../types/trading.js";
import { notifySafely } from "../adapters/notifier.js";
import type { InstanceStatus } from "./trading-instance.js";

const log = logger.createChild("watchdog");

/** What the watchdog needs from the registry. */
export interface SupervisedInstances {
  list(): ReadonlyArray<{ readonly id: string; getStatus(): InstanceStatus }>;
  restart(id: string): Promise<void>;
  disable(id: string, reason?: string): Promise<void>;
}

export interface ProcessSample {
  rssBytes: number;
  /** Cumulative user + system CPU time, microseconds. */
  cpuMicros: number;
}

export interface WatchdogDeps {
  instances: SupervisedInstances;
  client: ExchangeClient;
  notifier: NotificationSink;
  events: EventRecorder;
  settings: WatchdogSettings;
  now?: () => number;
  sleep?: Sleep;
  sampleProcess?: () => ProcessSample;
}

export interface RestartEntry {
  instanceId: string;
  at: number;
  failureCount: number;
  reason: string;
}

interface InstanceWatch {
  failureCount: number;
  /** Restarts since the instance last passed a check. */
  consecutiveRestarts: number;
  disabled: boolean;
}

export interface WatchdogStatus {
  running: boolean;
  checks: number;
  lastCheckAt: number | null;
  apiReachable: boolean | null;
  apiLatencyMs: number | null;
  memoryMb: number | null;
  cpuPct: number | null;
  instances: HeartbeatRecord[];
  restartHistory: RestartEntry[];
}

export interface HealthReport {
  status: HealthStatus;
  issues: string[];
  checkedAt: number | null;
}

function defaultSample(): ProcessSample {
  const cpu = process.cpuUsage();
  return { rssBytes: process.memoryUsage().rss, cpuMicros: cpu.user + cpu.system };
}

/**
 * Supervises the instances: samples process resources, probes the exchange,
 * restarts instances that keep failing and disables the ones restarts don't fix.
 * Every check is best effort; one failing check never stops the tick.
 */
export class Watchdog {
  private deps: WatchdogDeps;
  private now: () => number;
  private sleep: Sleep;
  private sampleProcess: () => ProcessSample;

  private running = false;
  private controller: AbortController | null = null;
  private loopDone: Promise<void> | null = null;
  private consecutiveErrors = 0;

  private watches = new Map<string, InstanceWatch>();
  private history: RestartEntry[] = [];
  private checks = 0;
  private lastCheckAt: number | null = null;
  private lastSample: { sample: ProcessSample; at: number } | null = null;
  private memoryMb: number | null = null;
  private cpuPct: number | null = null;
  private apiReachable: boolean | null = null;
  private apiLatencyMs: number | null = null;

  constructor(deps: WatchdogDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? abortableSleep;
    this.sampleProcess = deps.sampleProcess ?? defaultSample;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.controller = new AbortController();
    this.loopDone = this.loop(this.controller.signal);
    log.info({ action: "start", intervalMs: this.deps.settings.intervalMs }, "Watchdog started");
  }

  async stop(): Promise<void> {
    this.running = false;
    this.controller?.abort();
    await this.loopDone;
    this.loopDone = null;
    this.controller = null;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (this.running) {
      try {
        await this.check();
        this.consecutiveErrors = 0;
      } catch (err) {
        this.consecutiveErrors++;
        log.error({ action: "loop", err, consecutiveErrors: this.consecutiveErrors }, "Watchdog tick failed");
      }
      if (!(await this.sleep(this.deps.settings.intervalMs, signal))) break;
    }
  }

  /** One supervision pass. */
  async check(): Promise<void> {
    this.checks++;
    this.lastCheckAt = this.now();

    try {
      this.checkResources();
    } catch (err) {
      log.warn({ action: "resources", err }, "Resource sampling failed");
    }

    try {
      await this.checkApi();
    } catch (err) {
      log.warn({ action: "api", err }, "API probe failed unexpectedly");
    }

    for (const instance of this.deps.instances.list()) {
      try {
        await this.checkInstance(instance.id, instance.getStatus());
      } catch (err) {
        log.error({ action: "checkInstance", instanceId: instance.id, err }, "Instance check failed");
      }
    }

    try {
      await this.writeHeartbeat();
    } catch (err) {
      log.warn({ action: "heartbeat", file: this.deps.settings.heartbeatFile, err }, "Heartbeat write failed");
    }
  }

  private checkResources(): void {
    const { memoryThresholdMb, cpuThresholdPct } = this.deps.settings;
    const sample = this.sampleProcess();
    const at = this.now();

    this.memoryMb = Math.round((sample.rssBytes / 1024 / 1024) * 10) / 10;
    if (this.lastSample && at > this.lastSample.at) {
      const cpuMs = (sample.cpuMicros - this.lastSample.sample.cpuMicros) / 1000;
      this.cpuPct = Math.round((cpuMs / (at - this.lastSample.at)) * 1000) / 10;
    }
    this.lastSample = { sample, at };

    if (this.memoryMb > memoryThresholdMb) {
      log.warn({ action: "resources", memoryMb: this.memoryMb, thresholdMb: memoryThresholdMb }, "Memory above threshold");
    }
    if (this.cpuPct !== null && this.cpuPct > cpuThresholdPct) {
      log.warn({ action: "resources", cpuPct: this.cpuPct, thresholdPct: cpuThresholdPct }, "CPU above threshold");
    }
  }

  private async checkApi(): Promise<void> {
    const t0 = performance.now();
    try {
      await this.deps.client.getServerTime();
      this.apiReachable = true;
      this.apiLatencyMs = Math.round(performance.now() - t0);
    } catch (err) {
      this.apiReachable = false;
      this.apiLatencyMs = null;
      log.warn({ action: "api", latencyMs: Math.round(performance.now() - t0), err }, "Exchange API unreachable");
    }
  }

  private watchFor(id: string): InstanceWatch {
    let watch = this.watches.get(id);
    if (!watch) {
      watch = { failureCount: 0, consecutiveRestarts: 0, disabled: false };
      this.watches.set(id, watch);
    }
    return watch;
  }

  private async checkInstance(id: string, status: InstanceStatus): Promise<void> {
    const { maxFailures, autoRestart, maxRestartCount, maxRestartsBeforeDisable } = this.deps.settings;
    const watch = this.watchFor(id);

    let problem: string | null = null;
    if (status.enabled && !status.running) problem = "enabled but not running";
    else if (status.restartCount > maxRestartCount) problem = `restart count ${status.restartCount} above ${maxRestartCount}`;

    if (problem === null) {
      watch.failureCount = 0;
      watch.consecutiveRestarts = 0;
      if (status.enabled) watch.disabled = false;
      return;
    }

    watch.failureCount++;
    log.warn({ action: "checkInstance", instanceId: id, problem, failureCount: watch.failureCount }, "Instance check failed");
    if (watch.failureCount < maxFailures || !autoRestart) return;

    if (watch.consecutiveRestarts >= maxRestartsBeforeDisable) {
      const fatal = new FatalError(`Instance ${id} still failing after ${watch.consecutiveRestarts} restarts (${problem})`);
      watch.failureCount = 0;
      watch.consecutiveRestarts = 0;
      watch.disabled = true;
      log.fatal({ action: "disable", instanceId: id, err: fatal }, "Disabling auto-trading");
      await this.deps.instances.disable(id, fatal.message);
      void notifySafely(this.deps.notifier, "Auto-trading disabled", fatal.message);
      return;
    }

    const entry: RestartEntry = { instanceId: id, at: this.now(), failureCount: watch.failureCount, reason: problem };
    watch.failureCount = 0;
    watch.consecutiveRestarts++;
    this.history.push(entry);
    if (this.history.length > this.deps.settings.restartHistorySize) {
      this.history.splice(0, this.history.length - this.deps.settings.restartHistorySize);
    }
    log.warn({ action: "restart", instanceId: id, reason: problem, consecutiveRestarts: watch.consecutiveRestarts }, "Restarting instance");
    try {
      await this.deps.instances.restart(id);
    } catch (err) {
      this.deps.events.record("error", { instanceId: id, message: `Watchdog restart failed: ${errorMessage(err)}` });
      throw err;
    }
  }

  private heartbeats(): HeartbeatRecord[] {
    return this.deps.instances.list().map((instance) => {
      const status = instance.getStatus();
      return {
        instanceId: instance.id,
        lastSeen: status.lastSeen,
        failureCount: this.watches.get(instance.id)?.failureCount ?? 0,
        restartCount: status.restartCount,
      };
    });
  }

  private async writeHeartbeat(): Promise<void> {
    const file = this.deps.settings.heartbeatFile;
    const body = {
      timestamp: new Date(this.now()).toISOString(),
      pid: process.pid,
      memoryMb: this.memoryMb,
      cpuPct: this.cpuPct,
      apiReachable: this.apiReachable,
      instances: this.heartbeats(),
    };
    await mkdir(dirname(file), { recursive: true });
    await writeFileAtomic(file, JSON.stringify(body, null, 2) + "\n", "utf8");
  }

  getStatus(): WatchdogStatus {
    return {
      running: this.running,
      checks: this.checks,
      lastCheckAt: this.lastCheckAt,
      apiReachable: this.apiReachable,
      apiLatencyMs: this.apiLatencyMs,
      memoryMb: this.memoryMb,
      cpuPct: this.cpuPct,
      instances: this.heartbeats(),
      restartHistory: this.history.map((e) => ({ ...e })),
    };
  }

  getHealthReport(): HealthReport {
    const { memoryThresholdMb, cpuThresholdPct } = this.deps.settings;
    const issues: string[] = [];

    if (this.apiReachable === false) issues.push("Exchange API unreachable");
    if (this.memoryMb !== null && this.memoryMb > memoryThresholdMb) issues.push(`Memory ${this.memoryMb}MB above ${memoryThresholdMb}MB`);
    if (this.cpuPct !== null && this.cpuPct > cpuThresholdPct) issues.push(`CPU ${this.cpuPct}% above ${cpuThresholdPct}%`);
    for (const [id, watch] of this.watches) {
      if (watch.disabled) issues.push(`Instance ${id} disabled by watchdog`);
      else if (watch.failureCount > 0) issues.push(`Instance ${id} failing (${watch.failureCount})`);
    }

    const status: HealthStatus = this.apiReachable === false ? "UNHEALTHY" : issues.length > 0 ? "DEGRADED" : "HEALTHY";
    return { status, issues, checkedAt: this.lastCheckAt };
  }
}
