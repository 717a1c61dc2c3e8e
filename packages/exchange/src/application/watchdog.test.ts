import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Watchdog, type ProcessSample, type SupervisedInstances } from "./watchdog.js";
import { WatchdogSettingsSchema } from "../types/config.js";
import type { InstanceStatus } from "./trading-instance.js";
import { NOW, createMockClient, createMockEvents, createMockNotifier } from "../test-helpers.js";
import type { ExchangeClient } from "../types/exchange-client.js";

function makeStatus(overrides: Partial<InstanceStatus> = {}): InstanceStatus {
  return {
    id: "a",
    pair: "BTC_USDT",
    mode: "dry-run",
    running: true,
    enabled: true,
    restartCount: 0,
    lastRestart: null,
    lastSeen: NOW,
    consecutiveErrors: 0,
    tradingHoursActive: true,
    strategies: ["RSI"],
    lastCycle: null,
    ...overrides,
  };
}

function makeInstances(statuses: Record<string, InstanceStatus>) {
  const instances = {
    list: () => Object.keys(statuses).map((id) => ({ id, getStatus: () => statuses[id] ?? makeStatus({ id }) })),
    restart: vi.fn<(id: string) => Promise<void>>().mockResolvedValue(undefined),
    disable: vi.fn<(id: string, reason?: string) => Promise<void>>().mockResolvedValue(undefined),
  } satisfies SupervisedInstances;
  return instances;
}

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tradeloop-watchdog-test-"));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function createWatchdog(
  instances: SupervisedInstances,
  opts: { client?: ExchangeClient; settings?: Record<string, unknown>; samples?: ProcessSample[]; clock?: () => number } = {},
) {
  const notifier = createMockNotifier();
  const events = createMockEvents();
  const samples = opts.samples ?? [{ rssBytes: 50 * 1024 * 1024, cpuMicros: 0 }];
  let sampleIndex = 0;
  const watchdog = new Watchdog({
    instances,
    client: opts.client ?? createMockClient(),
    notifier,
    events,
    settings: WatchdogSettingsSchema.parse({ heartbeatFile: path.join(tmpDir, "nested", "heartbeat.json"), ...opts.settings }),
    now: opts.clock ?? (() => NOW),
    sampleProcess: () => samples[Math.min(sampleIndex++, samples.length - 1)] ?? { rssBytes: 0, cpuMicros: 0 },
  });
  return { watchdog, notifier, events };
}

async function checkTimes(watchdog: Watchdog, n: number): Promise<void> {
  for (let i = 0; i < n; i++) await watchdog.check();
}

describe("Watchdog instance supervision", () => {
  it("restarts once after maxFailures consecutive failures", async () => {
    const instances = makeInstances({ a: makeStatus({ running: false }) });
    const { watchdog } = createWatchdog(instances);

    await checkTimes(watchdog, 2);
    expect(instances.restart).not.toHaveBeenCalled();

    await watchdog.check();
    expect(instances.restart).toHaveBeenCalledTimes(1);
    expect(instances.restart).toHaveBeenCalledWith("a");
    expect(watchdog.getStatus().restartHistory).toEqual([
      { instanceId: "a", at: NOW, failureCount: 3, reason: "enabled but not running" },
    ]);
    expect(watchdog.getStatus().instances).toEqual([{ instanceId: "a", lastSeen: NOW, failureCount: 0, restartCount: 0 }]);
  });

  it("disables an instance that restarts do not fix", async () => {
    const instances = makeInstances({ a: makeStatus({ running: false }) });
    const { watchdog, notifier } = createWatchdog(instances);

    await checkTimes(watchdog, 12);

    expect(instances.restart).toHaveBeenCalledTimes(3);
    const message = "Instance a still failing after 3 restarts (enabled but not running)";
    expect(instances.disable).toHaveBeenCalledWith("a", message);
    expect(notifier.notify).toHaveBeenCalledWith("Auto-trading disabled", message);
    expect(watchdog.getHealthReport()).toEqual({
      status: "DEGRADED",
      issues: ["Instance a disabled by watchdog"],
      checkedAt: NOW,
    });
  });

  it("forgets failures once the instance passes a check", async () => {
    const statuses = { a: makeStatus({ running: false }) };
    const instances = makeInstances(statuses);
    const { watchdog } = createWatchdog(instances);

    await checkTimes(watchdog, 2);
    statuses.a = makeStatus({ running: true });
    await watchdog.check();
    statuses.a = makeStatus({ running: false });
    await checkTimes(watchdog, 2);

    expect(instances.restart).not.toHaveBeenCalled();
    expect(watchdog.getStatus().instances[0]?.failureCount).toBe(2);
  });

  it("counts a runaway restart count as a failure", async () => {
    const instances = makeInstances({ a: makeStatus({ restartCount: 11 }) });
    const { watchdog } = createWatchdog(instances);

    await checkTimes(watchdog, 3);

    expect(instances.restart).toHaveBeenCalledWith("a");
    expect(watchdog.getStatus().restartHistory[0]?.reason).toBe("restart count 11 above 10");
  });

  it("leaves stopped instances alone when autoRestart is off", async () => {
    const instances = makeInstances({ a: makeStatus({ running: false }) });
    const { watchdog } = createWatchdog(instances, { settings: { autoRestart: false } });

    await checkTimes(watchdog, 5);

    expect(instances.restart).not.toHaveBeenCalled();
    expect(watchdog.getHealthReport().issues).toEqual(["Instance a failing (5)"]);
  });

  it("keeps checking other instances when one restart fails", async () => {
    const instances = makeInstances({ a: makeStatus({ id: "a", running: false }), b: makeStatus({ id: "b", running: false }) });
    instances.restart.mockRejectedValueOnce(new Error("stuck"));
    const { watchdog, events } = createWatchdog(instances);

    await checkTimes(watchdog, 3);

    expect(instances.restart.mock.calls).toEqual([["a"], ["b"]]);
    expect(events.record).toHaveBeenCalledWith("error", { instanceId: "a", message: "Watchdog restart failed: stuck" });
  });

  it("ignores disabled instances", async () => {
    const instances = makeInstances({ a: makeStatus({ enabled: false, running: false }) });
    const { watchdog } = createWatchdog(instances);

    await checkTimes(watchdog, 5);

    expect(instances.restart).not.toHaveBeenCalled();
    expect(watchdog.getHealthReport().status).toBe("HEALTHY");
  });
});

describe("Watchdog process and API checks", () => {
  it("derives memory and CPU from consecutive samples", async () => {
    let clock = NOW;
    const instances = makeInstances({});
    const { watchdog } = createWatchdog(instances, {
      clock: () => clock,
      samples: [
        { rssBytes: 100 * 1024 * 1024, cpuMicros: 0 },
        { rssBytes: 100 * 1024 * 1024, cpuMicros: 500_000 },
      ],
    });

    await watchdog.check();
    expect(watchdog.getStatus().cpuPct).toBeNull();
    clock += 1_000;
    await watchdog.check();

    expect(watchdog.getStatus()).toMatchObject({ memoryMb: 100, cpuPct: 50, checks: 2 });
    expect(watchdog.getHealthReport()).toEqual({ status: "DEGRADED", issues: ["Memory 100MB above 80MB"], checkedAt: NOW + 1_000 });
  });

  it("reports an unreachable API as unhealthy", async () => {
    const client = createMockClient({ getServerTime: vi.fn().mockRejectedValue(new Error("ECONNREFUSED")) });
    const { watchdog } = createWatchdog(makeInstances({}), { client });

    await watchdog.check();

    expect(watchdog.getStatus().apiReachable).toBe(false);
    expect(watchdog.getHealthReport()).toEqual({ status: "UNHEALTHY", issues: ["Exchange API unreachable"], checkedAt: NOW });
  });

  it("writes the heartbeat file", async () => {
    const { watchdog } = createWatchdog(makeInstances({ a: makeStatus() }));

    await watchdog.check();

    const written: unknown = JSON.parse(fs.readFileSync(path.join(tmpDir, "nested", "heartbeat.json"), "utf8"));
    expect(written).toEqual({
      timestamp: new Date(NOW).toISOString(),
      pid: process.pid,
      memoryMb: 50,
      cpuPct: null,
      apiReachable: true,
      instances: [{ instanceId: "a", lastSeen: NOW, failureCount: 0, restartCount: 0 }],
    });
  });
});

describe("Watchdog loop", () => {
  it("checks on each interval until stopped", async () => {
    const instances = makeInstances({ a: makeStatus() });
    const sleeps: number[] = [];
    const watchdog = new Watchdog({
      instances,
      client: createMockClient(),
      notifier: createMockNotifier(),
      events: createMockEvents(),
      settings: WatchdogSettingsSchema.parse({ heartbeatFile: path.join(tmpDir, "hb.json"), intervalMs: 1_000 }),
      now: () => NOW,
      sleep: (ms, signal) => {
        sleeps.push(ms);
        if (sleeps.length < 3) return Promise.resolve(true);
        return new Promise((resolve) => {
          if (signal?.aborted) return resolve(false);
          signal?.addEventListener("abort", () => resolve(false), { once: true });
        });
      },
    });

    watchdog.start();
    await vi.waitFor(() => expect(sleeps).toEqual([1_000, 1_000, 1_000]));
    await watchdog.stop();

    expect(watchdog.getStatus()).toMatchObject({ running: false, checks: 3 });
  });
});
