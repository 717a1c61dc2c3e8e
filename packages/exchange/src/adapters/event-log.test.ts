import { describe, it, expect, afterEach } from "vitest";
import { EventLog } from "./event-log.js";
import { readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import type { EngineEvent } from "../types/events.js";

const tmpDir = join(tmpdir(), "tradeloop-event-log-test");

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("EventLog", () => {
  it("appends NDJSON events to file", async () => {
    const logPath = join(tmpDir, "events.ndjson");
    const log = new EventLog(logPath);

    const placed: EngineEvent = {
      type: "order_placed",
      timestamp: "2024-01-01T00:00:00Z",
      data: { symbol: "BTC_USDT", quantity: 0.01 },
    };

    await log.append(placed);
    await log.append({ ...placed, type: "order_filled" });

    const lines = (await readFile(logPath, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0])).toEqual(placed);
    expect(JSON.parse(lines[1]).type).toBe("order_filled");
  });

  it("creates the directory if it does not exist", async () => {
    const nested = join(tmpDir, "nested", "deep", "events.ndjson");
    const log = new EventLog(nested);

    await log.append({ type: "daemon_started", timestamp: "2024-01-01T00:00:00Z", data: {} });

    const content = await readFile(nested, "utf-8");
    expect(JSON.parse(content.trim()).type).toBe("daemon_started");
  });

  it("queues recorded events in order", async () => {
    const log = new EventLog(join(tmpDir, "events.ndjson"));

    log.record("instance_started", { instanceId: "main" });
    log.record("cycle_completed", { action: "HOLD" });
    log.record("instance_stopped");

    const recent = await log.readRecent(2);
    expect(recent.map((e) => e.type)).toEqual(["cycle_completed", "instance_stopped"]);
    expect(recent[0].data).toEqual({ action: "HOLD" });
  });

  it("reads nothing before the first write", async () => {
    const log = new EventLog(join(tmpDir, "missing.ndjson"));
    expect(await log.readRecent(10)).toEqual([]);
  });
});
