import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { logger } from "../lib/logger.js";
import { EngineEventSchema, type EngineEvent, type EventType } from "../types/events.js";
import type { EventRecorder } from "../types/collaborators.js";

const log = logger.createChild("eventLog");

/** Append-only NDJSON journal of engine events. Writes are queued in order. */
export class EventLog implements EventRecorder {
  private filePath: string;
  private ready: Promise<void>;
  private tail: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
    this.ready = mkdir(dirname(filePath), { recursive: true }).then(() => {});
  }

  async append(event: EngineEvent): Promise<void> {
    await this.ready;
    const line = JSON.stringify(event) + "\n";
    await appendFile(this.filePath, line, "utf-8");
  }

  /** Fire-and-forget append. A failed write is logged and never reaches the caller. */
  record(type: EventType, data: Record<string, unknown> = {}): void {
    const event: EngineEvent = { type, timestamp: new Date().toISOString(), data };
    this.tail = this.tail
      .then(() => this.append(event))
      .catch((err: unknown) => {
        log.warn({ action: "record", type, err }, "Failed to append event");
      });
  }

  /** Resolves once every queued `record` has been written. */
  flush(): Promise<void> {
    return this.tail;
  }

  async readRecent(limit: number): Promise<EngineEvent[]> {
    await this.flush();
    let content: string;
    try {
      content = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const lines = content.split("\n").filter((l) => l.length > 0);
    return lines.slice(-limit).map((l) => EngineEventSchema.parse(JSON.parse(l)));
  }
}
