import { EventEmitter } from "node:events";
import WebSocket from "ws";
import { createActor, type Actor } from "xstate";
import { logger } from "../lib/logger.js";
import type { FeedSettings } from "../types/config.js";
import { feedMachine, type FeedState } from "./feed-machine.js";

const log = logger.createChild("marketDataFeed");

export interface FeedSocketHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(reason: string): void;
  onError(err: Error): void;
}

export interface FeedSocket {
  send(text: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: FeedSocketHandlers) => FeedSocket;

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data.toString("utf-8");
}

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on("open", () => handlers.onOpen());
  ws.on("message", (data) => handlers.onMessage(rawToString(data)));
  ws.on("close", (code, reason) => handlers.onClose(`${code} ${reason.toString("utf-8")}`.trim()));
  // a failed handshake emits error then close; close drives the reconnect
  ws.on("error", (err) => handlers.onError(err));
  return {
    send: (text) => ws.send(text),
    close: () => ws.close(),
  };
};

export type ChannelParams = Record<string, string | number | boolean>;
export type ChannelHandler = (message: Record<string, unknown>) => void;

export interface MarketDataFeedEvents {
  state: [state: FeedState];
  message: [message: Record<string, unknown>];
  stale: [info: { lastMessageAt: number; silentMs: number }];
}

export declare interface MarketDataFeed {
  on<K extends keyof MarketDataFeedEvents>(event: K, listener: (...args: MarketDataFeedEvents[K]) => void): this;
  emit<K extends keyof MarketDataFeedEvents>(event: K, ...args: MarketDataFeedEvents[K]): boolean;
}

export interface MarketDataFeedDeps {
  urls: readonly string[];
  settings: FeedSettings;
  createSocket?: SocketFactory;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Streaming market data over WebSocket. Rotates through candidate URLs with a
 * fixed delay; after too many consecutive failures it parks in DEGRADED and
 * callers fall back to REST until `reset()`.
 */
export class MarketDataFeed extends EventEmitter {
  private readonly urls: readonly string[];
  private readonly settings: FeedSettings;
  private readonly createSocket: SocketFactory;
  private readonly actor: Actor<typeof feedMachine>;
  private readonly subscriptions = new Map<string, Record<string, unknown>>();
  private readonly handlers = new Map<string, ChannelHandler>();

  private socket: FeedSocket | null = null;
  private generation = 0;
  private running = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private staleTimer: ReturnType<typeof setTimeout> | null = null;
  private lastMessageAt = 0;
  private lastState: FeedState = "DISCONNECTED";

  constructor(deps: MarketDataFeedDeps) {
    super();
    if (deps.urls.length === 0) throw new Error("MarketDataFeed needs at least one URL");
    this.urls = deps.urls;
    this.settings = deps.settings;
    this.createSocket = deps.createSocket ?? wsSocketFactory;
    this.actor = createActor(feedMachine, {
      input: { maxAttempts: deps.settings.maxReconnectAttempts, urlCount: deps.urls.length },
    });
    this.actor.subscribe((snapshot) => {
      const state = snapshot.value;
      if (state === this.lastState) return;
      this.lastState = state;
      log.info({ action: "stateChange", state, failedAttempts: snapshot.context.failedAttempts }, `Feed ${state}`);
      this.emit("state", state);
    });
    this.actor.start();
  }

  getState(): FeedState {
    return this.actor.getSnapshot().value;
  }

  isConnected(): boolean {
    return this.getState() === "CONNECTED";
  }

  isDegraded(): boolean {
    return this.getState() === "DEGRADED";
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.actor.send({ type: "CONNECT" });
    this.open();
  }

  stop(): void {
    this.running = false;
    this.clearTimers();
    this.generation++;
    this.socket?.close();
    this.socket = null;
    this.actor.send({ type: "DISCONNECT" });
  }

  /** Leave DEGRADED and try streaming again. */
  reset(): void {
    if (!this.running || !this.isDegraded()) return;
    log.info({ action: "reset" }, "Feed reset by operator");
    this.actor.send({ type: "RESET" });
    this.open();
  }

  subscribe(channel: string, params: ChannelParams = {}): void {
    const message = { event: "subscribe", channel, ...params };
    const key = JSON.stringify(message);
    if (this.subscriptions.has(key)) return;
    this.subscriptions.set(key, message);
    if (this.isConnected()) this.send(message);
  }

  unsubscribe(channel: string, params: ChannelParams = {}): void {
    const key = JSON.stringify({ event: "subscribe", channel, ...params });
    if (!this.subscriptions.delete(key)) return;
    if (this.isConnected()) this.send({ event: "unsubscribe", channel, ...params });
  }

  getSubscriptions(): Record<string, unknown>[] {
    return [...this.subscriptions.values()];
  }

  /** Route inbound messages whose `channel` equals `channel`. One handler per channel. */
  onChannel(channel: string, handler: ChannelHandler): void {
    this.handlers.set(channel, handler);
  }

  private open(): void {
    const { urlIndex } = this.actor.getSnapshot().context;
    const url = this.urls[urlIndex];
    const generation = ++this.generation;
    const current = () => generation === this.generation && this.running;

    log.debug({ action: "connect", url }, "Opening feed socket");
    this.socket = this.createSocket(url, {
      onOpen: () => {
        if (!current()) return;
        this.actor.send({ type: "OPENED" });
        this.lastMessageAt = Date.now();
        for (const message of this.subscriptions.values()) this.send(message);
        this.resetStaleTimer();
      },
      onMessage: (text) => {
        if (!current()) return;
        this.handleMessage(text);
      },
      onClose: (reason) => {
        if (!current()) return;
        this.handleClose(url, reason);
      },
      onError: (err) => {
        if (!current()) return;
        log.warn({ action: "socketError", url, err }, "Feed socket error");
      },
    });
  }

  private handleClose(url: string, reason: string): void {
    this.socket = null;
    this.clearStaleTimer();
    this.actor.send({ type: "FAILED" });

    if (this.isDegraded()) {
      log.error({ action: "degraded", url, reason, maxReconnectAttempts: this.settings.maxReconnectAttempts }, "Feed degraded, falling back to REST polling");
      return;
    }

    const delay = this.settings.reconnectDelayMs;
    log.warn({ action: "reconnect", url, reason, delay, failedAttempts: this.actor.getSnapshot().context.failedAttempts }, "Feed closed, reconnecting");
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.running) this.open();
    }, delay);
  }

  private handleMessage(text: string): void {
    this.lastMessageAt = Date.now();
    this.resetStaleTimer();

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      log.debug({ action: "message", length: text.length }, "Dropping unparsable message");
      return;
    }
    if (!isRecord(parsed)) {
      log.debug({ action: "message" }, "Dropping non-object message");
      return;
    }

    if (parsed.op === "PING") {
      this.send({ op: "PONG", timestamp: Date.now() });
      return;
    }

    this.emit("message", parsed);

    const channel = parsed.channel;
    const handler = typeof channel === "string" ? this.handlers.get(channel) : undefined;
    if (!handler) {
      log.debug({ action: "message", channel }, "Dropping unroutable message");
      return;
    }
    try {
      handler(parsed);
    } catch (err) {
      log.error({ action: "handler", channel, err }, "Channel handler threw");
    }
  }

  private send(message: Record<string, unknown>): void {
    try {
      this.socket?.send(JSON.stringify(message));
    } catch (err) {
      log.warn({ action: "send", err }, "Feed send failed");
    }
  }

  private resetStaleTimer(): void {
    this.clearStaleTimer();
    this.staleTimer = setTimeout(() => {
      const silentMs = Date.now() - this.lastMessageAt;
      log.warn({ action: "stale", silentMs }, "Feed stale");
      this.emit("stale", { lastMessageAt: this.lastMessageAt, silentMs });
    }, this.settings.staleAfterMs);
  }

  private clearStaleTimer(): void {
    if (this.staleTimer) {
      clearTimeout(this.staleTimer);
      this.staleTimer = null;
    }
  }

  private clearTimers(): void {
    this.clearStaleTimer();
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }
}
