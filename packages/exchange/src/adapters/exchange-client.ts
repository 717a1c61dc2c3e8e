import { z } from "zod";
import type { Candle, CandleInterval } from "@tradeloop/strategy";
import { backoffDelay } from "@tradeloop/kit";
import { logger } from "../lib/logger.js";
import {
  ExchangeError, ExhaustedError, NetworkError, RateLimitedError, ValidationError, errorMessage,
} from "../lib/errors.js";
import type { ExchangeSettings } from "../types/config.js";
import type {
  Balance, Depth, ExchangeClient, ExchangePosition, Order, PlaceOrderRequest, RequestOptions, Ticker, Trade,
} from "../types/exchange-client.js";
import {
  KLINE_LIMIT_MAX, getDialect, parseBalances, parseDepth, parseKlines, parseOrder, parseOrders, parsePlacedOrder,
  parsePositions, parseTicker, parseTrades, toExchangeInterval, type Dialect,
} from "./dialects.js";
import { toExchangeSymbol } from "../domain/symbol.js";
import { gotTransport, type HttpResponse, type HttpTransport } from "./http-transport.js";
import { RateLimiter, systemClock, type Clock } from "./rate-limiter.js";
import { canonicalQuery, compactBody, signRequest, type HttpMethod, type Params } from "./signing.js";

const log = logger.createChild("exchangeClient");

const EnvelopeSchema = z.object({
  result: z.boolean().optional(),
  code: z.union([z.number(), z.string()]).optional(),
  message: z.string().optional(),
  msg: z.string().optional(),
  data: z.unknown().optional(),
  timestamp: z.coerce.number().optional(),
}).passthrough();

type Envelope = z.infer<typeof EnvelopeSchema>;

const ServerTimeSchema = z.object({ timestamp: z.coerce.number() });

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

export interface HttpExchangeClientDeps {
  settings: ExchangeSettings;
  /** Absent in dry runs: signed endpoints then fail with ValidationError. */
  credentials?: Credentials;
  quoteAsset?: string;
  transport?: HttpTransport;
  clock?: Clock;
}

interface CallOptions extends RequestOptions {
  signed?: boolean;
}

function retryAfterSeconds(res: HttpResponse, fallback: number): number {
  const raw = res.headers["retry-after"];
  const value = Number(Array.isArray(raw) ? raw[0] : raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

function isErrorCode(code: Envelope["code"]): boolean {
  return code !== undefined && code !== 0 && code !== "0";
}

/**
 * REST client for the exchange. Signs private requests, spaces request starts,
 * retries transient failures and waits out 429s. No dedupe or idempotency:
 * a retried POST may place twice, callers own that.
 */
export class HttpExchangeClient implements ExchangeClient {
  private readonly settings: ExchangeSettings;
  private readonly credentials: Credentials | undefined;
  private readonly quoteAsset: string;
  private readonly transport: HttpTransport;
  private readonly clock: Clock;
  private readonly limiter: RateLimiter;
  readonly dialect: Dialect;

  private clockOffsetMs = 0;
  private lastClockSync = Number.NEGATIVE_INFINITY;

  constructor(deps: HttpExchangeClientDeps) {
    this.settings = deps.settings;
    this.credentials = deps.credentials;
    this.quoteAsset = deps.quoteAsset ?? "USDT";
    this.transport = deps.transport ?? gotTransport;
    this.clock = deps.clock ?? systemClock;
    this.limiter = new RateLimiter(deps.settings.minRequestIntervalMs, this.clock);
    this.dialect = getDialect(deps.settings.dialect);
  }

  // --- account -------------------------------------------------------------

  async getBalances(opts?: RequestOptions): Promise<Balance[]> {
    return parseBalances(await this.call("GET", this.dialect.paths.balances, {}, { ...opts, signed: true }));
  }

  async getQuoteBalance(asset: string, opts?: RequestOptions): Promise<number> {
    const balance = (await this.getBalances(opts)).find((b) => b.asset === asset.toUpperCase());
    return balance ? balance.free : 0;
  }

  async getPositions(opts?: RequestOptions): Promise<ExchangePosition[]> {
    const path = this.dialect.paths.positions;
    if (!path) return [];
    return parsePositions(await this.call("GET", path, {}, { ...opts, signed: true }));
  }

  // --- orders --------------------------------------------------------------

  async placeOrder(req: PlaceOrderRequest, opts?: RequestOptions): Promise<Order> {
    if (!Number.isFinite(req.quantity) || req.quantity <= 0) {
      throw new ValidationError(`Order quantity must be positive, got ${req.quantity}`);
    }
    const symbol = toExchangeSymbol(req.symbol, this.quoteAsset);
    const params = this.dialect.orderParams(req, symbol);
    const t0 = performance.now();
    const data = await this.call("POST", this.dialect.paths.order, params, { ...opts, signed: true });
    const order = parsePlacedOrder(data, req, symbol, this.clock.now());
    log.info({ action: "placeOrder", symbol, side: req.side, type: req.type, quantity: req.quantity, orderId: order.id, latencyMs: Math.round(performance.now() - t0) }, "Order placed");
    return order;
  }

  async getOrder(symbol: string, orderId: string, opts?: RequestOptions): Promise<Order> {
    const data = await this.call("GET", this.dialect.paths.order, { orderId, symbol: toExchangeSymbol(symbol, this.quoteAsset) }, { ...opts, signed: true });
    return parseOrder(data, this.clock.now());
  }

  async cancelOrder(symbol: string, orderId: string, opts?: RequestOptions): Promise<void> {
    const t0 = performance.now();
    await this.call("DELETE", this.dialect.paths.order, { orderId, symbol: toExchangeSymbol(symbol, this.quoteAsset) }, { ...opts, signed: true });
    log.info({ action: "cancelOrder", symbol, orderId, latencyMs: Math.round(performance.now() - t0) }, "Order canceled");
  }

  async getOpenOrders(symbol: string, opts?: RequestOptions): Promise<Order[]> {
    const data = await this.call("GET", this.dialect.paths.openOrders, { symbol: toExchangeSymbol(symbol, this.quoteAsset) }, { ...opts, signed: true });
    return parseOrders(data, this.clock.now());
  }

  // --- market data ---------------------------------------------------------

  async getKlines(symbol: string, interval: CandleInterval, limit: number, opts?: RequestOptions): Promise<Candle[]> {
    const params = {
      symbol: toExchangeSymbol(symbol, this.quoteAsset),
      interval: toExchangeInterval(interval),
      limit: Math.min(limit, KLINE_LIMIT_MAX),
    };
    return parseKlines(await this.call("GET", this.dialect.paths.klines, params, opts ?? {}));
  }

  async getTicker(symbol: string, opts?: RequestOptions): Promise<Ticker> {
    const exchangeSymbol = toExchangeSymbol(symbol, this.quoteAsset);
    const data = await this.call("GET", this.dialect.paths.tickers, { symbol: exchangeSymbol }, opts ?? {});
    return parseTicker(data, exchangeSymbol, this.clock.now());
  }

  async getDepth(symbol: string, limit: number, opts?: RequestOptions): Promise<Depth> {
    const data = await this.call("GET", this.dialect.paths.depth, { symbol: toExchangeSymbol(symbol, this.quoteAsset), limit }, opts ?? {});
    return parseDepth(data, this.clock.now());
  }

  async getTrades(symbol: string, limit: number, opts?: RequestOptions): Promise<Trade[]> {
    const data = await this.call("GET", this.dialect.paths.trades, { symbol: toExchangeSymbol(symbol, this.quoteAsset), limit }, opts ?? {});
    return parseTrades(data);
  }

  /** Exchange clock in ms, read from the public tickers endpoint. */
  async getServerTime(opts?: RequestOptions): Promise<number> {
    const envelope = await this.callEnvelope("GET", this.dialect.paths.tickers, {}, opts ?? {});
    const fromData = ServerTimeSchema.safeParse(envelope.data);
    if (fromData.success) return fromData.data.timestamp;
    if (envelope.timestamp !== undefined) return envelope.timestamp;
    throw new ValidationError("Server time missing from tickers response");
  }

  // --- transport -----------------------------------------------------------

  private async call(method: HttpMethod, path: string, params: Params, opts: CallOptions): Promise<unknown> {
    const envelope = await this.callEnvelope(method, path, params, opts);
    return envelope.data ?? envelope;
  }

  private async callEnvelope(method: HttpMethod, path: string, params: Params, opts: CallOptions): Promise<Envelope> {
    const { retryAttempts, retryBackoff, maxRateLimitWaits, defaultRetryAfterSec, requestTimeoutMs } = this.settings;
    let attempt = 0;
    let rateLimitWaits = 0;
    let lastError: unknown = null;

    while (attempt < retryAttempts) {
      opts.signal?.throwIfAborted();
      await this.limiter.acquire();
      const { url, headers, body } = await this.buildRequest(method, path, params, opts);
      const t0 = performance.now();

      let res: HttpResponse;
      try {
        res = await this.transport({ method, url, headers, body, timeoutMs: requestTimeoutMs, signal: opts.signal });
      } catch (err) {
        if (opts.signal?.aborted) throw err;
        lastError = err instanceof NetworkError ? err : new NetworkError(errorMessage(err), null, { cause: err });
        attempt++;
        log.warn({ action: "request", method, path, attempt, retryAttempts, err, latencyMs: Math.round(performance.now() - t0) }, "Request failed");
        await this.backoff(attempt, retryAttempts, retryBackoff, opts.signal);
        continue;
      }

      if (res.status === 429) {
        rateLimitWaits++;
        if (rateLimitWaits >= maxRateLimitWaits) throw new RateLimitedError(rateLimitWaits);
        const waitSec = retryAfterSeconds(res, defaultRetryAfterSec);
        log.warn({ action: "request", method, path, waitSec, rateLimitWaits }, "Rate limited, waiting");
        await this.clock.sleep(waitSec * 1000, opts.signal);
        continue;
      }
      rateLimitWaits = 0;

      if (res.status >= 500) {
        lastError = new NetworkError(`HTTP ${res.status}`, res.status);
        attempt++;
        log.warn({ action: "request", method, path, status: res.status, attempt, retryAttempts, latencyMs: Math.round(performance.now() - t0) }, "Server error");
        await this.backoff(attempt, retryAttempts, retryBackoff, opts.signal);
        continue;
      }

      if (res.status < 200 || res.status >= 300) {
        throw new ExchangeError(res.status, res.body.slice(0, 200));
      }

      const envelope = this.parseEnvelope(res.body, path);
      if (isErrorCode(envelope.code) || envelope.result === false) {
        const code = envelope.code ?? "UNKNOWN";
        const message = envelope.message ?? envelope.msg ?? "Unknown API error";
        log.error({ action: "request", method, path, code, message }, "API error");
        throw new ExchangeError(code, message);
      }

      log.debug({ action: "request", method, path, status: res.status, latencyMs: Math.round(performance.now() - t0) }, "Request ok");
      return envelope;
    }

    throw new ExhaustedError(retryAttempts, lastError);
  }

  /** Sleep `retryBackoff ** (attempt - 1)` seconds, but never after the last attempt. */
  private async backoff(attempt: number, retryAttempts: number, retryBackoff: number, signal?: AbortSignal): Promise<void> {
    if (attempt >= retryAttempts) return;
    await this.clock.sleep(backoffDelay(attempt, 1000, Number.POSITIVE_INFINITY, retryBackoff), signal);
  }

  private parseEnvelope(body: string, path: string): Envelope {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new ValidationError(`Non-JSON response from ${path}: ${errorMessage(err)}`);
    }
    const parsed = EnvelopeSchema.safeParse(json);
    if (!parsed.success) throw new ValidationError(`Unexpected response shape from ${path}`);
    return parsed.data;
  }

  private async buildRequest(method: HttpMethod, path: string, params: Params, opts: CallOptions): Promise<{ url: string; headers: Record<string, string>; body?: string }> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    const base = `${this.settings.baseUrl}${path}`;

    if (!opts.signed) {
      const query = canonicalQuery(params);
      const body = method === "GET" ? undefined : compactBody(params);
      return { url: query && method === "GET" ? `${base}?${query}` : base, headers, body };
    }

    if (!this.credentials) throw new ValidationError(`Signed endpoint ${path} needs API credentials`);
    const timestamp = await this.timestamp(opts.signal);
    const signed = signRequest(this.credentials.apiSecret, method, path, params, timestamp);
    headers[this.dialect.headers.key] = this.credentials.apiKey;
    headers[this.dialect.headers.signature] = signed.signature;
    headers[this.dialect.headers.timestamp] = String(timestamp);
    return { url: `${base}?${signed.query}`, headers, body: signed.body || undefined };
  }

  /**
   * Local time corrected by the cached exchange clock offset. A failed sync
   * keeps the last offset and is not retried before the next interval.
   */
  private async timestamp(signal?: AbortSignal): Promise<number> {
    const now = this.clock.now();
    if (now - this.lastClockSync >= this.settings.clockSyncIntervalMs) {
      this.lastClockSync = now;
      try {
        const server = await this.getServerTime({ signal });
        this.clockOffsetMs = server - this.clock.now();
        this.lastClockSync = this.clock.now();
        log.debug({ action: "clockSync", offsetMs: this.clockOffsetMs }, "Exchange clock synced");
      } catch (err) {
        if (signal?.aborted) {
          this.lastClockSync = Number.NEGATIVE_INFINITY;
          throw err;
        }
        log.warn({ action: "clockSync", err }, "Exchange clock unavailable, using local time");
      }
    }
    return Math.round(this.clock.now() + this.clockOffsetMs);
  }
}
