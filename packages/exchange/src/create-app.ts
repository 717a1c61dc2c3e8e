import express from "express";
import rateLimit from "express-rate-limit";
import { z } from "zod";
import { StrategyConfigSchema, StrategyKind } from "@tradeloop/strategy";
import { formatZodErrors } from "@tradeloop/kit";
import { logger } from "./lib/logger.js";
import { errorMessage, isEngineError, type EngineErrorKind } from "./lib/errors.js";
import type { FeedState } from "./adapters/feed-machine.js";
import type { InstanceRegistry } from "./application/instance-registry.js";
import type { TradingMode } from "./application/trading-instance.js";
import type { HealthReport, WatchdogStatus } from "./application/watchdog.js";
import type { TradeRecord } from "./types/collaborators.js";
import type { EngineEvent } from "./types/events.js";

const log = logger.createChild("http");

const KindParamSchema = z.enum(StrategyKind);
const LimitQuerySchema = z.coerce.number().int().positive().max(1000).default(100);
const ReasonSchema = z.object({ reason: z.string().min(1).max(200).optional() }).default({});

const STATUS_BY_KIND: Partial<Record<EngineErrorKind, number>> = {
  not_found: 404,
  validation: 400,
};

export interface AppDeps {
  mode: TradingMode;
  registry: InstanceRegistry;
  watchdog: { getStatus(): WatchdogStatus; getHealthReport(): HealthReport };
  feed?: { getState(): FeedState };
  trades: { getRecentTrades(limit?: number, instanceId?: string): TradeRecord[] };
  events: { readRecent(limit: number): Promise<EngineEvent[]> };
  /** POST/DELETE requests per IP per minute. */
  writeLimit?: number;
}

function sendError(res: express.Response, err: unknown): void {
  const status = isEngineError(err) ? STATUS_BY_KIND[err.kind] ?? 500 : 500;
  if (status >= 500) log.error({ action: "http", err }, "Request failed");
  res.status(status).json({ error: errorMessage(err) });
}

type Handler = (req: express.Request, res: express.Response) => unknown;

/** Wrap a handler so sync throws and async rejections become JSON errors. */
function route(handler: Handler): express.RequestHandler {
  return (req, res) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((err: unknown) => sendError(res, err));
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { registry } = deps;
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  const writeLimiter = rateLimit({ windowMs: 60_000, limit: deps.writeLimit ?? 10, standardHeaders: false, legacyHeaders: false });

  app.get("/health", (_req, res) => {
    const report = deps.watchdog.getHealthReport();
    res.json({
      status: report.status,
      issues: report.issues,
      checkedAt: report.checkedAt,
      mode: deps.mode,
      feed: deps.feed?.getState() ?? null,
      instances: registry.list().map((i) => ({ id: i.id, running: i.isRunning(), enabled: i.isEnabled() })),
      uptime: process.uptime(),
    });
  });

  app.get("/instances", (_req, res) => {
    res.json({ instances: registry.list().map((i) => i.getStatus()) });
  });

  app.get("/instances/:id/status", route((req, res) => {
    res.json(registry.getStatus(req.params.id));
  }));

  app.get("/instances/:id/portfolio", route(async (req, res) => {
    res.json(await registry.getPortfolioSnapshot(req.params.id));
  }));

  app.get("/instances/:id/trades", route((req, res) => {
    const instance = registry.get(req.params.id);
    const limit = LimitQuerySchema.safeParse(req.query.limit);
    if (!limit.success) {
      res.status(400).json({ error: "Invalid limit", details: formatZodErrors(limit.error) });
      return;
    }
    res.json({ trades: deps.trades.getRecentTrades(limit.data, instance.id) });
  }));

  app.post("/instances/:id/enable", writeLimiter, route(async (req, res) => {
    await registry.enable(req.params.id);
    res.json(registry.getStatus(req.params.id));
  }));

  app.post("/instances/:id/disable", writeLimiter, route(async (req, res) => {
    const body = ReasonSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Invalid payload", details: formatZodErrors(body.error) });
      return;
    }
    await registry.disable(req.params.id, body.data.reason ?? "operator");
    res.json(registry.getStatus(req.params.id));
  }));

  app.post("/instances/:id/restart", writeLimiter, route(async (req, res) => {
    await registry.restart(req.params.id);
    res.json(registry.getStatus(req.params.id));
  }));

  app.post("/instances/:id/strategies", writeLimiter, route(async (req, res) => {
    const parsed = StrategyConfigSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid strategy", details: formatZodErrors(parsed.error) });
      return;
    }
    const strategies = await registry.addStrategy(req.params.id, parsed.data);
    res.status(201).json({ strategies });
  }));

  app.delete("/instances/:id/strategies/:kind", writeLimiter, route(async (req, res) => {
    const kind = KindParamSchema.safeParse(req.params.kind);
    if (!kind.success) {
      res.status(400).json({ error: `Unknown strategy kind: ${req.params.kind}` });
      return;
    }
    const strategies = await registry.removeStrategy(req.params.id, kind.data);
    res.json({ strategies });
  }));

  app.get("/watchdog", (_req, res) => {
    res.json(deps.watchdog.getStatus());
  });

  app.get("/events", route(async (req, res) => {
    const limit = LimitQuerySchema.safeParse(req.query.limit);
    if (!limit.success) {
      res.status(400).json({ error: "Invalid limit", details: formatZodErrors(limit.error) });
      return;
    }
    res.json({ events: await deps.events.readRecent(limit.data) });
  }));

  return app;
}
