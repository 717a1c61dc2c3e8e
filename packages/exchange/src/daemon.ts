import { mkdirSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { cac } from "cac";
import { z } from "zod";
import { isMainModule } from "@tradeloop/kit";
import { loadEnv } from "./lib/load-env.js";
import { logger } from "./lib/logger.js";
import { JsonConfigProvider } from "./adapters/json-config-provider.js";
import { SqliteStore } from "./adapters/sqlite-store.js";
import { EventLog } from "./adapters/event-log.js";
import { HttpExchangeClient } from "./adapters/exchange-client.js";
import { DryRunExchangeClient } from "./adapters/dry-run-client.js";
import { MarketDataFeed } from "./adapters/market-data-feed.js";
import { LogNotificationSink, WebhookNotificationSink } from "./adapters/notifier.js";
import { TradingInstance, type TradingMode } from "./application/trading-instance.js";
import { InstanceRegistry } from "./application/instance-registry.js";
import { Watchdog } from "./application/watchdog.js";
import { createApp } from "./create-app.js";
import type { ExchangeClient } from "./types/exchange-client.js";
import type { NotificationSink } from "./types/collaborators.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const log = logger.createChild("daemon");

const TickerMessageSchema = z.object({
  symbol: z.string(),
  data: z.object({ price: z.coerce.number().positive() }),
});

interface DaemonOptions {
  configPath: string;
  dryRun: boolean;
}

function parseArgs(): DaemonOptions {
  const cli = cac("tradeloop");
  cli.option("--config <path>", "Engine config file", { default: join(__dirname, "../engine-config.json") });
  cli.option("--dry-run", "Paper trade against live market data");
  cli.help();

  const { options } = cli.parse(process.argv);
  return {
    configPath: resolve(String(options.config)),
    dryRun: Boolean(options.dryRun) || process.env.DRY_RUN === "true",
  };
}

async function main(): Promise<void> {
  const opts = parseArgs();
  const provider = new JsonConfigProvider(opts.configPath);
  const config = provider.get();
  logger.setLogConfig(config.logLevels);

  const dryRun = opts.dryRun || config.dryRun;
  const mode: TradingMode = dryRun ? "dry-run" : "live";
  const env = dryRun ? loadEnv(true) : loadEnv(false);

  const dataDir = resolve(config.dataDir);
  mkdirSync(dataDir, { recursive: true });
  const store = new SqliteStore(join(dataDir, "engine.db"));
  const eventLog = new EventLog(join(dataDir, "events.ndjson"));

  const credentials = env.EXCHANGE_API_KEY && env.EXCHANGE_API_SECRET
    ? { apiKey: env.EXCHANGE_API_KEY, apiSecret: env.EXCHANGE_API_SECRET }
    : undefined;
  const market = new HttpExchangeClient({ settings: config.exchange, credentials: dryRun ? undefined : credentials, quoteAsset: config.quoteAsset });
  const client: ExchangeClient = dryRun
    ? new DryRunExchangeClient({ market, quoteAsset: config.quoteAsset })
    : market;

  const notifier: NotificationSink = env.NOTIFY_URL
    ? new WebhookNotificationSink(env.NOTIFY_URL)
    : new LogNotificationSink();

  const feed = new MarketDataFeed({ urls: config.exchange.wsUrls, settings: config.feed });

  const registry = new InstanceRegistry();
  for (const instanceConfig of config.instances) {
    registry.register(new TradingInstance({
      config: instanceConfig,
      mode,
      quoteAsset: config.quoteAsset,
      client,
      store,
      notifier,
      events: eventLog,
      feed,
    }));
  }

  const watchdog = new Watchdog({
    instances: registry,
    client,
    notifier,
    events: eventLog,
    settings: { ...config.watchdog, heartbeatFile: resolve(config.watchdog.heartbeatFile) },
  });

  feed.onChannel("ticker", (message) => {
    const parsed = TickerMessageSchema.safeParse(message);
    if (!parsed.success) {
      log.debug({ action: "ticker", message }, "Ignoring malformed ticker message");
      return;
    }
    registry.routeTicker(parsed.data.symbol, parsed.data.data.price);
  });
  feed.on("stale", ({ silentMs }) => {
    log.warn({ action: "stale", silentMs }, "Feed silent, positions priced from REST");
  });
  feed.on("state", (state) => {
    if (state === "DEGRADED") eventLog.record("feed_degraded", { urls: config.exchange.wsUrls });
  });
  for (const symbol of registry.symbols()) feed.subscribe("ticker", { symbol });

  feed.start();
  await registry.startAll();
  watchdog.start();

  const app = createApp({ mode, registry, watchdog, feed, trades: store, events: eventLog });
  const server = app.listen(config.port, () => {
    log.info({ action: "listen", port: config.port, mode, instances: registry.list().length }, "Engine listening");
  });

  eventLog.record("daemon_started", { mode, instances: registry.list().map((i) => i.id) });

  process.on("SIGHUP", () => {
    provider.reload()
      .then((next) => {
        logger.setLogConfig(next.logLevels);
        registry.applyConfig(next);
      })
      .catch((err: unknown) => log.error({ action: "reload", err }, "Config reload failed"));
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ action: "shutdown", signal }, "Shutting down");
    await watchdog.stop();
    await registry.stopAll();
    feed.stop();
    eventLog.record("daemon_stopped", { signal });
    await eventLog.flush();
    await new Promise<void>((done) => server.close(() => done()));
    store.close();
    log.info({ action: "shutdown" }, "Shutdown complete");
  };

  const onSignal = (signal: string) => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ action: "shutdown", err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

if (isMainModule(import.meta.url)) {
  main().catch((err: unknown) => {
    log.fatal({ err }, "Fatal error");
    process.exit(1);
  });
}
