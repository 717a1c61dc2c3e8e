import pino from "pino";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

/** Per-module level overrides from the config's `logLevels`. */
let logLevelOverrides: Record<string, string> = {};
const children = new Map<string, pino.Logger[]>();

function getBaseLevel(): string {
  return process.env.LOG_LEVEL ?? "debug";
}

function createPinoLogger(): pino.Logger {
  if (process.env.VITEST) {
    return pino({ level: "silent" });
  }

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const LOG_DIR = process.env.LOG_DIR || join(__dirname, "../../logs");

  return pino(
    { level: getBaseLevel() },
    pino.transport({
      targets: [
        { target: "pino/file", level: getBaseLevel(), options: { destination: 1 } },
        {
          target: "pino-roll",
          level: getBaseLevel(),
          options: {
            file: join(LOG_DIR, "engine"),
            frequency: "daily",
            dateFormat: "yyyy-MM-dd",
            extension: ".ndjson",
            mkdir: true,
          },
        },
      ],
    }),
  );
}

const pinoInstance = createPinoLogger();

/** Root engine logger. Modules take a child via `createChild`, silent under Vitest. */
export const logger = Object.assign(pinoInstance, {
  /** Also re-levels children created before the call (module-scope loggers). */
  setLogConfig(overrides: Record<string, string>): void {
    logLevelOverrides = overrides;
    for (const [module, loggers] of children) {
      const level = overrides[module] ?? pinoInstance.level;
      for (const child of loggers) child.level = level;
    }
  },

  createChild(module: string): pino.Logger {
    const child = pinoInstance.child({ module });
    const level = logLevelOverrides[module];
    if (level) {
      child.level = level;
    }
    const existing = children.get(module);
    if (existing) existing.push(child);
    else children.set(module, [child]);
    return child;
  },
});
