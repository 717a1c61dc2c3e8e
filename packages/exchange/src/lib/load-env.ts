import { z } from "zod";
import { parseEnv } from "@tradeloop/kit";
import dotenv from "dotenv";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const EnvSchema = z.object({
  EXCHANGE_API_KEY: z.string().min(1),
  EXCHANGE_API_SECRET: z.string().min(1),
  NOTIFY_URL: z.string().url().optional(),
});

/** Dry runs never sign a request, so credentials are optional there. */
export const DryRunEnvSchema = EnvSchema.partial({ EXCHANGE_API_KEY: true, EXCHANGE_API_SECRET: true });

export type Env = z.infer<typeof EnvSchema>;
export type DryRunEnv = z.infer<typeof DryRunEnvSchema>;

/** Load `.env` from the package root (or `envPath`) into process.env and validate it. */
export function loadEnv(dryRun: false, envPath?: string): Env;
export function loadEnv(dryRun: true, envPath?: string): DryRunEnv;
export function loadEnv(dryRun: boolean, envPath = join(__dirname, "../../.env")): Env | DryRunEnv {
  dotenv.config({ path: envPath });
  return dryRun ? parseEnv(DryRunEnvSchema) : parseEnv(EnvSchema);
}
