import type { z } from "zod";

/** Validate `process.env` against a zod schema. Throws ZodError on missing or malformed vars. */
export function parseEnv<T extends z.ZodTypeAny>(schema: T, source: NodeJS.ProcessEnv = process.env): z.output<T> {
  return schema.parse(source);
}
