import type { z } from "zod";

/** Flatten zod issues into `path: message` lines for logs and startup errors. */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}
