/**
 * Exponential backoff delay in ms for a 1-based attempt number:
 * `baseMs * factor^(attempt-1)`, capped at `maxMs`.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number = 5000,
  maxMs: number = 60000,
  factor: number = 2,
): number {
  const delay = baseMs * Math.pow(factor, Math.max(0, attempt - 1));
  return Math.min(delay, maxMs);
}
