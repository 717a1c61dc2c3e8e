export type EngineErrorKind =
  | "network"
  | "exchange"
  | "rate_limited"
  | "exhausted"
  | "validation"
  | "not_found"
  | "evaluation_timeout"
  | "fatal";

/** Base class for every error the engine raises on purpose. `kind` survives serialization. */
export class EngineError extends Error {
  readonly kind: EngineErrorKind;

  constructor(kind: EngineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Timeout, connection failure or 5xx. Retryable. */
export class NetworkError extends EngineError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super("network", message, options);
    this.status = status;
  }
}

/** The exchange answered and said no. Not retried. */
export class ExchangeError extends EngineError {
  readonly code: number | string;

  constructor(code: number | string, message: string) {
    super("exchange", `Exchange error ${code}: ${message}`);
    this.code = code;
  }
}

export class RateLimitedError extends EngineError {
  readonly waits: number;

  constructor(waits: number) {
    super("rate_limited", `Rate limited after ${waits} consecutive waits`);
    this.waits = waits;
  }
}

export class ExhaustedError extends EngineError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super("exhausted", `Request failed after ${attempts} attempts: ${errorMessage(lastError)}`, { cause: lastError });
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class ValidationError extends EngineError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class NotFoundError extends EngineError {
  constructor(message: string) {
    super("not_found", message);
  }
}

export class EvaluationTimeoutError extends EngineError {
  readonly timeoutMs: number;

  constructor(strategyName: string, timeoutMs: number) {
    super("evaluation_timeout", `Strategy ${strategyName} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class FatalError extends EngineError {
  constructor(message: string) {
    super("fatal", message);
  }
}

export function isEngineError(err: unknown): err is EngineError {
  return err instanceof EngineError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
