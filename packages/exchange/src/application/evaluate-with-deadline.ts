import pTimeout from "p-timeout";
import { EvaluationTimeoutError } from "../lib/errors.js";

export interface DeadlineOptions {
  timeoutMs: number;
  strategyName: string;
  /** Aborting this (e.g. on instance stop) also aborts the evaluation. */
  parentSignal?: AbortSignal;
}

/**
 * Run `task` with a hard deadline. On timeout the task's signal is aborted and
 * the returned promise rejects at once with EvaluationTimeoutError; the task is
 * not awaited.
 */
export async function evaluateWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  opts: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(opts.parentSignal?.reason);
  opts.parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  try {
    opts.parentSignal?.throwIfAborted();
    return await pTimeout(task(controller.signal), {
      milliseconds: opts.timeoutMs,
      message: new EvaluationTimeoutError(opts.strategyName, opts.timeoutMs),
    });
  } catch (err) {
    controller.abort(err);
    throw err;
  } finally {
    opts.parentSignal?.removeEventListener("abort", onParentAbort);
  }
}
