/**
 * Shared helpers for building invocation results.
 *
 * Used by the dispatcher (server side) and by the client transports, which
 * produce Failures of their own for transport and cancellation outcomes.
 */

import { WorkflowError } from "./errors.js";
import type {
  InvocationFailure,
  InvocationMeta,
  InvocationSuccess,
  WorkflowErrorKind,
} from "./envelope.js";

export interface Clock {
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/** Aborts when the first of `signals` does, with that signal's reason. */
export function anySignal(signals: AbortSignal[]): AbortSignal {
  const already = signals.find((s) => s.aborted);
  if (already) return already;
  const combined = new AbortController();
  for (const source of signals) {
    source.addEventListener("abort", () => combined.abort(source.reason), { once: true });
  }
  return combined.signal;
}

/**
 * Message and stack of an arbitrary thrown value.
 */
export function describeError(err: unknown): { message: string; traceback?: string } {
  if (err instanceof Error) {
    return { message: err.message || err.name, traceback: err.stack };
  }
  if (typeof err === "string") return { message: err };
  try {
    return { message: JSON.stringify(err) ?? String(err) };
  } catch {
    return { message: String(err) };
  }
}

export function finishMeta(args: { clock?: Clock; startedAt: number }): InvocationMeta {
  const endedAt = (args.clock ?? systemClock).now();
  return {
    startedAtUnixMs: args.startedAt,
    endedAtUnixMs: endedAt,
    durationMs: endedAt - args.startedAt,
  };
}

export function toSuccess<O>(args: {
  invocationId: string;
  output: O;
  startedAt: number;
  clock?: Clock;
}): InvocationSuccess<O> {
  return {
    ok: true,
    invocationId: args.invocationId,
    output: args.output,
    meta: finishMeta(args),
  };
}

/**
 * Creates a Failure from an exception. WorkflowErrors keep their kind;
 * anything else becomes INTERNAL_ERROR.
 */
export function toFailure(args: {
  err: unknown;
  invocationId: string;
  startedAt: number;
  clock?: Clock;
}): InvocationFailure {
  if (args.err instanceof WorkflowError) {
    return {
      ok: false,
      invocationId: args.invocationId,
      error: {
        kind: args.err.kind,
        message: args.err.message,
        retryable: args.err.retryable,
        details: args.err.details,
        traceback: args.err.traceback,
      },
      meta: finishMeta(args),
    };
  }
  const { message, traceback } = describeError(args.err);
  return {
    ok: false,
    invocationId: args.invocationId,
    error: { kind: "INTERNAL_ERROR", message, retryable: false, traceback },
    meta: finishMeta(args),
  };
}

/**
 * Creates an immediate Failure (zero duration).
 */
export function immediateFailure(args: {
  invocationId: string;
  kind: WorkflowErrorKind;
  message: string;
  retryable?: boolean;
  details?: unknown;
  clock?: Clock;
}): InvocationFailure {
  const now = (args.clock ?? systemClock).now();
  return {
    ok: false,
    invocationId: args.invocationId,
    error: {
      kind: args.kind,
      message: args.message,
      retryable: args.retryable ?? false,
      details: args.details,
    },
    meta: { startedAtUnixMs: now, endedAtUnixMs: now, durationMs: 0 },
  };
}
