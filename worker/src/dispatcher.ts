/**
 * Invocation dispatcher: validates a request against its workflow, runs the
 * handler, and classifies the outcome. `dispatch` never rejects; every
 * outcome is an InvocationResult.
 *
 * Pipeline (outermost first):
 *   failureBoundary → deadline → abortRace → validateInput → handler
 */

import {
  type InvocationHandler,
  type InvocationRequest,
  type InvocationResult,
  type Middleware,
  WorkflowCancelledError,
  WorkflowError,
  WorkflowHandlerError,
  WorkflowTimeoutError,
  WorkflowValidationError,
  anySignal,
  buildPipeline,
  describeError,
  systemClock,
  toFailure,
  toSuccess,
  type Clock,
} from "@flowhost/core";
import type { WorkflowRegistry } from "./registry.js";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "flowhost-worker:dispatcher";

export interface DispatcherOptions {
  registry: WorkflowRegistry;
  log: Logger;
  /** Applied when a request carries no timeoutMs; unset means no limit */
  defaultTimeoutMs?: number;
  clock?: Clock;
}

export class Dispatcher {
  private readonly registry: WorkflowRegistry;
  private readonly log: Logger;
  private readonly defaultTimeoutMs?: number;
  private readonly clock: Clock;
  private readonly pipeline: InvocationHandler;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.log = options.log;
    this.defaultTimeoutMs = options.defaultTimeoutMs;
    this.clock = options.clock ?? systemClock;
    this.pipeline = buildPipeline({
      middleware: [
        this.failureBoundary(),
        this.deadline(),
        abortRace(),
        this.validateInput(),
      ],
      core: (request, signal) => this.runHandler(request, signal),
    });
  }

  async dispatch(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult> {
    return this.pipeline(request, signal ?? new AbortController().signal);
  }

  // ── Middleware ───────────────────────────────────────────────────

  /** Turns anything thrown below into a Failure and logs the outcome. */
  private failureBoundary(): Middleware {
    return (next) => async (request, signal) => {
      const startedAt = this.clock.now();
      let result: InvocationResult;
      try {
        result = await next(request, signal);
      } catch (err) {
        result = toFailure({ err, invocationId: request.invocationId, startedAt, clock: this.clock });
      }
      if (result.ok) {
        this.log.info(
          { workflow: request.workflowName, invocationId: request.invocationId, durationMs: result.meta.durationMs },
          `${LOG_PREFIX}:dispatch - Completed`
        );
      } else {
        this.log.warn(
          { workflow: request.workflowName, invocationId: request.invocationId, kind: result.error.kind, error: result.error.message },
          `${LOG_PREFIX}:dispatch - Failed`
        );
      }
      return result;
    };
  }

  /** Aborts the handler signal with a WorkflowTimeoutError once the timeout elapses. */
  private deadline(): Middleware {
    return (next) => async (request, signal) => {
      const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;
      if (!timeoutMs || timeoutMs <= 0) return next(request, signal);
      const ctrl = new AbortController();
      const t = setTimeout(
        () =>
          ctrl.abort(
            new WorkflowTimeoutError({
              message: `Workflow "${request.workflowName}" timed out after ${timeoutMs}ms`,
              invocationId: request.invocationId,
            })
          ),
        timeoutMs
      );
      try {
        return await next(request, anySignal([signal, ctrl.signal]));
      } finally {
        clearTimeout(t);
      }
    };
  }

  /** Lookup (NOT_FOUND) then input schema validation (VALIDATION_ERROR). */
  private validateInput(): Middleware {
    return (next) => async (request, signal) => {
      const descriptor = this.registry.lookup(request.workflowName);
      const parsed = descriptor.input.safeParse(request.input);
      if (!parsed.success) {
        throw new WorkflowValidationError({
          message: `Invalid input for workflow "${request.workflowName}": ${parsed.error.issues
            .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
            .join("; ")}`,
          details: parsed.error.flatten(),
          invocationId: request.invocationId,
        });
      }
      return next({ ...request, input: parsed.data }, signal);
    };
  }

  // ── Core ─────────────────────────────────────────────────────────

  private async runHandler(request: InvocationRequest, signal: AbortSignal): Promise<InvocationResult> {
    const startedAt = this.clock.now();
    const descriptor = this.registry.lookup(request.workflowName);

    let raw: unknown;
    try {
      raw = await descriptor.handler(request.input, {
        invocationId: request.invocationId,
        workflowName: request.workflowName,
        signal,
        log: this.log,
      });
    } catch (err) {
      // Workflow-level input checks keep their classification.
      if (err instanceof WorkflowValidationError) throw err;
      const { message, traceback } = describeError(err);
      throw new WorkflowHandlerError({
        message,
        traceback,
        invocationId: request.invocationId,
        cause: err,
      });
    }

    const out = descriptor.output.safeParse(raw);
    if (!out.success) {
      throw new WorkflowHandlerError({
        message: `Output of workflow "${request.workflowName}" does not match its schema`,
        details: out.error.flatten(),
        invocationId: request.invocationId,
      });
    }
    return toSuccess({ invocationId: request.invocationId, output: out.data, startedAt, clock: this.clock });
  }
}

/**
 * Settles as soon as the signal aborts, leaving the handler running with an
 * aborted signal. Its eventual result is dropped.
 */
function abortRace(): Middleware {
  return (next) => (request, signal) => {
    if (signal.aborted) return Promise.reject(abortError(signal, request.invocationId));
    return new Promise<InvocationResult>((resolve, reject) => {
      const onAbort = () => reject(abortError(signal, request.invocationId));
      signal.addEventListener("abort", onAbort, { once: true });
      void next(request, signal)
        .then(resolve, reject)
        .finally(() => signal.removeEventListener("abort", onAbort));
    });
  };
}

function abortError(signal: AbortSignal, invocationId: string): WorkflowError {
  if (signal.reason instanceof WorkflowError) return signal.reason;
  return new WorkflowCancelledError({ message: "Invocation cancelled", invocationId });
}
