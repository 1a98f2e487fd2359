/**
 * Workflow error classes (shared).
 *
 * `WorkflowError` carries the same fields as a Failure's error body so a
 * result can be turned into an exception and back without loss. Each kind
 * has its own subclass so callers can branch with `instanceof`.
 */

import type { InvocationFailure, WorkflowErrorKind } from "./envelope.js";

export { type WorkflowErrorKind } from "./envelope.js";

export interface WorkflowErrorArgs {
  message: string;
  retryable?: boolean;
  details?: unknown;
  traceback?: string;
  invocationId?: string;
  cause?: unknown;
}

/**
 * Structured error for workflow invocations.
 */
export class WorkflowError extends Error {
  public readonly kind: WorkflowErrorKind;
  public readonly retryable: boolean;
  public readonly details?: unknown;
  public readonly traceback?: string;
  public readonly invocationId?: string;
  public readonly cause?: unknown;

  constructor(kind: WorkflowErrorKind, args: WorkflowErrorArgs) {
    super(args.message);
    this.name = "WorkflowError";
    this.kind = kind;
    this.retryable = args.retryable ?? false;
    this.details = args.details;
    this.traceback = args.traceback;
    this.invocationId = args.invocationId;
    this.cause = args.cause;
  }
}

/** The named workflow is not registered (UnknownWorkflow). */
export class WorkflowNotFoundError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("NOT_FOUND", args);
    this.name = "WorkflowNotFoundError";
  }
}

/** Input failed the workflow's schema or declared constraints. */
export class WorkflowValidationError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("VALIDATION_ERROR", args);
    this.name = "WorkflowValidationError";
  }
}

/** The workflow's own logic faulted. */
export class WorkflowHandlerError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("HANDLER_ERROR", args);
    this.name = "WorkflowHandlerError";
  }
}

export class WorkflowCancelledError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("CANCELLED", args);
    this.name = "WorkflowCancelledError";
  }
}

export class WorkflowTimeoutError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("TIMEOUT", { retryable: true, ...args });
    this.name = "WorkflowTimeoutError";
  }
}

/** The supervisor is not accepting executions (starting, draining or stopped). */
export class SupervisorUnavailableError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("UNAVAILABLE", { retryable: true, ...args });
    this.name = "SupervisorUnavailableError";
  }
}

/** Remote-mode communication failure; never conflated with handler failures. */
export class TransportError extends WorkflowError {
  constructor(args: WorkflowErrorArgs) {
    super("TRANSPORT_ERROR", args);
    this.name = "TransportError";
  }
}

// ── Non per-request errors ──────────────────────────────────────────

/** Registering a workflow name that already exists. */
export class DuplicateWorkflowError extends Error {
  public readonly workflowName: string;

  constructor(workflowName: string) {
    super(`Workflow "${workflowName}" is already registered`);
    this.name = "DuplicateWorkflowError";
    this.workflowName = workflowName;
  }
}

/** The supervisor could not start; the process must not serve requests. */
export class FatalSupervisorError extends Error {
  public readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "FatalSupervisorError";
    this.cause = cause;
  }
}

/**
 * Maps a Failure to the matching WorkflowError subclass.
 */
export function errorFromFailure(failure: InvocationFailure): WorkflowError {
  const args: WorkflowErrorArgs = {
    message: failure.error.message,
    retryable: failure.error.retryable,
    details: failure.error.details,
    traceback: failure.error.traceback,
    invocationId: failure.invocationId,
  };
  switch (failure.error.kind) {
    case "NOT_FOUND":
      return new WorkflowNotFoundError(args);
    case "VALIDATION_ERROR":
      return new WorkflowValidationError(args);
    case "HANDLER_ERROR":
      return new WorkflowHandlerError(args);
    case "CANCELLED":
      return new WorkflowCancelledError(args);
    case "TIMEOUT":
      return new WorkflowTimeoutError(args);
    case "UNAVAILABLE":
      return new SupervisorUnavailableError(args);
    case "TRANSPORT_ERROR":
      return new TransportError(args);
    case "INTERNAL_ERROR":
      return new WorkflowError("INTERNAL_ERROR", args);
  }
}
