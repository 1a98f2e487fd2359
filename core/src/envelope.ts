/**
 * Canonical invocation request, result, and endpoint types.
 *
 * These types are shared between the supervisor (worker) and the client.
 * Everything that crosses a process boundary has a matching zod schema in
 * `envelope-schema.ts`.
 */

// ── Error Kinds ─────────────────────────────────────────────────────

/**
 * Classification of a failed invocation. Every per-request outcome that is
 * not a success carries exactly one of these.
 */
export type WorkflowErrorKind =
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "HANDLER_ERROR"
  | "CANCELLED"
  | "TIMEOUT"
  | "UNAVAILABLE"
  | "TRANSPORT_ERROR"
  | "INTERNAL_ERROR";

// ── Invocation Request ──────────────────────────────────────────────

/**
 * One call of a named workflow. Created by the client, consumed by the
 * dispatcher, discarded once its result has been produced.
 */
export interface InvocationRequest<I = unknown> {
  /** Unique per call; the result carries the same id */
  invocationId: string;
  workflowName: string;
  input: I;
  /** Upper bound on handler execution; falls back to the dispatcher default */
  timeoutMs?: number;
}

// ── Invocation Result ───────────────────────────────────────────────

/**
 * Timing metadata for one dispatch.
 */
export interface InvocationMeta {
  startedAtUnixMs: number;
  endedAtUnixMs: number;
  durationMs: number;
}

export interface InvocationErrorBody {
  kind: WorkflowErrorKind;
  message: string;
  retryable: boolean;
  details?: unknown;
  /** Stack of the fault raised inside a handler, when there was one */
  traceback?: string;
}

/** Successful invocation result. */
export type InvocationSuccess<O = unknown> = {
  ok: true;
  invocationId: string;
  output: O;
  meta: InvocationMeta;
};

/** Failed invocation result. */
export type InvocationFailure = {
  ok: false;
  invocationId: string;
  error: InvocationErrorBody;
  meta: InvocationMeta;
};

/** Union result type for workflow invocations. */
export type InvocationResult<O = unknown> = InvocationSuccess<O> | InvocationFailure;

// ── Endpoints & Discovery ───────────────────────────────────────────

export type EndpointRole = "control" | "execution";

/**
 * An address the supervisor is serving on. Fixed once listening.
 */
export interface SupervisorEndpoint {
  role: EndpointRole;
  /** e.g. "http://127.0.0.1:63419" or "nats://127.0.0.1:4222#flowhost.invocations" */
  address: string;
}

export type SupervisorState = "idle" | "starting" | "listening" | "draining" | "stopped";

/**
 * Public description of a registered workflow (schemas as JSON Schema).
 */
export interface WorkflowSummary {
  name: string;
  description?: string;
  version?: string;
  inputSchema: unknown;
  outputSchema: unknown;
}

export interface HealthReport {
  status: "ok";
  state: SupervisorState;
  uptimeMs: number;
  inFlight: number;
}

export interface ReadinessReport {
  ready: boolean;
  state: SupervisorState;
}

/**
 * What a client needs from a supervisor it runs in the same process.
 * Implemented by the worker's Supervisor.
 */
export interface InProcessSupervisor {
  execute(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult>;
  cancel(invocationId: string): boolean;
  health(): HealthReport;
  listWorkflows(): WorkflowSummary[];
}
