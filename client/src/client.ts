/**
 * Workflow clients.
 *
 *   Client       runWorkflow(...) → Promise<output>; the caller waits for the result
 *   AsyncClient  runWorkflow(...) → WorkflowRun handle, returned at once
 *
 * Both share one contract: failures surface as WorkflowError subclasses
 * (not found, validation, handler, timeout, unavailable, transport), and
 * cancellation rejects promptly with WorkflowCancelledError while a cancel
 * notice goes to the supervisor.
 */

import { randomUUID } from "node:crypto";
import type { z, ZodTypeAny } from "zod";
import {
  type HealthReport,
  type InvocationRequest,
  type InvocationResult,
  type WorkflowSummary,
  WorkflowCancelledError,
  WorkflowError,
  errorFromFailure,
} from "@flowhost/core";
import { defaultWorkflowClientConfig, type WorkflowClientConfig } from "./config.js";
import type { WorkflowTransport } from "./transport/types.js";
import { LocalTransport } from "./transport/local-transport.js";
import { HttpTransport } from "./transport/http-transport.js";
import { NatsTransport, defaultNatsTransportConfig } from "./transport/nats-transport.js";
import { WorkflowRun } from "./run.js";
import { retryTransport } from "./retry.js";
import { resolveLogger, type Logger } from "./types/logger.js";

const SERVICE_NAME = "flowhost-client";

export interface RunOptions {
  /** Aborting it cancels the invocation */
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Supply your own id; a UUID otherwise */
  invocationId?: string;
}

export type TypedRunOptions<S extends ZodTypeAny> = RunOptions & {
  /** Parse the workflow output with this schema */
  output: S;
};

/**
 * Pick the transport for a configuration. The only place the mode matters.
 */
export function createTransport(config: WorkflowClientConfig): WorkflowTransport {
  switch (config.mode) {
    case "local":
      return new LocalTransport(config.supervisor);
    case "custom":
      return config.transport;
    case "remote": {
      const protocol = new URL(config.endpoint).protocol;
      if (protocol === "nats:") {
        return new NatsTransport({
          url: config.endpoint,
          connection: config.natsConnection,
          subject: config.natsSubject ?? defaultNatsTransportConfig.subject,
          controlEndpoint: config.controlEndpoint,
          fetchImpl: config.fetchImpl,
          loggerFactory: config.loggerFactory,
        });
      }
      if (protocol === "http:" || protocol === "https:") {
        return new HttpTransport({
          endpoint: config.endpoint,
          controlEndpoint: config.controlEndpoint,
          fetchImpl: config.fetchImpl,
          loggerFactory: config.loggerFactory,
        });
      }
      throw new TypeError(`${SERVICE_NAME}:createTransport - Unsupported endpoint protocol "${protocol}"`);
    }
  }
}

abstract class BaseClient {
  protected readonly transport: WorkflowTransport;
  protected readonly log: Logger;
  private readonly defaultTimeoutMs?: number;
  private readonly controlRetries: number;
  private readonly retryDelayMs: number;

  constructor(config: WorkflowClientConfig) {
    this.transport = createTransport(config);
    this.log = resolveLogger(config.loggerFactory, SERVICE_NAME);
    this.defaultTimeoutMs = config.defaultTimeoutMs;
    this.controlRetries = config.controlRetries ?? defaultWorkflowClientConfig.controlRetries;
    this.retryDelayMs = config.retryDelayMs ?? defaultWorkflowClientConfig.retryDelayMs;
  }

  /** "local", "http" or "nats" */
  get transportKind(): WorkflowTransport["kind"] {
    return this.transport.kind;
  }

  // ── Control queries (idempotent, retried) ────────────────────────

  health(): Promise<HealthReport> {
    return this.withControlRetry("health", () => this.transport.health());
  }

  listWorkflows(): Promise<WorkflowSummary[]> {
    return this.withControlRetry("listWorkflows", () => this.transport.listWorkflows());
  }

  async close(): Promise<void> {
    this.log.info?.({}, `${SERVICE_NAME}:close - Closing`);
    await this.transport.close();
  }

  // ── Invocation ───────────────────────────────────────────────────

  /**
   * Send one invocation. Never retried: the handler may have side effects.
   */
  protected start(
    workflowName: string,
    input: unknown,
    options?: RunOptions & { output?: ZodTypeAny }
  ): { invocationId: string; outcome: Promise<unknown>; abort: () => void } {
    const ctrl = new AbortController();
    const external = options?.signal;
    const onAbort = () => ctrl.abort();
    if (external?.aborted) ctrl.abort();
    else external?.addEventListener("abort", onAbort, { once: true });

    const request: InvocationRequest = {
      invocationId: options?.invocationId ?? randomUUID(),
      workflowName,
      input: input ?? {},
      timeoutMs: options?.timeoutMs ?? this.defaultTimeoutMs,
    };
    return {
      invocationId: request.invocationId,
      outcome: this.execute(request, ctrl.signal, options?.output).finally(() =>
        external?.removeEventListener("abort", onAbort)
      ),
      abort: () => ctrl.abort(),
    };
  }

  private async execute(
    request: InvocationRequest,
    signal: AbortSignal,
    outputSchema?: ZodTypeAny
  ): Promise<unknown> {
    const result = await this.submitUntilAborted(request, signal);
    if (!result.ok) throw errorFromFailure(result);
    if (!outputSchema) return result.output;
    const parsed = outputSchema.safeParse(result.output);
    if (!parsed.success) {
      throw new WorkflowError("INTERNAL_ERROR", {
        message: `${SERVICE_NAME}:runWorkflow - Output of "${request.workflowName}" does not match the expected schema`,
        details: parsed.error.flatten(),
        invocationId: request.invocationId,
      });
    }
    return parsed.data;
  }

  /**
   * Resolves with the transport's result, or rejects with
   * WorkflowCancelledError as soon as the signal aborts. A result that
   * arrives after that is dropped.
   */
  private submitUntilAborted(request: InvocationRequest, signal: AbortSignal): Promise<InvocationResult> {
    const cancelled = () =>
      new WorkflowCancelledError({ message: "Invocation cancelled", invocationId: request.invocationId });
    if (signal.aborted) return Promise.reject(cancelled());

    return new Promise<InvocationResult>((resolve, reject) => {
      const onAbort = () => {
        reject(cancelled());
        this.notifyCancel(request.invocationId);
      };
      signal.addEventListener("abort", onAbort, { once: true });
      void this.transport
        .submit(request, signal)
        .then(resolve, reject)
        .finally(() => signal.removeEventListener("abort", onAbort));
    });
  }

  private notifyCancel(invocationId: string): void {
    this.transport.cancel(invocationId).then(
      (acknowledged) => {
        this.log.debug?.({ invocationId, acknowledged }, `${SERVICE_NAME}:cancel - Cancel notice sent`);
      },
      (err: unknown) => {
        this.log.warn?.(
          { invocationId, error: err instanceof Error ? err.message : String(err) },
          `${SERVICE_NAME}:cancel - Cancel notice failed`
        );
      }
    );
  }

  private withControlRetry<T>(query: string, fn: () => Promise<T>): Promise<T> {
    return retryTransport(fn, {
      retries: this.controlRetries,
      delayMs: this.retryDelayMs,
      onRetry: (attempt, err) =>
        this.log.warn?.({ query, attempt, error: err.message }, `${SERVICE_NAME}:${query} - Retrying`),
    });
  }
}

/**
 * Awaiting client: `runWorkflow` resolves with the workflow output or
 * rejects with a WorkflowError.
 *
 * ```ts
 * const client = new Client({ mode: "remote", endpoint: "http://localhost:63419" });
 * const out = await client.runWorkflow("hello-world-d", { name: "arun", age: 12 });
 * ```
 */
export class Client extends BaseClient {
  runWorkflow<S extends ZodTypeAny>(name: string, input: unknown, options: TypedRunOptions<S>): Promise<z.output<S>>;
  runWorkflow(name: string, input?: unknown, options?: RunOptions): Promise<unknown>;
  runWorkflow(name: string, input?: unknown, options?: RunOptions & { output?: ZodTypeAny }): Promise<unknown> {
    return this.start(name, input, options).outcome;
  }
}

/**
 * Handle-returning client: `runWorkflow` returns a WorkflowRun immediately;
 * await `run.result()` when the output is needed, or `run.cancel()`.
 */
export class AsyncClient extends BaseClient {
  runWorkflow<S extends ZodTypeAny>(name: string, input: unknown, options: TypedRunOptions<S>): WorkflowRun<z.output<S>>;
  runWorkflow(name: string, input?: unknown, options?: RunOptions): WorkflowRun<unknown>;
  runWorkflow(name: string, input?: unknown, options?: RunOptions & { output?: ZodTypeAny }): WorkflowRun<unknown> {
    const started = this.start(name, input, options);
    return new WorkflowRun({
      invocationId: started.invocationId,
      workflowName: name,
      outcome: started.outcome,
      abort: started.abort,
    });
  }
}
