/**
 * Supervisor: owns a workflow registry and dispatcher, binds the control and
 * execution endpoints, and drains in-flight invocations on stop.
 *
 *   idle → starting → listening → draining → stopped
 *
 * Every execution path (HTTP, NATS, in-process clients) enters through
 * `execute`, so the drain gate and in-flight tracking apply to all of them.
 * Nothing here is process-global; tests may run several supervisors at once.
 */

import type { FastifyInstance } from "fastify";
import {
  type HealthReport,
  type InProcessSupervisor,
  type InvocationRequest,
  type InvocationResult,
  type ReadinessReport,
  type SupervisorEndpoint,
  type SupervisorState,
  type WorkflowSummary,
  FatalSupervisorError,
  WorkflowCancelledError,
  immediateFailure,
  systemClock,
  type Clock,
} from "@flowhost/core";
import { loadConfig, type SupervisorConfig } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { buildControlServer } from "./control-server.js";
import { buildExecutionServer } from "./execution-server.js";
import { NatsExecutionEndpoint, type NatsConnectFn } from "./nats-endpoint.js";
import { createSilentLogger, type Logger, type LoggerFactory } from "./logger.js";
import type { WorkflowRegistry } from "./registry.js";

const LOG_PREFIX = "flowhost-worker:supervisor";

export type SupervisorSettings = Omit<SupervisorConfig, "workflowsModule" | "handlerSetVersion" | "logLevel">;

export interface SupervisorOptions {
  registry: WorkflowRegistry;
  /** Unset keys take the defaults of SupervisorConfigSchema; process env is not read */
  config?: Partial<SupervisorSettings>;
  loggerFactory?: LoggerFactory;
  clock?: Clock;
  /** Replaces nats' connect (tests) */
  natsConnectFn?: NatsConnectFn;
}

interface InFlight {
  controller: AbortController;
  done: Promise<InvocationResult>;
}

export type StateListener = (state: SupervisorState, previous: SupervisorState) => void;

export class Supervisor implements InProcessSupervisor {
  readonly registry: WorkflowRegistry;
  private readonly settings: SupervisorSettings;
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly dispatcher: Dispatcher;
  private readonly natsConnectFn?: NatsConnectFn;

  private currentState: SupervisorState = "idle";
  private readonly listeners = new Set<StateListener>();
  private readonly inFlight = new Map<string, InFlight>();
  private boundEndpoints: SupervisorEndpoint[] = [];
  private startedAt = 0;
  private starting: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  private control: FastifyInstance | null = null;
  private execution: FastifyInstance | null = null;
  private nats: NatsExecutionEndpoint | null = null;

  constructor(options: SupervisorOptions) {
    this.registry = options.registry;
    this.settings = loadConfig({ env: {}, overrides: options.config });
    const loggerFactory = options.loggerFactory ?? createSilentLogger();
    this.log = loggerFactory.get(LOG_PREFIX);
    this.clock = options.clock ?? systemClock;
    this.natsConnectFn = options.natsConnectFn;
    this.dispatcher = new Dispatcher({
      registry: this.registry,
      log: loggerFactory.get("flowhost-worker:dispatcher"),
      defaultTimeoutMs: this.settings.defaultTimeoutMs,
      clock: this.clock,
    });
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get endpoints(): readonly SupervisorEndpoint[] {
    return this.boundEndpoints;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  /** Subscribe to state transitions; returns the unsubscribe function. */
  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  /**
   * Bind the control endpoint, the execution endpoint, and NATS when
   * configured. Any bind failure closes what was bound, leaves the
   * supervisor stopped, and rejects with FatalSupervisorError. A `stop()`
   * issued while binding does the same once the pending bind settles.
   */
  start(): Promise<void> {
    if (this.currentState !== "idle") {
      return Promise.reject(
        new FatalSupervisorError(`${LOG_PREFIX}:start - Cannot start from state "${this.currentState}"`)
      );
    }
    this.starting = this.bindAndListen();
    return this.starting;
  }

  private async bindAndListen(): Promise<void> {
    this.setState("starting");
    const { host, controlPort, executionPort } = this.settings;
    this.log.info({ host, controlPort, executionPort, workflows: this.registry.size }, `${LOG_PREFIX}:start - Starting`);

    try {
      this.control = buildControlServer(this);
      const controlAddress = await this.control.listen({ host, port: controlPort });
      this.abandonIfStopping();

      this.execution = buildExecutionServer({ sink: this, log: this.log });
      const executionAddress = await this.execution.listen({ host, port: executionPort });
      this.abandonIfStopping();

      const endpoints: SupervisorEndpoint[] = [
        { role: "control", address: controlAddress },
        { role: "execution", address: executionAddress },
      ];

      if (this.settings.natsUrl) {
        this.nats = new NatsExecutionEndpoint({
          url: this.settings.natsUrl,
          subject: this.settings.natsSubject,
          queueGroup: this.settings.natsQueueGroup,
          concurrency: this.settings.concurrency,
          sink: this,
          log: this.log,
          connectFn: this.natsConnectFn,
        });
        await this.nats.start();
        this.abandonIfStopping();
        endpoints.push({ role: "execution", address: this.nats.address });
      }

      this.boundEndpoints = endpoints;
    } catch (err) {
      this.log.error({ error: err instanceof Error ? err.message : String(err) }, `${LOG_PREFIX}:start - Bind failed`);
      await this.closeEndpoints();
      this.setState("stopped");
      if (err instanceof FatalSupervisorError) throw err;
      throw new FatalSupervisorError(
        `${LOG_PREFIX}:start - Failed to bind endpoints: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
    }

    this.startedAt = this.clock.now();
    this.setState("listening");
    this.log.info({ endpoints: this.boundEndpoints }, `${LOG_PREFIX}:start - Listening`);
  }

  private abandonIfStopping(): void {
    if (this.stopping) {
      throw new FatalSupervisorError(`${LOG_PREFIX}:start - Stopped while starting`);
    }
  }

  /**
   * Drain and stop. New executions are refused at once; in-flight ones get
   * up to `graceMs` to finish and are then cancelled. Idempotent.
   */
  stop(options?: { graceMs?: number }): Promise<void> {
    if (this.stopping) return this.stopping;
    this.stopping = this.drainAndStop(options?.graceMs ?? this.settings.graceMs);
    return this.stopping;
  }

  private async drainAndStop(graceMs: number): Promise<void> {
    // start() sees the pending stop after its current bind and unwinds
    if (this.currentState === "starting" && this.starting) {
      await Promise.allSettled([this.starting]);
    }
    if (this.currentState === "idle" || this.currentState === "stopped") {
      this.setState("stopped");
      return;
    }
    this.setState("draining");
    this.log.info({ inFlight: this.inFlight.size, graceMs }, `${LOG_PREFIX}:stop - Draining`);

    const finished = await this.waitForInFlight(graceMs);
    if (!finished) {
      this.log.warn({ remaining: this.inFlight.size }, `${LOG_PREFIX}:stop - Grace period elapsed, cancelling`);
      for (const [invocationId, entry] of this.inFlight) {
        entry.controller.abort(
          new WorkflowCancelledError({ message: "Supervisor stopped before the invocation finished", invocationId })
        );
      }
      await Promise.all([...this.inFlight.values()].map((e) => e.done));
    }

    await this.closeEndpoints();
    this.setState("stopped");
    this.log.info({}, `${LOG_PREFIX}:stop - Stopped`);
  }

  private async waitForInFlight(graceMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const all = Promise.all([...this.inFlight.values()].map((e) => e.done)).then(() => true as const);
    try {
      return await Promise.race([all, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async closeEndpoints(): Promise<void> {
    const closers: Array<[string, () => Promise<void>]> = [];
    const nats = this.nats;
    const execution = this.execution;
    const control = this.control;
    if (nats) closers.push(["nats", () => nats.stop()]);
    if (execution) closers.push(["execution", () => execution.close()]);
    if (control) closers.push(["control", () => control.close()]);
    for (const [name, close] of closers) {
      try {
        await close();
      } catch (err) {
        this.log.error(
          { endpoint: name, error: err instanceof Error ? err.message : String(err) },
          `${LOG_PREFIX}:closeEndpoints - Close failed`
        );
      }
    }
    this.nats = null;
    this.execution = null;
    this.control = null;
  }

  private setState(next: SupervisorState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    for (const listener of this.listeners) listener(next, previous);
  }

  // ── Execution ────────────────────────────────────────────────────

  /**
   * Run one invocation. Refused with UNAVAILABLE unless listening.
   */
  async execute(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult> {
    if (this.currentState !== "listening") {
      return immediateFailure({
        invocationId: request.invocationId,
        kind: "UNAVAILABLE",
        message: `Supervisor is ${this.currentState}`,
        retryable: true,
        clock: this.clock,
      });
    }
    if (this.inFlight.has(request.invocationId)) {
      return immediateFailure({
        invocationId: request.invocationId,
        kind: "VALIDATION_ERROR",
        message: `Invocation "${request.invocationId}" is already in flight`,
        clock: this.clock,
      });
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) controller.abort(signal.reason);
    else signal?.addEventListener("abort", onAbort, { once: true });

    const done = this.dispatcher.dispatch(request, controller.signal).finally(() => {
      signal?.removeEventListener("abort", onAbort);
      this.inFlight.delete(request.invocationId);
    });
    this.inFlight.set(request.invocationId, { controller, done });
    return done;
  }

  /**
   * Cancel an in-flight invocation. Returns false when none has the id.
   */
  cancel(invocationId: string): boolean {
    const entry = this.inFlight.get(invocationId);
    if (!entry) return false;
    entry.controller.abort(new WorkflowCancelledError({ message: "Invocation cancelled by caller", invocationId }));
    return true;
  }

  // ── Control ──────────────────────────────────────────────────────

  health(): HealthReport {
    return {
      status: "ok",
      state: this.currentState,
      uptimeMs: this.startedAt ? this.clock.now() - this.startedAt : 0,
      inFlight: this.inFlight.size,
    };
  }

  readiness(): ReadinessReport {
    return { ready: this.currentState === "listening", state: this.currentState };
  }

  listWorkflows(): WorkflowSummary[] {
    return this.registry.summaries();
  }

  describeWorkflow(name: string): WorkflowSummary | undefined {
    return this.registry.has(name) ? this.registry.describe(name) : undefined;
  }

  /** Underlying fastify apps, for in-process requests via `inject`. */
  get servers(): { control: FastifyInstance | null; execution: FastifyInstance | null } {
    return { control: this.control, execution: this.execution };
  }
}
