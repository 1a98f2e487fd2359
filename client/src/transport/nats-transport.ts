/**
 * NATS transport: request/reply on the supervisor's invocation subject.
 * Cancel notices are published to `<subject>.cancel`. NATS carries no
 * control endpoint, so health and listings go to an HTTP control endpoint
 * when one is configured.
 */

import { connect, StringCodec, type ConnectionOptions } from "nats";
import {
  type HealthReport,
  type InvocationRequest,
  type InvocationResult,
  type WorkflowSummary,
  TransportError,
  parseInvocationResult,
} from "@flowhost/core";
import type { WorkflowTransport } from "./types.js";
import { HttpTransport, type FetchLike } from "./http-transport.js";
import { resolveLogger, type Logger, type LoggerFactory } from "../types/logger.js";

const SERVICE_NAME = "flowhost-client:nats-transport";
const sc = StringCodec();

// The subset of a nats connection this transport relies on.
export interface NatsRequester {
  request(subject: string, data: Uint8Array, opts: { timeout: number }): Promise<{ data: Uint8Array }>;
  publish(subject: string, data: Uint8Array): void;
  drain(): Promise<void>;
}

export interface NatsTransportConfig {
  /** e.g. "nats://127.0.0.1:4222"; ignored when `connection` is given */
  url?: string;
  /** Pre-created connection; the transport will not close it */
  connection?: NatsRequester;
  subject: string;
  /** Request timeout when the invocation sets none */
  defaultTimeoutMs: number;
  /** Extra time over an invocation's own timeoutMs before the request gives up */
  timeoutSlackMs: number;
  connectionName?: string;
  controlEndpoint?: string;
  fetchImpl?: FetchLike;
  connectFn?: (opts: ConnectionOptions) => Promise<NatsRequester>;
  loggerFactory?: LoggerFactory;
}

export const defaultNatsTransportConfig = {
  subject: "flowhost.invocations",
  defaultTimeoutMs: 30_000,
  timeoutSlackMs: 1_000,
} as const;

export class NatsTransport implements WorkflowTransport {
  readonly kind = "nats" as const;
  private readonly config: NatsTransportConfig;
  private readonly log: Logger;
  private readonly control?: HttpTransport;
  private connection?: Promise<NatsRequester>;
  private ownsConnection = false;

  constructor(config: Partial<NatsTransportConfig>) {
    this.config = { ...defaultNatsTransportConfig, ...config };
    this.log = resolveLogger(config.loggerFactory, SERVICE_NAME);
    if (config.connection) {
      this.connection = Promise.resolve(config.connection);
    }
    if (config.controlEndpoint) {
      this.control = new HttpTransport({
        endpoint: config.controlEndpoint,
        controlEndpoint: config.controlEndpoint,
        fetchImpl: config.fetchImpl,
        loggerFactory: config.loggerFactory,
      });
    }
  }

  async submit(request: InvocationRequest, _signal: AbortSignal): Promise<InvocationResult> {
    const nats = await this.getConnection();
    const timeout = request.timeoutMs
      ? request.timeoutMs + this.config.timeoutSlackMs
      : this.config.defaultTimeoutMs;

    let data: Uint8Array;
    try {
      const response = await nats.request(this.config.subject, sc.encode(JSON.stringify(request)), { timeout });
      data = response.data;
    } catch (err) {
      throw new TransportError({
        message: `${SERVICE_NAME}:submit - Request on ${this.config.subject} failed: ${err instanceof Error ? err.message : String(err)}`,
        invocationId: request.invocationId,
        cause: err,
      });
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(sc.decode(data));
    } catch (err) {
      throw new TransportError({
        message: `${SERVICE_NAME}:submit - Reply on ${this.config.subject} is not JSON`,
        invocationId: request.invocationId,
        cause: err,
      });
    }
    const parsed = parseInvocationResult(decoded);
    if (!parsed.success) {
      throw new TransportError({
        message: `${SERVICE_NAME}:submit - Reply on ${this.config.subject} is not an invocation result`,
        invocationId: request.invocationId,
        details: parsed.error.flatten(),
      });
    }
    return parsed.data;
  }

  async cancel(invocationId: string): Promise<boolean> {
    const nats = await this.getConnection();
    nats.publish(`${this.config.subject}.cancel`, sc.encode(JSON.stringify({ invocationId })));
    this.log.debug?.({ invocationId }, `${SERVICE_NAME}:cancel - Cancel notice published`);
    return true;
  }

  async health(): Promise<HealthReport> {
    return this.requireControl("health").health();
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    return this.requireControl("listWorkflows").listWorkflows();
  }

  async close(): Promise<void> {
    if (this.ownsConnection && this.connection) {
      const nats = await this.connection;
      await nats.drain();
    }
    this.connection = undefined;
  }

  private requireControl(method: string): HttpTransport {
    if (!this.control) {
      throw new TransportError({
        message: `${SERVICE_NAME}:${method} - No control endpoint configured for the NATS transport`,
      });
    }
    return this.control;
  }

  private getConnection(): Promise<NatsRequester> {
    if (!this.connection) {
      const connectFn = this.config.connectFn ?? connect;
      const url = this.config.url ?? "nats://127.0.0.1:4222";
      this.ownsConnection = true;
      this.connection = connectFn({ servers: url, name: this.config.connectionName ?? "flowhost-client" }).catch(
        (err: unknown) => {
          this.connection = undefined;
          throw new TransportError({
            message: `${SERVICE_NAME}:getConnection - Cannot connect to ${url}: ${err instanceof Error ? err.message : String(err)}`,
            cause: err,
          });
        }
      );
    }
    return this.connection;
  }
}
