/**
 * Workflow client configuration.
 *
 * `mode: "local"` binds to a supervisor in the same process; `mode: "remote"`
 * reaches one over the network (`http://` or `nats://` endpoint).
 */

import type { InProcessSupervisor } from "@flowhost/core";
import type { WorkflowTransport } from "./transport/types.js";
import type { FetchLike } from "./transport/http-transport.js";
import type { NatsRequester } from "./transport/nats-transport.js";
import type { LoggerFactory } from "./types/logger.js";

export interface CommonClientConfig {
  /** Per-invocation timeout sent with each request when the call sets none */
  defaultTimeoutMs?: number;
  /** Retries of control queries (health, listWorkflows) on TransportError. Default: 2 */
  controlRetries?: number;
  /** Fixed delay between those retries. Default: 200 */
  retryDelayMs?: number;
  loggerFactory?: LoggerFactory;
}

export interface LocalClientConfig extends CommonClientConfig {
  mode: "local";
  supervisor: InProcessSupervisor;
}

export interface RemoteClientConfig extends CommonClientConfig {
  mode: "remote";
  /** Execution endpoint: "http://host:63419" or "nats://host:4222" */
  endpoint: string;
  /** Control endpoint (HTTP); derived from an HTTP endpoint when unset */
  controlEndpoint?: string;
  /** Invocation subject for nats:// endpoints */
  natsSubject?: string;
  /** Pre-created NATS connection for nats:// endpoints */
  natsConnection?: NatsRequester;
  fetchImpl?: FetchLike;
}

/** Bring-your-own transport (tests, custom wiring). */
export interface TransportClientConfig extends CommonClientConfig {
  mode: "custom";
  transport: WorkflowTransport;
}

export type WorkflowClientConfig = LocalClientConfig | RemoteClientConfig | TransportClientConfig;

export const defaultWorkflowClientConfig = {
  controlRetries: 2,
  retryDelayMs: 200,
} as const;
