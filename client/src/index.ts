/**
 * @flowhost/client
 *
 * Clients for running workflows on a supervisor, in the same process or
 * over HTTP or NATS.
 */

// Clients
export { Client, AsyncClient, createTransport, type RunOptions, type TypedRunOptions } from "./client.js";
export { WorkflowRun, type RunStatus } from "./run.js";

// Config
export {
  type WorkflowClientConfig,
  type CommonClientConfig,
  type LocalClientConfig,
  type RemoteClientConfig,
  type TransportClientConfig,
  defaultWorkflowClientConfig,
} from "./config.js";

// Transport
export * from "./transport/index.js";

export { retryTransport } from "./retry.js";
export { type Logger, type LoggerFactory, resolveLogger } from "./types/logger.js";

// Re-export core types and errors for convenience
export type {
  InvocationRequest,
  InvocationResult,
  InvocationSuccess,
  InvocationFailure,
  InvocationMeta,
  HealthReport,
  WorkflowSummary,
  WorkflowErrorKind,
} from "@flowhost/core";
export {
  WorkflowError,
  WorkflowNotFoundError,
  WorkflowValidationError,
  WorkflowHandlerError,
  WorkflowCancelledError,
  WorkflowTimeoutError,
  SupervisorUnavailableError,
  TransportError,
} from "@flowhost/core";
