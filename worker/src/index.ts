/**
 * Workflow supervisor: registry, dispatcher, control and execution endpoints.
 */

export { loadConfig, SupervisorConfigSchema, DEFAULT_CONTROL_PORT, DEFAULT_EXECUTION_PORT } from "./config.js";
export type { SupervisorConfig } from "./config.js";
export { defineWorkflow, defineHandlerSet } from "./define.js";
export type { WorkflowDescriptor, WorkflowHandler, WorkflowContext, HandlerSet } from "./define.js";
export { WorkflowRegistry, compareVersions } from "./registry.js";
export { Dispatcher } from "./dispatcher.js";
export type { DispatcherOptions } from "./dispatcher.js";
export { Supervisor } from "./supervisor.js";
export type { SupervisorOptions, SupervisorSettings, StateListener } from "./supervisor.js";
export { buildControlServer } from "./control-server.js";
export type { ControlSource } from "./control-server.js";
export { buildExecutionServer } from "./execution-server.js";
export type { ExecutionSink } from "./execution-server.js";
export { NatsExecutionEndpoint } from "./nats-endpoint.js";
export type {
  NatsExecutionEndpointParams,
  NatsConnectFn,
  NatsConnectionLike,
  NatsSubscriptionLike,
  NatsMsgLike,
} from "./nats-endpoint.js";
export { loadWorkflowModule, collectHandlerSets, isWorkflowDescriptor, isHandlerSet } from "./loader.js";
export { createNodeJSLogger, createSilentLogger } from "./logger.js";
export type { Logger, LoggerFactory, LogMethod } from "./logger.js";
export * from "./workflows/index.js";
