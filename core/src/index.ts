// Types & envelope
export * from "./envelope.js";

// Envelope Zod schemas (runtime validation)
export {
  WorkflowErrorKindSchema,
  InvocationRequestSchema,
  InvocationResultSchema,
  InvocationSuccessSchema,
  InvocationFailureSchema,
  InvocationMetaSchema,
  CancelRequestSchema,
  WorkflowSummarySchema,
  HealthReportSchema,
  parseInvocationRequest,
  parseInvocationResult,
  parseWorkflowSummaries,
  type ParseOutcome,
} from "./envelope-schema.js";

// Errors
export * from "./errors.js";

// Pipeline
export { type Middleware, type InvocationHandler, buildPipeline } from "./pipeline.js";

// Utilities
export * from "./utils.js";
