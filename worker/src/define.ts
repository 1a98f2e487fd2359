/**
 * Workflow definition: a named handler with declared input/output schemas.
 */

import type { z, ZodTypeAny } from "zod";
import type { Logger } from "./logger.js";

const WORKFLOW_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Passed to every handler call. `signal` aborts when the invocation is
 * cancelled or times out; handlers that watch it can stop early.
 */
export interface WorkflowContext {
  invocationId: string;
  workflowName: string;
  signal: AbortSignal;
  log: Logger;
}

export type WorkflowHandler<I, O> = (input: I, ctx: WorkflowContext) => O | Promise<O>;

export interface WorkflowDescriptor<
  In extends ZodTypeAny = ZodTypeAny,
  Out extends ZodTypeAny = ZodTypeAny,
> {
  readonly name: string;
  readonly description?: string;
  readonly version?: string;
  readonly input: In;
  readonly output: Out;
  readonly handler: WorkflowHandler<z.output<In>, z.input<Out>>;
}

/**
 * A versioned set of workflows. The registry is built from one set,
 * chosen at supervisor start.
 */
export interface HandlerSet {
  version: string;
  workflows: WorkflowDescriptor[];
}

/**
 * Declare a workflow. Handler input and output types follow the schemas.
 *
 * ```ts
 * const greet = defineWorkflow({
 *   name: "greet",
 *   input: z.object({ name: z.string() }),
 *   output: z.object({ greeting: z.string() }),
 *   handler: ({ name }) => ({ greeting: `Hello, ${name}` }),
 * });
 * ```
 */
export function defineWorkflow<In extends ZodTypeAny, Out extends ZodTypeAny>(
  definition: WorkflowDescriptor<In, Out>
): WorkflowDescriptor<In, Out> {
  if (!WORKFLOW_NAME_PATTERN.test(definition.name)) {
    throw new TypeError(
      `Invalid workflow name "${definition.name}": use letters, digits, ".", "_" or "-"`
    );
  }
  return Object.freeze({ ...definition });
}

export function defineHandlerSet(version: string, workflows: WorkflowDescriptor[]): HandlerSet {
  return { version, workflows };
}
