/**
 * The dispatcher is a stack of wrappers around the handler call: failure
 * boundary, deadline, abort race, then lookup and validation.
 */

import type { InvocationRequest, InvocationResult } from "./envelope.js";

export type InvocationHandler = (
  request: InvocationRequest,
  signal: AbortSignal
) => Promise<InvocationResult>;

/**
 * Wraps the next stage. A stage may act on the request, on the result, or
 * answer by itself without calling `next`.
 */
export type Middleware = (next: InvocationHandler) => InvocationHandler;

/**
 * The first middleware is the outermost: `[a, b]` around `core` runs as
 * `a(b(core))`.
 */
export function buildPipeline(params: {
  middleware: Middleware[];
  core: InvocationHandler;
}): InvocationHandler {
  return params.middleware.reduceRight<InvocationHandler>((next, mw) => mw(next), params.core);
}
