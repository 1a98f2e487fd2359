/**
 * Execution endpoint: accepts InvocationRequests and answers with
 * InvocationResults. Per-request failures are 200 responses carrying a
 * Failure; only an undecodable body (400) and a draining supervisor (503)
 * change the status code.
 */

import Fastify, { type FastifyInstance } from "fastify";
import {
  type InvocationRequest,
  type InvocationResult,
  immediateFailure,
  parseInvocationRequest,
} from "@flowhost/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "flowhost-worker:execution-server";

export interface ExecutionSink {
  execute(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult>;
  cancel(invocationId: string): boolean;
}

export function buildExecutionServer(params: { sink: ExecutionSink; log: Logger }): FastifyInstance {
  const { sink, log } = params;
  const app = Fastify({ logger: false });

  // Body parser failures (malformed JSON, empty JSON body, unsupported
  // content type) still answer with a Failure.
  app.setErrorHandler((error, request, reply) => {
    const clientError = error.statusCode !== undefined && error.statusCode < 500;
    if (clientError) {
      log.warn({ code: error.code, error: error.message }, `${LOG_PREFIX}:invoke - Undecodable request body`);
    } else {
      log.error({ url: request.url, error: error.message }, `${LOG_PREFIX}:invoke - Request failed`);
    }
    return reply.code(clientError ? 400 : 500).send(
      immediateFailure({
        invocationId: "",
        kind: clientError ? "VALIDATION_ERROR" : "INTERNAL_ERROR",
        message: clientError ? `Undecodable request body: ${error.message}` : error.message,
      })
    );
  });

  app.post("/v1/invocations", async (request, reply) => {
    const parsed = parseInvocationRequest(request.body);
    if (!parsed.success) {
      log.warn({ errors: parsed.error.flatten() }, `${LOG_PREFIX}:invoke - Invalid invocation request`);
      return reply.code(400).send(
        immediateFailure({
          invocationId: invocationIdOf(request.body),
          kind: "VALIDATION_ERROR",
          message: "Invalid invocation request",
          details: parsed.error.flatten(),
        })
      );
    }

    // A caller that hangs up before the reply has cancelled its invocation.
    const ctrl = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) ctrl.abort();
    };
    reply.raw.on("close", onClose);

    try {
      const result = await sink.execute(parsed.data, ctrl.signal);
      const status = !result.ok && result.error.kind === "UNAVAILABLE" ? 503 : 200;
      return reply.code(status).send(result);
    } finally {
      reply.raw.off("close", onClose);
    }
  });

  app.post<{ Params: { invocationId: string } }>(
    "/v1/invocations/:invocationId/cancel",
    async (request) => {
      const cancelled = sink.cancel(request.params.invocationId);
      log.info(
        { invocationId: request.params.invocationId, cancelled },
        `${LOG_PREFIX}:cancel - Cancel requested`
      );
      return { cancelled };
    }
  );

  return app;
}

/** The `invocationId` of an unvalidated request body, or "". */
export function invocationIdOf(body: unknown): string {
  if (typeof body === "object" && body !== null && "invocationId" in body) {
    const id = body.invocationId;
    if (typeof id === "string") return id;
  }
  return "";
}
