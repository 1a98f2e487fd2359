/**
 * Control endpoint: health, readiness, and the registered-workflow listing.
 * Read-only; never touches the dispatcher, so it answers while long
 * workflows are running on the execution endpoint.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type { HealthReport, ReadinessReport, WorkflowSummary } from "@flowhost/core";

export interface ControlSource {
  health(): HealthReport;
  readiness(): ReadinessReport;
  listWorkflows(): WorkflowSummary[];
  describeWorkflow(name: string): WorkflowSummary | undefined;
}

export function buildControlServer(source: ControlSource): FastifyInstance {
  const app = Fastify({ logger: false });

  app.get("/health", async () => source.health());

  app.get("/ready", async (_request, reply) => {
    const report = source.readiness();
    return reply.code(report.ready ? 200 : 503).send(report);
  });

  app.get("/v1/workflows", async () => ({ workflows: source.listWorkflows() }));

  app.get<{ Params: { name: string } }>("/v1/workflows/:name", async (request, reply) => {
    const summary = source.describeWorkflow(request.params.name);
    if (!summary) {
      return reply.code(404).send({
        error: { kind: "NOT_FOUND", message: `Workflow "${request.params.name}" is not registered` },
      });
    }
    return summary;
  });

  return app;
}
