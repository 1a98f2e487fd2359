/**
 * In-process transport: calls straight into a supervisor living in the
 * same process. No serialization, no network hop; the caller's abort
 * signal reaches the dispatch directly.
 */

import type {
  HealthReport,
  InProcessSupervisor,
  InvocationRequest,
  InvocationResult,
  WorkflowSummary,
} from "@flowhost/core";
import type { WorkflowTransport } from "./types.js";

export class LocalTransport implements WorkflowTransport {
  readonly kind = "local" as const;
  private readonly supervisor: InProcessSupervisor;

  constructor(supervisor: InProcessSupervisor) {
    this.supervisor = supervisor;
  }

  submit(request: InvocationRequest, signal: AbortSignal): Promise<InvocationResult> {
    return this.supervisor.execute(request, signal);
  }

  async cancel(invocationId: string): Promise<boolean> {
    return this.supervisor.cancel(invocationId);
  }

  async health(): Promise<HealthReport> {
    return this.supervisor.health();
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    return this.supervisor.listWorkflows();
  }

  async close(): Promise<void> {
    // The supervisor belongs to whoever created it.
  }
}
