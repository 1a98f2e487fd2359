/**
 * Transport seam of the client. One implementation per way of reaching a
 * supervisor; the client never branches on mode after construction.
 */

import type {
  HealthReport,
  InvocationRequest,
  InvocationResult,
  WorkflowSummary,
} from "@flowhost/core";

export interface WorkflowTransport {
  readonly kind: "local" | "http" | "nats";
  /**
   * Deliver one invocation and resolve with its result. Rejects with
   * TransportError when the supervisor cannot be reached or answers
   * with something that is not an InvocationResult.
   */
  submit(request: InvocationRequest, signal: AbortSignal): Promise<InvocationResult>;
  /** Best-effort cancel notice; resolves with whether it was acknowledged. */
  cancel(invocationId: string): Promise<boolean>;
  health(): Promise<HealthReport>;
  listWorkflows(): Promise<WorkflowSummary[]>;
  close(): Promise<void>;
}
