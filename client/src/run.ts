/**
 * Handle for an invocation started by AsyncClient. Returned before the
 * supervisor has answered; `result()` is where the caller waits.
 */

import { WorkflowCancelledError } from "@flowhost/core";

export type RunStatus = "pending" | "succeeded" | "failed" | "cancelled";

export class WorkflowRun<O = unknown> {
  readonly invocationId: string;
  readonly workflowName: string;
  private readonly outcome: Promise<O>;
  private readonly abort: () => void;
  private currentStatus: RunStatus = "pending";
  private failure?: unknown;

  constructor(params: {
    invocationId: string;
    workflowName: string;
    outcome: Promise<O>;
    abort: () => void;
  }) {
    this.invocationId = params.invocationId;
    this.workflowName = params.workflowName;
    this.outcome = params.outcome;
    this.abort = params.abort;
    // Tracks status; the rejection itself still reaches callers of result().
    void this.outcome.then(
      () => {
        this.currentStatus = "succeeded";
      },
      (err: unknown) => {
        this.failure = err;
        this.currentStatus = err instanceof WorkflowCancelledError ? "cancelled" : "failed";
      }
    );
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  /** The error the run failed with, once it has failed or been cancelled. */
  get error(): unknown {
    return this.failure;
  }

  result(): Promise<O> {
    return this.outcome;
  }

  /**
   * Cancel the run. `result()` rejects with WorkflowCancelledError right
   * away; the supervisor is told to abandon the dispatch. No effect once
   * the run has settled.
   */
  cancel(): void {
    if (this.currentStatus !== "pending") return;
    this.abort();
  }
}
