/**
 * Registry of workflows. Maps workflow name to its descriptor (handler plus
 * input/output schemas). One registry per supervisor; nothing is global.
 */

import {
  DuplicateWorkflowError,
  FatalSupervisorError,
  WorkflowNotFoundError,
  type WorkflowSummary,
} from "@flowhost/core";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { HandlerSet, WorkflowDescriptor } from "./define.js";

const LOG_PREFIX = "flowhost-worker:registry";

export class WorkflowRegistry {
  private readonly workflows = new Map<string, WorkflowDescriptor>();

  /**
   * Build a registry from the handler set matching `version`, or the highest
   * version when none is requested.
   */
  static fromHandlerSets(params: { sets: HandlerSet[]; version?: string }): WorkflowRegistry {
    const { sets, version } = params;
    if (sets.length === 0) {
      throw new FatalSupervisorError(`${LOG_PREFIX}:fromHandlerSets - No handler sets provided`);
    }
    const chosen = version
      ? sets.find((s) => s.version === version)
      : [...sets].sort((a, b) => compareVersions(b.version, a.version))[0];
    if (!chosen) {
      throw new FatalSupervisorError(
        `${LOG_PREFIX}:fromHandlerSets - No handler set for version "${version}" (available: ${sets
          .map((s) => s.version)
          .join(", ")})`
      );
    }
    const registry = new WorkflowRegistry();
    for (const descriptor of chosen.workflows) {
      registry.register(descriptor);
    }
    return registry;
  }

  /**
   * Register a workflow. Fails if the name is taken; never overwrites.
   */
  register(descriptor: WorkflowDescriptor): void {
    if (this.workflows.has(descriptor.name)) {
      throw new DuplicateWorkflowError(descriptor.name);
    }
    this.workflows.set(descriptor.name, Object.freeze(descriptor));
  }

  /**
   * Get the descriptor for a workflow, or throw WorkflowNotFoundError.
   */
  lookup(name: string): WorkflowDescriptor {
    const descriptor = this.workflows.get(name);
    if (!descriptor) {
      throw new WorkflowNotFoundError({ message: `Workflow "${name}" is not registered` });
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.workflows.has(name);
  }

  /** Descriptors in registration order. */
  list(): WorkflowDescriptor[] {
    return [...this.workflows.values()];
  }

  get size(): number {
    return this.workflows.size;
  }

  describe(name: string): WorkflowSummary {
    return summarize(this.lookup(name));
  }

  summaries(): WorkflowSummary[] {
    return this.list().map(summarize);
  }
}

function summarize(descriptor: WorkflowDescriptor): WorkflowSummary {
  return {
    name: descriptor.name,
    description: descriptor.description,
    version: descriptor.version,
    inputSchema: zodToJsonSchema(descriptor.input, { $refStrategy: "none" }),
    outputSchema: zodToJsonSchema(descriptor.output, { $refStrategy: "none" }),
  };
}

/**
 * Numeric comparison of dotted versions ("1.10.0" > "1.9.2"). Non-numeric
 * segments compare as strings.
 */
export function compareVersions(a: string, b: string): number {
  const pa = a.split(".");
  const pb = b.split(".");
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const sa = pa[i] ?? "0";
    const sb = pb[i] ?? "0";
    const na = Number(sa);
    const nb = Number(sb);
    if (Number.isInteger(na) && Number.isInteger(nb)) {
      if (na !== nb) return na - nb;
    } else if (sa !== sb) {
      return sa < sb ? -1 : 1;
    }
  }
  return 0;
}
