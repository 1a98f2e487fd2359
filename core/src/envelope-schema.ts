/**
 * Zod runtime schemas for InvocationRequest and InvocationResult.
 *
 * These schemas mirror the TypeScript types in envelope.ts and validate
 * payloads arriving over HTTP or NATS, in both directions.
 *
 * @see envelope.ts for the canonical TypeScript types.
 */

import { z } from "zod";
import type { InvocationRequest, InvocationResult, WorkflowSummary } from "./envelope.js";

export const WorkflowErrorKindSchema = z.enum([
  "NOT_FOUND",
  "VALIDATION_ERROR",
  "HANDLER_ERROR",
  "CANCELLED",
  "TIMEOUT",
  "UNAVAILABLE",
  "TRANSPORT_ERROR",
  "INTERNAL_ERROR",
]);

export const InvocationRequestSchema = z.object({
  invocationId: z.string().min(1),
  workflowName: z.string().min(1),
  input: z.unknown(),
  timeoutMs: z.number().int().positive().optional(),
});

export const InvocationMetaSchema = z.object({
  startedAtUnixMs: z.number(),
  endedAtUnixMs: z.number(),
  durationMs: z.number(),
});

export const InvocationSuccessSchema = z.object({
  ok: z.literal(true),
  invocationId: z.string(),
  output: z.unknown(),
  meta: InvocationMetaSchema,
});

export const InvocationFailureSchema = z.object({
  ok: z.literal(false),
  invocationId: z.string(),
  error: z.object({
    kind: WorkflowErrorKindSchema,
    message: z.string(),
    retryable: z.boolean(),
    details: z.unknown().optional(),
    traceback: z.string().optional(),
  }),
  meta: InvocationMetaSchema,
});

export const InvocationResultSchema = z.discriminatedUnion("ok", [
  InvocationSuccessSchema,
  InvocationFailureSchema,
]);

export const CancelRequestSchema = z.object({
  invocationId: z.string().min(1),
});

export const WorkflowSummarySchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  version: z.string().optional(),
  inputSchema: z.unknown(),
  outputSchema: z.unknown(),
});

export const HealthReportSchema = z.object({
  status: z.literal("ok"),
  state: z.enum(["idle", "starting", "listening", "draining", "stopped"]),
  uptimeMs: z.number(),
  inFlight: z.number(),
});

// ── Parsers ─────────────────────────────────────────────────────────
// zod infers `z.unknown()` members as optional; these rebuild the canonical
// envelope types from the parsed data.

export type ParseOutcome<T> = { success: true; data: T } | { success: false; error: z.ZodError };

export function parseInvocationRequest(raw: unknown): ParseOutcome<InvocationRequest> {
  const parsed = InvocationRequestSchema.safeParse(raw);
  if (!parsed.success) return { success: false, error: parsed.error };
  const { invocationId, workflowName, input, timeoutMs } = parsed.data;
  return { success: true, data: { invocationId, workflowName, input, timeoutMs } };
}

export function parseInvocationResult(raw: unknown): ParseOutcome<InvocationResult> {
  const parsed = InvocationResultSchema.safeParse(raw);
  if (!parsed.success) return { success: false, error: parsed.error };
  const res = parsed.data;
  if (res.ok) {
    return {
      success: true,
      data: { ok: true, invocationId: res.invocationId, output: res.output, meta: res.meta },
    };
  }
  return {
    success: true,
    data: { ok: false, invocationId: res.invocationId, error: res.error, meta: res.meta },
  };
}

export function parseWorkflowSummaries(raw: unknown): ParseOutcome<WorkflowSummary[]> {
  const parsed = z.object({ workflows: z.array(WorkflowSummarySchema) }).safeParse(raw);
  if (!parsed.success) return { success: false, error: parsed.error };
  return {
    success: true,
    data: parsed.data.workflows.map((w) => ({
      name: w.name,
      description: w.description,
      version: w.version,
      inputSchema: w.inputSchema,
      outputSchema: w.outputSchema,
    })),
  };
}
