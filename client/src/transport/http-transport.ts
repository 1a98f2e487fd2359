/**
 * HTTP transport: POSTs invocations to a supervisor's execution endpoint and
 * reads health and workflow listings from its control endpoint.
 *
 * The execution endpoint answers every per-request outcome with an
 * InvocationResult body (200, or 400/503 for undecodable and refused
 * requests); anything else is a TransportError.
 */

import {
  type HealthReport,
  type InvocationRequest,
  type InvocationResult,
  type WorkflowSummary,
  HealthReportSchema,
  TransportError,
  parseInvocationResult,
  parseWorkflowSummaries,
} from "@flowhost/core";
import { z } from "zod";
import type { WorkflowTransport } from "./types.js";
import { resolveLogger, type Logger, type LoggerFactory } from "../types/logger.js";

const SERVICE_NAME = "flowhost-client:http-transport";

/** The part of fetch this transport uses; `globalThis.fetch` satisfies it. */
export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpTransportConfig {
  /** Execution endpoint base URL, e.g. "http://localhost:63419" */
  endpoint: string;
  /** Control endpoint base URL; defaults to the execution URL with the port one lower */
  controlEndpoint?: string;
  /** Custom fetch implementation (tests, proxies) */
  fetchImpl?: FetchLike;
  loggerFactory?: LoggerFactory;
}

const CancelResponseSchema = z.object({ cancelled: z.boolean() });

export class HttpTransport implements WorkflowTransport {
  readonly kind = "http" as const;
  private readonly endpoint: string;
  private readonly controlEndpoint: string;
  private readonly fetchFn: FetchLike;
  private readonly log: Logger;

  constructor(config: HttpTransportConfig) {
    this.endpoint = trimSlashes(config.endpoint);
    this.controlEndpoint = trimSlashes(config.controlEndpoint ?? deriveControlEndpoint(config.endpoint));
    this.fetchFn = config.fetchImpl ?? ((url, init) => globalThis.fetch(url, init));
    this.log = resolveLogger(config.loggerFactory, SERVICE_NAME);
  }

  async submit(request: InvocationRequest, signal: AbortSignal): Promise<InvocationResult> {
    const url = `${this.endpoint}/v1/invocations`;
    const response = await this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(request),
      signal,
    });

    if (response.status !== 200 && response.status !== 400 && response.status !== 503) {
      throw new TransportError({
        message: `${SERVICE_NAME}:submit - Unexpected status ${response.status} from ${url}`,
        invocationId: request.invocationId,
        details: { status: response.status },
      });
    }
    const parsed = parseInvocationResult(await this.readJson(response, url));
    if (!parsed.success) {
      throw new TransportError({
        message: `${SERVICE_NAME}:submit - Response from ${url} is not an invocation result`,
        invocationId: request.invocationId,
        details: parsed.error.flatten(),
      });
    }
    return parsed.data;
  }

  async cancel(invocationId: string): Promise<boolean> {
    const url = `${this.endpoint}/v1/invocations/${encodeURIComponent(invocationId)}/cancel`;
    const response = await this.send(url, { method: "POST" });
    const parsed = CancelResponseSchema.safeParse(await this.readJson(response, url));
    return parsed.success && parsed.data.cancelled;
  }

  async health(): Promise<HealthReport> {
    const url = `${this.controlEndpoint}/health`;
    const parsed = HealthReportSchema.safeParse(await this.readJson(await this.send(url), url));
    if (!parsed.success) {
      throw new TransportError({ message: `${SERVICE_NAME}:health - Unexpected health report from ${url}` });
    }
    return parsed.data;
  }

  async listWorkflows(): Promise<WorkflowSummary[]> {
    const url = `${this.controlEndpoint}/v1/workflows`;
    const parsed = parseWorkflowSummaries(await this.readJson(await this.send(url), url));
    if (!parsed.success) {
      throw new TransportError({ message: `${SERVICE_NAME}:listWorkflows - Unexpected listing from ${url}` });
    }
    return parsed.data;
  }

  async close(): Promise<void> {
    // fetch keeps no connection state of ours to release.
  }

  private async send(url: string, init?: RequestInit): Promise<Response> {
    try {
      return await this.fetchFn(url, init);
    } catch (err) {
      this.log.warn?.({ url, error: err instanceof Error ? err.message : String(err) }, `${SERVICE_NAME}:send - Request failed`);
      throw new TransportError({
        message: `${SERVICE_NAME}:send - Request to ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        cause: err,
      });
    }
  }

  private async readJson(response: Response, url: string): Promise<unknown> {
    try {
      return await response.json();
    } catch (err) {
      throw new TransportError({
        message: `${SERVICE_NAME}:readJson - Response from ${url} (status ${response.status}) is not JSON`,
        cause: err,
      });
    }
  }
}

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * By convention the control port sits one below the execution port
 * (63418 / 63419).
 */
export function deriveControlEndpoint(endpoint: string): string {
  const url = new URL(endpoint);
  const port = Number(url.port || (url.protocol === "https:" ? 443 : 80));
  url.port = String(port - 1);
  return url.toString();
}
