import { describe, it, expect, vi, afterEach } from "vitest";
import { z } from "zod";
import type { FastifyInstance } from "fastify";
import {
  SupervisorUnavailableError,
  TransportError,
  WorkflowCancelledError,
  WorkflowError,
  WorkflowNotFoundError,
  WorkflowTimeoutError,
  WorkflowValidationError,
  type InvocationResult,
} from "@flowhost/core";
import { Supervisor, WorkflowRegistry, defineWorkflow, helloWorld, helloWorldWithAge } from "@flowhost/worker";
import { AsyncClient, Client, createTransport } from "./client.js";
import type { FetchLike } from "./transport/http-transport.js";
import type { WorkflowTransport } from "./transport/types.js";

// ── Helpers ─────────────────────────────────────────────────────────

/** Runs until its signal aborts. */
const waitForAbort = defineWorkflow({
  name: "wait-for-abort",
  input: z.object({}),
  output: z.object({ stopped: z.boolean() }),
  handler: async (_input, { signal }) => {
    await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
    return { stopped: true };
  },
});

const supervisors: Supervisor[] = [];

async function startSupervisor(): Promise<Supervisor> {
  const registry = new WorkflowRegistry();
  registry.register(helloWorld);
  registry.register(helloWorldWithAge);
  registry.register(waitForAbort);
  const supervisor = new Supervisor({ registry, config: { host: "127.0.0.1", controlPort: 0, executionPort: 0 } });
  supervisors.push(supervisor);
  await supervisor.start();
  return supervisor;
}

afterEach(async () => {
  await Promise.all(supervisors.splice(0).map((s) => s.stop({ graceMs: 0 })));
});

/** fetch that answers from fastify apps in process, chosen by host. */
function injectFetch(apps: Record<string, FastifyInstance | null>): FetchLike {
  return async (url, init) => {
    const { host, pathname } = new URL(url);
    const app = apps[host];
    if (!app) throw new TypeError(`fetch failed: no route to ${host}`);
    const body = typeof init?.body === "string" ? init.body : undefined;
    const res = await app.inject({
      method: init?.method === "POST" ? "POST" : "GET",
      url: pathname,
      headers: body ? { "content-type": "application/json" } : {},
      payload: body,
    });
    return new Response(res.body, { status: res.statusCode, headers: { "content-type": "application/json" } });
  };
}

function remoteClient(supervisor: Supervisor, extra?: { fetchImpl?: FetchLike }) {
  return new Client({
    mode: "remote",
    endpoint: "http://exec.test:63419",
    controlEndpoint: "http://control.test:63418",
    fetchImpl:
      extra?.fetchImpl ??
      injectFetch({ "exec.test:63419": supervisor.servers.execution, "control.test:63418": supervisor.servers.control }),
  });
}

/** Transport whose submissions stay pending until the test settles them. */
function createPendingTransport() {
  const settle: Array<(result: InvocationResult) => void> = [];
  const transport = {
    kind: "http" as const,
    submit: vi.fn<WorkflowTransport["submit"]>(
      () => new Promise<InvocationResult>((resolve) => settle.push(resolve))
    ),
    cancel: vi.fn<WorkflowTransport["cancel"]>().mockResolvedValue(true),
    health: vi.fn<WorkflowTransport["health"]>(),
    listWorkflows: vi.fn<WorkflowTransport["listWorkflows"]>(),
    close: vi.fn<WorkflowTransport["close"]>().mockResolvedValue(undefined),
  };
  return { transport, settle };
}

const meta = { startedAtUnixMs: 1, endedAtUnixMs: 2, durationMs: 1 };

// ── Local mode ──────────────────────────────────────────────────────

describe("Client (local)", () => {
  it("should run a workflow and resolve with its output", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    await expect(client.runWorkflow("hello-world-d", { name: "arun", age: 12 })).resolves.toEqual({
      greeting: "Hello, arun! You are 12 years old.",
    });
    expect(client.transportKind).toBe("local");
  });

  it("should parse the output with a given schema", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    const out = await client.runWorkflow("hello-world", { name: "sam" }, { output: z.object({ greeting: z.string() }) });

    expect(out.greeting).toBe("Hello, sam!");
  });

  it("should reject output that does not match the given schema", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    const err = await client
      .runWorkflow("hello-world", {}, { output: z.object({ count: z.number() }) })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(WorkflowError);
    expect(err).toMatchObject({ kind: "INTERNAL_ERROR" });
  });

  it("should reject unknown workflows with WorkflowNotFoundError", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    await expect(client.runWorkflow("nope")).rejects.toBeInstanceOf(WorkflowNotFoundError);
  });

  it("should reject invalid input with WorkflowValidationError", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    const err = await client.runWorkflow("hello-world-d", { name: "arun", age: -12 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(WorkflowValidationError);
    expect(err).toMatchObject({ kind: "VALIDATION_ERROR", retryable: false });
  });

  it("should reject with WorkflowTimeoutError past timeoutMs", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    const err = await client.runWorkflow("wait-for-abort", {}, { timeoutMs: 20 }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(WorkflowTimeoutError);
    expect(err).toMatchObject({ message: 'Workflow "wait-for-abort" timed out after 20ms', retryable: true });
  });

  it("should reject with WorkflowCancelledError when the signal aborts and release the dispatch", async () => {
    const supervisor = await startSupervisor();
    const client = new Client({ mode: "local", supervisor });
    const ctrl = new AbortController();

    const pending = client.runWorkflow("wait-for-abort", {}, { signal: ctrl.signal, invocationId: "c-1" });
    await expect.poll(() => supervisor.inFlightCount).toBe(1);
    ctrl.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(WorkflowCancelledError);
    expect(err).toMatchObject({ invocationId: "c-1" });
    await expect.poll(() => supervisor.inFlightCount).toBe(0);
  });

  it("should reject at once for an already aborted signal", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });
    const ctrl = new AbortController();
    ctrl.abort();

    await expect(client.runWorkflow("hello-world", {}, { signal: ctrl.signal })).rejects.toBeInstanceOf(
      WorkflowCancelledError
    );
  });

  it("should reject with SupervisorUnavailableError while the supervisor drains", async () => {
    const supervisor = await startSupervisor();
    const client = new Client({ mode: "local", supervisor });
    const running = client.runWorkflow("wait-for-abort", {}).catch((e: unknown) => e);
    await expect.poll(() => supervisor.inFlightCount).toBe(1);

    const stopping = supervisor.stop({ graceMs: 10 });
    await expect(client.runWorkflow("hello-world")).rejects.toBeInstanceOf(SupervisorUnavailableError);

    await stopping;
    expect(await running).toBeInstanceOf(WorkflowCancelledError);
  });

  it("should report health and list workflows", async () => {
    const client = new Client({ mode: "local", supervisor: await startSupervisor() });

    await expect(client.health()).resolves.toMatchObject({ status: "ok", state: "listening", inFlight: 0 });
    expect((await client.listWorkflows()).map((w) => w.name)).toEqual(["hello-world", "hello-world-d", "wait-for-abort"]);
  });
});

// ── Remote mode ─────────────────────────────────────────────────────

describe("Client (remote over HTTP)", () => {
  it("should run a workflow through the execution endpoint", async () => {
    const client = remoteClient(await startSupervisor());

    await expect(client.runWorkflow("hello-world-d", { name: "arun", age: 12 })).resolves.toEqual({
      greeting: "Hello, arun! You are 12 years old.",
    });
    expect(client.transportKind).toBe("http");
  });

  it("should raise the same errors as in local mode", async () => {
    const client = remoteClient(await startSupervisor());

    await expect(client.runWorkflow("nope")).rejects.toBeInstanceOf(WorkflowNotFoundError);
    await expect(client.runWorkflow("hello-world-d", { name: "arun", age: -12 })).rejects.toBeInstanceOf(
      WorkflowValidationError
    );
  });

  it("should read health and listings from the control endpoint", async () => {
    const client = remoteClient(await startSupervisor());

    await expect(client.health()).resolves.toMatchObject({ status: "ok", state: "listening" });
    expect((await client.listWorkflows()).map((w) => w.name)).toContain("hello-world");
  });

  it("should raise TransportError without retrying an invocation", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValue(new TypeError("fetch failed"));
    const client = remoteClient(await startSupervisor(), { fetchImpl });

    await expect(client.runWorkflow("hello-world")).rejects.toBeInstanceOf(TransportError);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("should retry control queries on TransportError", async () => {
    const supervisor = await startSupervisor();
    const real = injectFetch({ "control.test:63418": supervisor.servers.control });
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockImplementation(real);
    const client = new Client({
      mode: "remote",
      endpoint: "http://exec.test:63419",
      controlEndpoint: "http://control.test:63418",
      fetchImpl,
      retryDelayMs: 0,
    });

    await expect(client.health()).resolves.toMatchObject({ status: "ok" });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("should give up on control queries after the configured retries", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockRejectedValue(new TypeError("fetch failed"));
    const client = new Client({
      mode: "remote",
      endpoint: "http://exec.test:63419",
      fetchImpl,
      controlRetries: 1,
      retryDelayMs: 0,
    });

    await expect(client.listWorkflows()).rejects.toBeInstanceOf(TransportError);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(fetchImpl.mock.calls[0][0]).toBe("http://exec.test:63418/v1/workflows");
  });
});

// ── Cancellation over a transport ───────────────────────────────────

describe("Client cancellation", () => {
  it("should send a cancel notice for the aborted invocation", async () => {
    const { transport } = createPendingTransport();
    const client = new Client({ mode: "custom", transport });
    const ctrl = new AbortController();

    const pending = client.runWorkflow("w", {}, { signal: ctrl.signal, invocationId: "inv-9" });
    ctrl.abort();

    await expect(pending).rejects.toBeInstanceOf(WorkflowCancelledError);
    expect(transport.cancel).toHaveBeenCalledWith("inv-9");
  });

  it("should log, not throw, when the cancel notice fails", async () => {
    const { transport } = createPendingTransport();
    transport.cancel.mockRejectedValue(new TransportError({ message: "down" }));
    const warn = vi.fn();
    const client = new Client({ mode: "custom", transport, loggerFactory: { warn } });
    const ctrl = new AbortController();

    const pending = client.runWorkflow("w", {}, { signal: ctrl.signal, invocationId: "inv-10" });
    ctrl.abort();

    await expect(pending).rejects.toBeInstanceOf(WorkflowCancelledError);
    await vi.waitFor(() =>
      expect(warn).toHaveBeenCalledWith({ invocationId: "inv-10", error: "down" }, "flowhost-client:cancel - Cancel notice failed")
    );
  });

  it("should detach from the caller's signal once the run settles", async () => {
    const { transport, settle } = createPendingTransport();
    const client = new Client({ mode: "custom", transport });
    const ctrl = new AbortController();
    const added = vi.spyOn(ctrl.signal, "addEventListener");
    const removed = vi.spyOn(ctrl.signal, "removeEventListener");

    const pending = client.runWorkflow("w", {}, { signal: ctrl.signal, invocationId: "inv-12" });
    await vi.waitFor(() => expect(settle).toHaveLength(1));
    settle[0]({ ok: true, invocationId: "inv-12", output: "done", meta });

    await expect(pending).resolves.toBe("done");
    expect(added).toHaveBeenCalledTimes(1);
    expect(removed).toHaveBeenCalledWith("abort", added.mock.calls[0][1]);
    ctrl.abort();
    expect(transport.cancel).not.toHaveBeenCalled();
  });

  it("should send the request id, name, input and timeout to the transport", async () => {
    const { transport, settle } = createPendingTransport();
    const client = new Client({ mode: "custom", transport, defaultTimeoutMs: 5_000 });

    const pending = client.runWorkflow("w", { a: 1 }, { invocationId: "inv-11" });
    await vi.waitFor(() => expect(settle).toHaveLength(1));
    settle[0]({ ok: true, invocationId: "inv-11", output: 42, meta });

    await expect(pending).resolves.toBe(42);
    expect(transport.submit.mock.calls[0][0]).toEqual({
      invocationId: "inv-11",
      workflowName: "w",
      input: { a: 1 },
      timeoutMs: 5_000,
    });
  });
});

// ── AsyncClient ─────────────────────────────────────────────────────

describe("AsyncClient", () => {
  it("should return a run handle at once and settle it with the output", async () => {
    const { transport, settle } = createPendingTransport();
    const client = new AsyncClient({ mode: "custom", transport });

    const run = client.runWorkflow("w", {}, { invocationId: "inv-20" });

    expect(run.invocationId).toBe("inv-20");
    expect(run.workflowName).toBe("w");
    expect(run.status).toBe("pending");
    await vi.waitFor(() => expect(settle).toHaveLength(1));
    settle[0]({ ok: true, invocationId: "inv-20", output: "done", meta });

    await expect(run.result()).resolves.toBe("done");
    expect(run.status).toBe("succeeded");
  });

  it("should mark failed runs and keep the error", async () => {
    const { transport, settle } = createPendingTransport();
    const client = new AsyncClient({ mode: "custom", transport });

    const run = client.runWorkflow("w");
    await vi.waitFor(() => expect(settle).toHaveLength(1));
    settle[0]({
      ok: false,
      invocationId: run.invocationId,
      error: { kind: "HANDLER_ERROR", message: "boom", retryable: false },
      meta,
    });

    await expect(run.result()).rejects.toMatchObject({ kind: "HANDLER_ERROR", message: "boom" });
    expect(run.status).toBe("failed");
    expect(run.error).toBeInstanceOf(WorkflowError);
  });

  it("should cancel a pending run", async () => {
    const { transport } = createPendingTransport();
    const client = new AsyncClient({ mode: "custom", transport });

    const run = client.runWorkflow("w", {}, { invocationId: "inv-21" });
    run.cancel();

    await expect(run.result()).rejects.toBeInstanceOf(WorkflowCancelledError);
    expect(run.status).toBe("cancelled");
    expect(transport.cancel).toHaveBeenCalledWith("inv-21");
  });

  it("should run against a local supervisor", async () => {
    const client = new AsyncClient({ mode: "local", supervisor: await startSupervisor() });

    const run = client.runWorkflow("hello-world-d", { name: "arun", age: 12 }, {
      output: z.object({ greeting: z.string() }),
    });

    expect((await run.result()).greeting).toBe("Hello, arun! You are 12 years old.");
  });
});

// ── Transport selection ─────────────────────────────────────────────

describe("createTransport", () => {
  it("should choose the transport from the endpoint scheme", () => {
    expect(createTransport({ mode: "remote", endpoint: "http://localhost:63419" }).kind).toBe("http");
    expect(createTransport({ mode: "remote", endpoint: "https://flows.example.test" }).kind).toBe("http");
    expect(createTransport({ mode: "remote", endpoint: "nats://localhost:4222" }).kind).toBe("nats");
  });

  it("should reject unsupported schemes", () => {
    expect(() => createTransport({ mode: "remote", endpoint: "ftp://localhost" })).toThrow(TypeError);
  });
});
