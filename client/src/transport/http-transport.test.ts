import { describe, it, expect, vi } from "vitest";
import { TransportError } from "@flowhost/core";
import { HttpTransport, deriveControlEndpoint, type FetchLike } from "./http-transport.js";

const meta = { startedAtUnixMs: 1, endedAtUnixMs: 3, durationMs: 2 };
const request = { invocationId: "inv-1", workflowName: "hello-world", input: {} };
const signal = new AbortController().signal;

function respond(body: unknown, status = 200): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), { status });
}

describe("HttpTransport", () => {
  it("should POST the request as JSON and parse the result", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(respond({ ok: true, invocationId: "inv-1", output: 7, meta }));
    const transport = new HttpTransport({ endpoint: "http://localhost:63419/", fetchImpl });

    await expect(transport.submit(request, signal)).resolves.toEqual({ ok: true, invocationId: "inv-1", output: 7, meta });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://localhost:63419/v1/invocations");
    expect(init).toMatchObject({ method: "POST", headers: { "Content-Type": "application/json" }, signal });
    expect(init?.body).toBe(JSON.stringify(request));
  });

  it("should return failures carried by 400 and 503 responses", async () => {
    const failure = {
      ok: false,
      invocationId: "inv-1",
      error: { kind: "UNAVAILABLE", message: "Supervisor is draining", retryable: true },
      meta,
    };
    const transport = new HttpTransport({
      endpoint: "http://localhost:63419",
      fetchImpl: vi.fn<FetchLike>().mockResolvedValue(respond(failure, 503)),
    });

    await expect(transport.submit(request, signal)).resolves.toEqual(failure);
  });

  it("should raise TransportError for other statuses", async () => {
    const transport = new HttpTransport({
      endpoint: "http://localhost:63419",
      fetchImpl: vi.fn<FetchLike>().mockResolvedValue(respond("Bad Gateway", 502)),
    });

    const err = await transport.submit(request, signal).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ details: { status: 502 }, invocationId: "inv-1" });
  });

  it("should raise TransportError for a body that is not JSON", async () => {
    const transport = new HttpTransport({
      endpoint: "http://localhost:63419",
      fetchImpl: vi.fn<FetchLike>().mockResolvedValue(respond("<html>", 200)),
    });

    await expect(transport.submit(request, signal)).rejects.toThrow(/is not JSON/);
  });

  it("should POST cancel notices and read the acknowledgement", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(respond({ cancelled: true }));
    const transport = new HttpTransport({ endpoint: "http://localhost:63419", fetchImpl });

    await expect(transport.cancel("a b")).resolves.toBe(true);
    expect(fetchImpl).toHaveBeenCalledWith("http://localhost:63419/v1/invocations/a%20b/cancel", { method: "POST" });
  });
});

describe("deriveControlEndpoint", () => {
  it("should use the port below the execution port", () => {
    expect(deriveControlEndpoint("http://localhost:63419")).toBe("http://localhost:63418/");
    expect(deriveControlEndpoint("http://flows.test")).toBe("http://flows.test:79/");
  });
});
