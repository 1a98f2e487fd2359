import { describe, it, expect } from "vitest";
import { WorkflowTimeoutError } from "./errors.js";
import { anySignal, describeError, toFailure } from "./utils.js";

const clock = { now: () => 150 };

describe("toFailure", () => {
  it("should keep the kind of a WorkflowError", () => {
    const failure = toFailure({
      err: new WorkflowTimeoutError({ message: "late" }),
      invocationId: "a",
      startedAt: 100,
      clock,
    });

    expect(failure).toEqual({
      ok: false,
      invocationId: "a",
      error: { kind: "TIMEOUT", message: "late", retryable: true },
      meta: { startedAtUnixMs: 100, endedAtUnixMs: 150, durationMs: 50 },
    });
  });

  it("should classify anything else as INTERNAL_ERROR", () => {
    const failure = toFailure({ err: "oops", invocationId: "a", startedAt: 100, clock });

    expect(failure.error).toEqual({ kind: "INTERNAL_ERROR", message: "oops", retryable: false });
  });
});

describe("describeError", () => {
  it("should describe errors, strings and other values", () => {
    const err = new Error("bad");

    expect(describeError(err)).toEqual({ message: "bad", traceback: err.stack });
    expect(describeError("plain")).toEqual({ message: "plain" });
    expect(describeError({ code: 7 })).toEqual({ message: '{"code":7}' });
  });
});

describe("anySignal", () => {
  it("should abort when any input aborts, with its reason", () => {
    const a = new AbortController();
    const b = new AbortController();
    const combined = anySignal([a.signal, b.signal]);

    b.abort("stop");

    expect(combined.aborted).toBe(true);
    expect(combined.reason).toBe("stop");
  });

  it("should return an already aborted input as is", () => {
    const a = new AbortController();
    a.abort();

    expect(anySignal([new AbortController().signal, a.signal])).toBe(a.signal);
  });
});
