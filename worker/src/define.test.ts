import { describe, it, expect } from "vitest";
import { z } from "zod";
import { defineHandlerSet, defineWorkflow } from "./define.js";

const schema = z.object({});

describe("defineWorkflow", () => {
  it("should return a frozen descriptor", () => {
    const wf = defineWorkflow({ name: "ok.name_1-a", input: schema, output: schema, handler: () => ({}) });

    expect(wf.name).toBe("ok.name_1-a");
    expect(Object.isFrozen(wf)).toBe(true);
  });

  it.each(["", "has space", "-leading", "slash/name"])("should reject the name %j", (name) => {
    expect(() => defineWorkflow({ name, input: schema, output: schema, handler: () => ({}) })).toThrow(TypeError);
  });
});

describe("defineHandlerSet", () => {
  it("should group workflows under a version", () => {
    const wf = defineWorkflow({ name: "a", input: schema, output: schema, handler: () => ({}) });

    expect(defineHandlerSet("2.0.0", [wf])).toEqual({ version: "2.0.0", workflows: [wf] });
  });
});
