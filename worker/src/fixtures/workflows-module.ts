import { z } from "zod";
import { defineWorkflow } from "../define.js";

export const version = "2.1.0";

export const workflows = [
  defineWorkflow({
    name: "double",
    input: z.object({ n: z.number() }),
    output: z.object({ n: z.number() }),
    handler: ({ n }) => ({ n: n * 2 }),
  }),
];
