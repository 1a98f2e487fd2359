import { z } from "zod";
import { defineWorkflow } from "../define.js";

export const getEnv = defineWorkflow({
  name: "get-env",
  description: "Environment variables visible to the worker, optionally filtered by prefix",
  input: z.object({ prefix: z.string().optional() }).default({}),
  output: z.object({ variables: z.record(z.string()) }),
  handler: ({ prefix }, { log }) => {
    log.info({ prefix }, "flowhost-worker:workflows:get-env - Reading environment");
    const variables: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value === undefined) continue;
      if (prefix && !key.startsWith(prefix)) continue;
      variables[key] = value;
    }
    return { variables };
  },
});
