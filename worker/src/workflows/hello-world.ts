import { z } from "zod";
import { defineWorkflow } from "../define.js";

const Greeting = z.object({ greeting: z.string() });

export const helloWorld = defineWorkflow({
  name: "hello-world",
  description: "Greets the caller by name",
  input: z.object({ name: z.string().min(1).default("world") }).default({}),
  output: Greeting,
  handler: ({ name }) => ({ greeting: `Hello, ${name}!` }),
});

/**
 * Greeting with a declared constraint on `age`; negative ages are rejected
 * before the handler runs.
 */
export const helloWorldWithAge = defineWorkflow({
  name: "hello-world-d",
  description: "Greets the caller by name and age",
  input: z.object({
    name: z.string().min(1),
    age: z.number().nonnegative(),
  }),
  output: Greeting,
  handler: ({ name, age }) => ({ greeting: `Hello, ${name}! You are ${age} years old.` }),
});
