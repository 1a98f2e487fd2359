/**
 * Supervisor configuration: endpoints, drain timeout, workflow source,
 * optional NATS execution endpoint.
 */

import { readFileSync, existsSync } from "node:fs";
import { z } from "zod";
import { FatalSupervisorError } from "@flowhost/core";
import type { Logger } from "./logger.js";

const LOG_PREFIX = "flowhost-worker:config";

export const DEFAULT_CONTROL_PORT = 63418;
export const DEFAULT_EXECUTION_PORT = 63419;

const port = z.coerce.number().int().min(0).max(65535);

export const SupervisorConfigSchema = z.object({
  /** Interface both HTTP endpoints bind to */
  host: z.string().min(1).default("0.0.0.0"),
  controlPort: port.default(DEFAULT_CONTROL_PORT),
  executionPort: port.default(DEFAULT_EXECUTION_PORT),
  /** How long a drain waits for in-flight dispatches before aborting them */
  graceMs: z.coerce.number().int().nonnegative().default(30_000),
  /** Per-invocation timeout when the request sets none */
  defaultTimeoutMs: z.coerce.number().int().positive().optional(),
  /** Module exporting the workflows to register; bundled samples when unset */
  workflowsModule: z.string().min(1).optional(),
  /** Handler set to load from the module; highest version when unset */
  handlerSetVersion: z.string().min(1).optional(),
  /** Also serve executions over NATS when set */
  natsUrl: z.string().min(1).optional(),
  natsSubject: z.string().min(1).default("flowhost.invocations"),
  natsQueueGroup: z.string().min(1).default("flowhost-workers"),
  /** Concurrent NATS subscriptions (queue group members) */
  concurrency: z.coerce.number().int().positive().default(4),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type SupervisorConfig = z.infer<typeof SupervisorConfigSchema>;

/** Raw, unvalidated settings: env vars or JSON file keys. */
type RawConfig = Partial<Record<keyof SupervisorConfig, unknown>>;

const ENV_KEYS: ReadonlyArray<readonly [keyof SupervisorConfig, string]> = [
  ["host", "FLOWHOST_HOST"],
  ["controlPort", "FLOWHOST_CONTROL_PORT"],
  ["executionPort", "FLOWHOST_EXECUTION_PORT"],
  ["graceMs", "FLOWHOST_GRACE_MS"],
  ["defaultTimeoutMs", "FLOWHOST_DEFAULT_TIMEOUT_MS"],
  ["workflowsModule", "FLOWHOST_WORKFLOWS_MODULE"],
  ["handlerSetVersion", "FLOWHOST_HANDLER_SET_VERSION"],
  ["natsUrl", "FLOWHOST_NATS_URL"],
  ["natsSubject", "FLOWHOST_NATS_SUBJECT"],
  ["natsQueueGroup", "FLOWHOST_NATS_QUEUE_GROUP"],
  ["concurrency", "FLOWHOST_CONCURRENCY"],
  ["logLevel", "LOG_LEVEL"],
];

function fromEnv(env: NodeJS.ProcessEnv): RawConfig {
  const raw: RawConfig = {};
  for (const [key, name] of ENV_KEYS) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }
  return raw;
}

function fromFile(path: string, log?: Logger): RawConfig {
  if (!existsSync(path)) {
    throw new FatalSupervisorError(`${LOG_PREFIX}:loadConfig - Config file not found: ${path}`);
  }
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new FatalSupervisorError(`${LOG_PREFIX}:loadConfig - Config file is not valid JSON: ${path}`, err);
  }
  const parsed = z.record(z.unknown()).safeParse(data);
  if (!parsed.success) {
    throw new FatalSupervisorError(`${LOG_PREFIX}:loadConfig - Config file must hold a JSON object: ${path}`);
  }
  log?.info({ path }, `${LOG_PREFIX}:loadConfig - Loaded config from file`);
  return parsed.data;
}

/**
 * Load config from environment and optional JSON file (FLOWHOST_CONFIG_PATH).
 * File keys override env; explicit overrides win over both.
 * Invalid values raise a FatalSupervisorError listing every issue.
 */
export function loadConfig(params?: {
  env?: NodeJS.ProcessEnv;
  overrides?: RawConfig;
  log?: Logger;
}): SupervisorConfig {
  const env = params?.env ?? process.env;
  const configPath = env.FLOWHOST_CONFIG_PATH;
  const merged: RawConfig = {
    ...fromEnv(env),
    ...(configPath ? fromFile(configPath, params?.log) : {}),
    ...params?.overrides,
  };
  const parsed = SupervisorConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new FatalSupervisorError(`${LOG_PREFIX}:loadConfig - Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
