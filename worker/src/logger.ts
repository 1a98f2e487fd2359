/**
 * Logger for the supervisor. Structured context first, message second
 * (pino's argument order), with a "service:module" prefix on each child.
 */

import { pino, type Logger as PinoLogger } from "pino";

export type LogMethod = (ctx: Record<string, unknown>, msg: string) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LoggerFactory {
  get(prefix: string): Logger;
}

function wrap(instance: PinoLogger): Logger {
  return {
    debug: (ctx, msg) => instance.debug(ctx, msg),
    info: (ctx, msg) => instance.info(ctx, msg),
    warn: (ctx, msg) => instance.warn(ctx, msg),
    error: (ctx, msg) => instance.error(ctx, msg),
  };
}

/**
 * Create a logger factory. `get(prefix)` returns a child logger tagged with
 * the prefix. Level comes from the argument, then LOG_LEVEL, then "info".
 */
export function createNodeJSLogger(
  serviceName: string,
  options?: { level?: string }
): LoggerFactory {
  const root = pino({
    name: serviceName,
    level: options?.level ?? process.env.LOG_LEVEL ?? "info",
  });
  return {
    get(prefix: string) {
      return wrap(root.child({ prefix }));
    },
  };
}

/** Discards everything; for tests and embedded use. */
export function createSilentLogger(): LoggerFactory {
  const root = pino({ level: "silent" });
  return {
    get: () => wrap(root),
  };
}
