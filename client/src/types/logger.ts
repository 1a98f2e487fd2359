/**
 * Logger interface for client components.
 * Optional structured logging with context and message; a worker logger or a
 * pino instance fits it.
 */

export interface Logger {
  debug?: (ctx: Record<string, unknown>, msg: string) => void;
  info?: (ctx: Record<string, unknown>, msg: string) => void;
  warn?: (ctx: Record<string, unknown>, msg: string) => void;
  error?: (ctx: Record<string, unknown>, msg: string) => void;
}

/** Either a Logger or an object with get(name) returning one. */
export type LoggerFactory = Logger | { get(name: string): Logger };

const noopLogger: Logger = {};

function hasGet(factory: LoggerFactory): factory is { get(name: string): Logger } {
  return "get" in factory && typeof factory.get === "function";
}

/** Resolve logger from factory (supports loggerFactory or loggerFactory.get(SERVICE_NAME)). */
export function resolveLogger(factory: LoggerFactory | undefined, serviceName: string): Logger {
  if (!factory) return noopLogger;
  return hasGet(factory) ? factory.get(serviceName) : factory;
}
