/**
 * Fixed-backoff retry for idempotent control queries. Execution requests
 * never go through here: a handler may not be safe to run twice.
 */

import { TransportError } from "@flowhost/core";

export async function retryTransport<T>(
  fn: () => Promise<T>,
  options: { retries: number; delayMs: number; onRetry?: (attempt: number, err: TransportError) => void }
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransportError) || attempt >= options.retries) throw err;
      options.onRetry?.(attempt + 1, err);
      await new Promise((resolve) => setTimeout(resolve, options.delayMs));
    }
  }
}
