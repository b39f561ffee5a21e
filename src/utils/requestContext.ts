/**
 * Request Context
 *
 * Request-scoped context using AsyncLocalStorage. The request ID set by the
 * requestLogger middleware is visible to every log line written while the
 * request is handled, including lines written by handlers waiting on a
 * storage permit.
 *
 * Usage:
 *   requestContext.run({ requestId: 'abc123', startTime: Date.now() }, next);
 *   const ctx = requestContext.get();
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextData {
  /** Unique request correlation ID for tracing */
  requestId: string;
  /** Request start time for duration calculation */
  startTime: number;
  path?: string;
  method?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const requestContext = {
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (undefined outside request scope)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  /**
   * Get the current request ID (returns 'no-request' if not in request scope)
   */
  getRequestId(): string {
    return asyncLocalStorage.getStore()?.requestId ?? 'no-request';
  },

  getDuration(): number {
    const store = asyncLocalStorage.getStore();
    if (!store) return 0;
    return Date.now() - store.startTime;
  },

  generateRequestId(): string {
    // Short format: 8 characters from UUID for readability in logs
    return randomUUID().split('-')[0];
  },
};

export default requestContext;
