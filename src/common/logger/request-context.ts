import { AsyncLocalStorage } from 'async_hooks';

/**
 * Per-request values that every log line written while serving the
 * request should carry.
 */
export interface RequestContext {
  correlationId: string;
  method?: string;
  path?: string;
  ip?: string;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function runWithRequestContext<T>(context: RequestContext, fn: () => T): T {
  return storage.run(context, fn);
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

export function getCorrelationId(): string | undefined {
  return storage.getStore()?.correlationId;
}
