import { AsyncLocalStorage } from 'async_hooks';

/**
 * Request-scoped context carried through async calls
 */
export interface LogContext {
  correlationId: string;
  accountId?: string;
  identity?: string;
  idempotencyKey?: string;
  [key: string]: unknown;
}

const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

export const getCorrelationId = (): string | undefined => {
  return asyncLocalStorage.getStore()?.correlationId;
};

/**
 * Merge fields into the current context; no-op outside a request
 */
export const addLogContext = (context: Partial<LogContext>): void => {
  const store = asyncLocalStorage.getStore();
  if (store) {
    Object.assign(store, context);
  }
};

export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
