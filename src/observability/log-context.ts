import { AsyncLocalStorage } from 'async_hooks';

/**
 * Log context stored in AsyncLocalStorage
 * Provides request-scoped context for logging
 */
export interface LogContext {
  correlationId: string;
  [key: string]: unknown;
}

/**
 * AsyncLocalStorage instance for maintaining request context
 * across async operations without explicit parameter passing
 */
export const asyncLocalStorage = new AsyncLocalStorage<LogContext>();

/**
 * Get the current log context
 */
export const getLogContext = (): LogContext | undefined => {
  return asyncLocalStorage.getStore();
};

/**
 * Run a function within a specific log context
 */
export const runWithContext = <T>(context: LogContext, fn: () => T): T => {
  return asyncLocalStorage.run(context, fn);
};
