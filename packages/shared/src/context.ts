/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation ID, contract ID and current span across the
 * CLI run, worker jobs and API requests.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  correlationId: string;
  contractId?: string;
  comparisonId?: string;
  spanId?: string;
  parentSpanId?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Get the current request context
 */
export function getContext(): RequestContext | undefined {
  return asyncLocalStorage.getStore();
}

/**
 * Get the correlation ID from the current context, or generate a new one
 */
export function getCorrelationId(): string {
  const context = getContext();
  return context?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}

export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return asyncLocalStorage.run(context, fn);
}

/**
 * Run an async function in a child of the current context, inheriting
 * correlation and contract IDs and overriding the given fields.
 */
export async function runInChildContext<T>(
  overrides: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  const child: RequestContext = {
    ...parent,
    ...overrides,
    correlationId: overrides.correlationId || parent?.correlationId || ulid(),
  };
  return asyncLocalStorage.run(child, fn);
}

export { asyncLocalStorage };
