/**
 * Correlation ids for tracing one estimate request through catalog lookups,
 * aggregation and persistence.
 *
 * Scoped ids live in AsyncLocalStorage so concurrent requests served by the
 * HTTP API keep their own id across awaits. An id set outside any scope is
 * process-wide (the CLI sets one per invocation).
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

interface CorrelationScope {
  id: string | undefined;
}

const scopes = new AsyncLocalStorage<CorrelationScope>();
let ambientCorrelationId: string | undefined;

/**
 * Generate a new correlation ID
 * Format: est-{base36 timestamp}-{uuid prefix}
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const uuid = randomUUID().slice(0, 8);
  return `est-${timestamp}-${uuid}`;
}

export function setCorrelationId(id: string): void {
  const scope = scopes.getStore();
  if (scope) {
    scope.id = id;
  } else {
    ambientCorrelationId = id;
  }
}

export function getCorrelationId(): string | undefined {
  const scope = scopes.getStore();
  return scope ? scope.id : ambientCorrelationId;
}

export function clearCorrelationId(): void {
  const scope = scopes.getStore();
  if (scope) {
    scope.id = undefined;
  } else {
    ambientCorrelationId = undefined;
  }
}

/**
 * Run `fn` with `id` as the correlation id. The previous id is visible again
 * once `fn` returns.
 */
export function withCorrelation<T>(id: string, fn: () => T): T {
  return scopes.run({ id }, fn);
}

export async function withCorrelationAsync<T>(id: string, fn: () => Promise<T>): Promise<T> {
  return scopes.run({ id }, fn);
}

/**
 * Returns the current correlation id, creating one if none is set.
 */
export function ensureCorrelationId(): string {
  const current = getCorrelationId();
  if (current) {
    return current;
  }
  const id = generateCorrelationId();
  setCorrelationId(id);
  return id;
}
