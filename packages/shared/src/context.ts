/**
 * Validation Run Context
 *
 * Every upload, batch job and validation run carries a correlation ID; a run
 * adds its own run ID and the document it is checking. The logger and the
 * telemetry sinks read these from AsyncLocalStorage instead of taking them
 * as arguments.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export interface RequestContext {
  /** Shared by every run started from one upload or batch request */
  correlationId: string;
  runId?: string;
  documentId?: string;
}

const runContext = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return runContext.getStore();
}

/**
 * Correlation ID of the current request, or a fresh one outside any request
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

export function runWithContext<T>(context: RequestContext, fn: () => T): T {
  return runContext.run(context, fn);
}

export async function runWithContextAsync<T>(context: RequestContext, fn: () => Promise<T>): Promise<T> {
  return runContext.run(context, fn);
}

/**
 * Scope a validation run inside the request that started it: the correlation
 * ID is inherited, run and document IDs are replaced.
 */
export async function withChildContext<T>(
  overrides: Partial<RequestContext>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return runContext.run({ correlationId: parent?.correlationId || ulid(), ...parent, ...overrides }, fn);
}
