/**
 * Timeout enforcement for backend calls.
 *
 * The wrapped promise is not cancelled when the bound expires; its
 * eventual outcome is ignored. Callers that mutate state must treat a
 * timeout as "outcome unknown" and compensate accordingly.
 */

import { TimeoutError } from './errors.js';

/**
 * Options for timeout enforcement
 */
export interface TimeoutOptions {
  /** Timeout duration in milliseconds */
  timeoutMs: number;
  /** Operation name for error context */
  operation: string;
}

/**
 * Resolve with the operation's value, or reject with TimeoutError once
 * `timeoutMs` has elapsed.
 */
export async function withTimeout<T>(
  operation: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(options.operation, options.timeoutMs));
    }, options.timeoutMs);
  });

  try {
    return await Promise.race([operation, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bind a fixed timeout so call sites read `guard('catalog.insert', db.insert(...))`
 */
export function createTimeoutGuard(timeoutMs: number) {
  return function guard<T>(operation: string, promise: Promise<T>): Promise<T> {
    return withTimeout(promise, { timeoutMs, operation });
  };
}

export type TimeoutGuard = ReturnType<typeof createTimeoutGuard>;

/**
 * Wait up to `graceMs` for a promise that already timed out to settle,
 * whichever way it settles
 */
export async function settleWithin(
  operation: Promise<unknown>,
  graceMs: number
): Promise<'settled' | 'pending'> {
  let timer: NodeJS.Timeout | undefined;

  const expiry = new Promise<'pending'>((resolve) => {
    timer = setTimeout(() => resolve('pending'), graceMs);
  });
  const settled = operation.then(
    () => 'settled' as const,
    () => 'settled' as const
  );

  try {
    return await Promise.race([settled, expiry]);
  } finally {
    clearTimeout(timer);
  }
}
