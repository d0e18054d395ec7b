/**
 * Backend Errors
 *
 * Thrown by database and object-store adapters. Services catch these
 * and translate them into Result failure codes; nothing here reaches
 * an HTTP response directly.
 */

/**
 * Base class for failures raised by an external backend
 */
export class BackendError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(`${operation}: ${message}`, options);
    this.name = 'BackendError';
    this.operation = operation;
  }
}

/**
 * The backend did not answer within the configured bound
 */
export class TimeoutError extends BackendError {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(operation, `timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A row with the same primary key already exists
 */
export class DuplicateIdError extends BackendError {
  constructor(operation: string, id: string) {
    super(operation, `duplicate id ${id}`);
    this.name = 'DuplicateIdError';
  }
}

/**
 * The referenced user row does not exist
 */
export class UserNotFoundError extends BackendError {
  constructor(operation: string, userId: string) {
    super(operation, `user ${userId} not found`);
    this.name = 'UserNotFoundError';
  }
}

/**
 * The object store refused to overwrite an existing key
 */
export class ObjectExistsError extends BackendError {
  constructor(operation: string, path: string) {
    super(operation, `object already exists at ${path}`);
    this.name = 'ObjectExistsError';
  }
}

/**
 * Short, log-safe description of an unknown thrown value
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
