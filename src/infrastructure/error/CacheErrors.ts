/**
 * Cache error taxonomy
 * Every error surfaced by the cache, the pool and the lock extends CacheError
 */

export type CacheErrorCode =
  | 'cache/key_already_exists'
  | 'cache/key_not_found'
  | 'cache/argument_out_of_range'
  | 'cache/object_disposed'
  | 'cache/operation_canceled'
  | 'cache/invalid_operation'
  | 'cache/expiration_handling_failed'
  | 'cache/observer_failed';

export interface CacheErrorOptions {
  code: CacheErrorCode;
  /** Whether retrying the same call may succeed */
  retryable?: boolean;
  cause?: unknown;
}

export class CacheError extends Error {
  readonly code: CacheErrorCode;
  readonly retryable: boolean;

  constructor(message: string, options: CacheErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

export class KeyAlreadyExistsError<K = unknown> extends CacheError {
  constructor(readonly key: K) {
    super(`An element with the key '${String(key)}' already exists`, {
      code: 'cache/key_already_exists',
    });
  }
}

export class KeyNotFoundError<K = unknown> extends CacheError {
  constructor(readonly key: K) {
    super(`The key '${String(key)}' was not present in the cache`, {
      code: 'cache/key_not_found',
    });
  }
}

export class ArgumentOutOfRangeError extends CacheError {
  constructor(
    readonly paramName: string,
    message: string
  ) {
    super(`${message} (parameter '${paramName}')`, { code: 'cache/argument_out_of_range' });
  }
}

export class ObjectDisposedError extends CacheError {
  constructor(readonly objectName: string) {
    super(`Cannot access a disposed ${objectName}`, { code: 'cache/object_disposed' });
  }
}

export class OperationCanceledError extends CacheError {
  constructor(reason?: unknown) {
    super('The operation was canceled', {
      code: 'cache/operation_canceled',
      retryable: true,
      cause: reason,
    });
  }
}

export class InvalidOperationError extends CacheError {
  constructor(message: string) {
    super(message, { code: 'cache/invalid_operation' });
  }
}

/**
 * Raised on the change stream when refreshing or evicting expired elements fails
 */
export class ExpirationHandlingError<K = unknown> extends CacheError {
  constructor(
    readonly keys: readonly K[],
    cause: unknown
  ) {
    super(`Failed to handle expiration of ${keys.length} element(s)`, {
      code: 'cache/expiration_handling_failed',
      retryable: true,
      cause,
    });
  }
}

export function isCacheError(error: unknown): error is CacheError {
  return error instanceof CacheError;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
