/**
 * Cache Error Factory
 * Wraps, logs and reports errors raised by background work
 */

import type { Logger } from '../logging/Logger';
import { CacheError, type CacheErrorCode, ExpirationHandlingError, toError } from './CacheErrors';

export interface CacheErrorContext {
  operation: string;
  key?: unknown;
  message: string;
  code: CacheErrorCode;
  retryable?: boolean;
}

export class CacheErrorFactory {
  constructor(
    private readonly logger: Logger,
    private readonly onError?: (error: Error) => void
  ) {}

  /**
   * Wrap an existing error with cache-specific context and report it.
   * Errors that already belong to the taxonomy are passed through.
   */
  wrapError(cause: unknown, context: CacheErrorContext): CacheError {
    const error =
      cause instanceof CacheError
        ? cause
        : new CacheError(context.message, {
            code: context.code,
            retryable: context.retryable ?? false,
            cause,
          });
    this.logger.error(
      {
        err: error,
        code: error.code,
        ...(context.key === undefined ? {} : { key: String(context.key) }),
      },
      `${context.operation} failed`
    );
    this.onError?.(error);
    return error;
  }

  /**
   * An updater failed while refreshing expired elements
   */
  expirationHandlingFailed<K>(keys: readonly K[], cause: unknown): ExpirationHandlingError<K> {
    const error = new ExpirationHandlingError(keys, cause);
    this.logger.error(
      { err: toError(cause), keys: keys.map((key) => String(key)), code: error.code },
      'expiration handling failed'
    );
    this.onError?.(error);
    return error;
  }

  /**
   * A subscriber threw while being notified
   */
  observerFailed(stream: string, cause: unknown): CacheError {
    return this.wrapError(cause, {
      operation: `${stream} notification`,
      code: 'cache/observer_failed',
      message: `An observer of '${stream}' threw while being notified`,
    });
  }
}
