import { OperationCanceledError } from '../../infrastructure/error/CacheErrors';

export interface CancellationOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Checkpoint: throws when the signal has already fired
 */
export function throwIfCanceled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCanceledError(signal.reason);
  }
}

/**
 * Signal that fires when any of the given ones fires
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const defined = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (defined.length === 1 && defined[0]) {
    return defined[0];
  }
  return AbortSignal.any(defined);
}
