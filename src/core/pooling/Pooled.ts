import {
  ArgumentOutOfRangeError,
  InvalidOperationError,
  ObjectDisposedError,
} from '../../infrastructure/error/CacheErrors';
import type { Pool } from './Pool';

export enum PooledState {
  Acquired = 'Acquired',
  ReleasedBackToPool = 'ReleasedBackToPool',
  DetachedFromPool = 'DetachedFromPool',
}

/**
 * Ticket for an instance checked out of a {@link Pool}.
 *
 * A ticket is either released back or detached, exactly once. After that
 * its value can no longer be read.
 */
export class Pooled<T> {
  private state: PooledState = PooledState.Acquired;
  private disposed = false;

  constructor(
    readonly owningPool: Pool<T>,
    private readonly pooledValue: T
  ) {}

  get value(): T {
    if (this.disposed) {
      throw new ObjectDisposedError('Pooled');
    }
    if (this.state !== PooledState.Acquired) {
      throw new InvalidOperationError(
        `The pooled value is no longer accessible once ${
          this.state === PooledState.ReleasedBackToPool ? 'released back to' : 'detached from'
        } its pool`
      );
    }
    return this.pooledValue;
  }

  get hasBeenReleasedBackToPool(): boolean {
    return this.state === PooledState.ReleasedBackToPool;
  }

  get hasBeenDetachedFromPool(): boolean {
    return this.state === PooledState.DetachedFromPool;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  releaseBackToPool(): void {
    this.owningPool.releasePooledValue(this);
  }

  detachFromPool(): T {
    return this.owningPool.detachPooledValue(this);
  }

  /**
   * Moves the ticket into a terminal state and hands out the value.
   * @internal called by the owning pool only
   */
  complete(terminal: Exclude<PooledState, PooledState.Acquired>): T {
    if (this.state !== PooledState.Acquired) {
      throw new ArgumentOutOfRangeError(
        'pooled',
        `The pooled value has already been ${
          this.state === PooledState.ReleasedBackToPool ? 'released back to' : 'detached from'
        } its pool`
      );
    }
    this.state = terminal;
    return this.pooledValue;
  }

  /**
   * Returns the value to the pool while it is still acquired. When the pool
   * is gone already, the value is disposed instead.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    if (this.state !== PooledState.Acquired) return;

    if (this.owningPool.isDisposed) {
      await disposeValue(this.owningPool.detachPooledValue(this));
      return;
    }

    this.owningPool.releasePooledValue(this);
  }
}

interface DisposableValue {
  dispose(): unknown;
}

export function isDisposable(value: unknown): value is DisposableValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'dispose' in value &&
    typeof value.dispose === 'function'
  );
}

export async function disposeValue(value: unknown): Promise<void> {
  if (isDisposable(value)) {
    await value.dispose();
  }
}
