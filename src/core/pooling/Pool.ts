/**
 * Generic object pool
 * Hands out instances as one-shot tickets and grows or shrinks on demand
 */

import {
  ArgumentOutOfRangeError,
  ObjectDisposedError,
  OperationCanceledError,
  toError,
} from '../../infrastructure/error/CacheErrors';
import { getLogger } from '../../infrastructure/logging/Logger';
import type { DisposalState } from '../../types';
import { type CancellationOptions, linkSignals, throwIfCanceled } from '../execution/CancellationHelper';
import { disposeValue, Pooled, PooledState } from './Pooled';

export enum PooledValueAcquisitionMode {
  /** Resolve with `undefined` when no idle instance exists */
  AvailableInstanceOrDefaultValue = 'AvailableInstanceOrDefaultValue',
  /** Wait until an instance is released or added */
  AvailableInstanceOrWaitForNextOne = 'AvailableInstanceOrWaitForNextOne',
  /** Build a new instance when no idle instance exists */
  AvailableInstanceOrCreateNewOne = 'AvailableInstanceOrCreateNewOne',
}

export type InstanceBuilder<T> = (signal: AbortSignal) => T | Promise<T>;

/**
 * Pool configuration
 */
export type PoolConfig = {
  /** How long a waiting acquisition may wait before it fails, in milliseconds */
  acquireTimeoutMs?: number;
};

export type PoolStats = {
  totalInstances: number;
  availableInstances: number;
  inUseInstances: number;
  waitingRequests: number;
};

export interface AcquireOptions extends CancellationOptions {
  /** Overrides `PoolConfig.acquireTimeoutMs` for this call */
  timeoutMs?: number;
}

type PoolWaiter<T> = {
  resolve: (pooled: Pooled<T>) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
};

export class Pool<T> {
  private readonly pooledInstances: T[] = [];
  private readonly waitQueue: PoolWaiter<T>[] = [];
  private readonly lifetime = new AbortController();
  private totalInstances = 0;
  private state: DisposalState = 'active';
  private disposal: Promise<void> | undefined;

  private readonly logger = getLogger().child({ component: 'pool' });

  constructor(
    private readonly instanceBuilder: InstanceBuilder<T>,
    initialInstances: Iterable<T> = [],
    private readonly config: PoolConfig = {}
  ) {
    if (config.acquireTimeoutMs !== undefined && !(config.acquireTimeoutMs >= 0)) {
      throw new ArgumentOutOfRangeError('acquireTimeoutMs', 'Must be zero or greater');
    }

    for (const instance of initialInstances) {
      this.pooledInstances.push(instance);
      this.totalInstances++;
    }
  }

  /**
   * Create a pool pre-filled with `initialPoolSize` instances from the builder
   */
  static async create<T>(
    instanceBuilder: InstanceBuilder<T>,
    initialPoolSize: number,
    config?: PoolConfig,
    options: CancellationOptions = {}
  ): Promise<Pool<T>> {
    if (!Number.isInteger(initialPoolSize) || initialPoolSize < 0) {
      throw new ArgumentOutOfRangeError('initialPoolSize', 'Must be a non-negative integer');
    }

    const pool = new Pool(instanceBuilder, [], config);
    await pool.increasePoolSize(initialPoolSize, options);
    return pool;
  }

  /** Idle and acquired instances the pool still tracks */
  get totalInstancesCount(): number {
    return this.totalInstances;
  }

  get availableInstancesCount(): number {
    return this.pooledInstances.length;
  }

  get isDisposed(): boolean {
    return this.state !== 'active';
  }

  /**
   * Build `numberOfInstances` new instances and add them to the pool
   */
  async increasePoolSize(numberOfInstances = 1, options: CancellationOptions = {}): Promise<void> {
    this.throwIfDisposed();
    if (!Number.isInteger(numberOfInstances) || numberOfInstances < 0) {
      throw new ArgumentOutOfRangeError('numberOfInstances', 'Must be a non-negative integer');
    }

    for (let i = 0; i < numberOfInstances; i++) {
      throwIfCanceled(options.signal);
      const instance = await this.buildInstance(options.signal);
      await this.discardIfDisposed(instance);
      this.totalInstances++;
      this.enqueue(instance);
    }

    this.logger.debug({ added: numberOfInstances, total: this.totalInstances }, 'pool size increased');
  }

  /**
   * Remove idle instances from the pool, disposing them where possible.
   * Acquired instances are never affected.
   */
  async decreaseAvailablePoolSize(numberOfInstances = 1, options: CancellationOptions = {}): Promise<void> {
    this.throwIfDisposed();
    if (!Number.isInteger(numberOfInstances) || numberOfInstances < 0) {
      throw new ArgumentOutOfRangeError('numberOfInstances', 'Must be a non-negative integer');
    }
    if (numberOfInstances > this.pooledInstances.length) {
      throw new ArgumentOutOfRangeError(
        'numberOfInstances',
        `Cannot remove ${numberOfInstances} instance(s), only ${this.pooledInstances.length} available`
      );
    }

    for (let i = 0; i < numberOfInstances; i++) {
      throwIfCanceled(options.signal);
      for (const instance of this.pooledInstances.splice(0, 1)) {
        this.totalInstances--;
        await disposeValue(instance);
      }
    }

    this.logger.debug({ removed: numberOfInstances, total: this.totalInstances }, 'pool size decreased');
  }

  acquirePooledValue(
    mode?: PooledValueAcquisitionMode.AvailableInstanceOrDefaultValue,
    options?: AcquireOptions
  ): Promise<Pooled<T> | undefined>;
  acquirePooledValue(
    mode:
      | PooledValueAcquisitionMode.AvailableInstanceOrWaitForNextOne
      | PooledValueAcquisitionMode.AvailableInstanceOrCreateNewOne,
    options?: AcquireOptions
  ): Promise<Pooled<T>>;
  acquirePooledValue(mode?: PooledValueAcquisitionMode, options?: AcquireOptions): Promise<Pooled<T> | undefined>;
  async acquirePooledValue(
    mode: PooledValueAcquisitionMode = PooledValueAcquisitionMode.AvailableInstanceOrDefaultValue,
    options: AcquireOptions = {}
  ): Promise<Pooled<T> | undefined> {
    this.throwIfDisposed();
    throwIfCanceled(options.signal);

    for (const instance of this.pooledInstances.splice(0, 1)) {
      return new Pooled(this, instance);
    }

    switch (mode) {
      case PooledValueAcquisitionMode.AvailableInstanceOrDefaultValue:
        return undefined;
      case PooledValueAcquisitionMode.AvailableInstanceOrCreateNewOne: {
        const instance = await this.buildInstance(options.signal);
        await this.discardIfDisposed(instance);
        this.totalInstances++;
        return new Pooled(this, instance);
      }
      case PooledValueAcquisitionMode.AvailableInstanceOrWaitForNextOne:
        return this.waitForInstance(options);
    }
  }

  /**
   * Return an acquired value. Valid once per ticket and only on its owning pool.
   */
  releasePooledValue(pooled: Pooled<T>): void {
    this.assertOwnership(pooled);
    if (this.isDisposed) {
      throw new ObjectDisposedError('Pool');
    }

    const instance = pooled.complete(PooledState.ReleasedBackToPool);
    this.enqueue(instance);
  }

  /**
   * Take an acquired value out of the pool for good. Valid once per ticket
   * and only on its owning pool.
   */
  detachPooledValue(pooled: Pooled<T>): T {
    this.assertOwnership(pooled);
    const instance = pooled.complete(PooledState.DetachedFromPool);
    this.totalInstances--;
    return instance;
  }

  getStats(): PoolStats {
    return {
      totalInstances: this.totalInstances,
      availableInstances: this.pooledInstances.length,
      inUseInstances: this.totalInstances - this.pooledInstances.length,
      waitingRequests: this.waitQueue.length,
    };
  }

  /**
   * Dispose all idle instances and reject pending acquisitions.
   * Instances currently acquired are left to their ticket holders.
   */
  dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.drain();
    }
    return this.disposal;
  }

  private async drain(): Promise<void> {
    this.state = 'disposing';
    this.lifetime.abort(new ObjectDisposedError('Pool'));

    for (const waiter of this.waitQueue.splice(0)) {
      waiter.cleanup();
      waiter.reject(new ObjectDisposedError('Pool'));
    }

    const idle = this.pooledInstances.splice(0);
    this.totalInstances -= idle.length;
    const results = await Promise.allSettled(idle.map((instance) => disposeValue(instance)));
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error({ err: toError(result.reason) }, 'failed to dispose pooled instance');
      }
    }

    this.state = 'disposed';
  }

  private enqueue(instance: T): void {
    const waiter = this.waitQueue.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(new Pooled(this, instance));
      return;
    }
    this.pooledInstances.push(instance);
  }

  private async buildInstance(signal: AbortSignal | undefined): Promise<T> {
    return await this.instanceBuilder(linkSignals(this.lifetime.signal, signal));
  }

  /**
   * Instances finishing their build after disposal started are never pooled
   */
  private async discardIfDisposed(instance: T): Promise<void> {
    if (!this.isDisposed) return;
    await disposeValue(instance);
    throw new ObjectDisposedError('Pool');
  }

  private waitForInstance(options: AcquireOptions): Promise<Pooled<T>> {
    const timeoutMs = options.timeoutMs ?? this.config.acquireTimeoutMs;
    const { signal } = options;

    return new Promise<Pooled<T>>((resolve, reject) => {
      let timeout: NodeJS.Timeout | undefined;

      const remove = (): void => {
        const index = this.waitQueue.indexOf(waiter);
        if (index >= 0) {
          this.waitQueue.splice(index, 1);
        }
      };
      const onAbort = (): void => {
        remove();
        cleanup();
        reject(new OperationCanceledError(signal?.reason));
      };
      const cleanup = (): void => {
        if (timeout) clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
      };
      const waiter: PoolWaiter<T> = { resolve, reject, cleanup };

      if (timeoutMs !== undefined) {
        timeout = setTimeout(() => {
          remove();
          cleanup();
          reject(new OperationCanceledError(new Error(`Failed to acquire a pooled value within ${timeoutMs}ms`)));
        }, timeoutMs);
        timeout.unref();
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.waitQueue.push(waiter);
    });
  }

  private assertOwnership(pooled: Pooled<T>): void {
    if (pooled.owningPool !== this) {
      throw new ArgumentOutOfRangeError('pooled', 'The pooled value does not belong to this pool');
    }
  }

  private throwIfDisposed(): void {
    if (this.isDisposed) {
      throw new ObjectDisposedError('Pool');
    }
  }
}
