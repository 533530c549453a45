/**
 * Observable In-Memory Cache
 *
 * Keyed cache with per-element expiration and a live change stream.
 * Reads share the reader lane of an async reader/writer lock; mutations and
 * the handling of expired elements are serialized on its writer lane.
 * Change records of a mutation are delivered before the mutation resolves.
 */

import { resolveObservableCacheConfig, type ResolvedObservableCacheConfig } from './config';
import { ChangeStream, type Subscribable, type Subscription } from './core/events/ChangeStream';
import { linkSignals, throwIfCanceled } from './core/execution/CancellationHelper';
import type { ExecutionContext } from './core/execution/ExecutionContext';
import { ExpirationScheduler } from './core/expiration/ExpirationScheduler';
import { CacheStatsManager } from './core/services/CacheStatsManager';
import { type DictionaryChange, DictionaryChangeType, ObservableDictionary } from './core/store/ObservableDictionary';
import { AsyncReaderWriterLock } from './core/threading/AsyncReaderWriterLock';
import { CacheErrorFactory } from './infrastructure/error/CacheErrorFactory';
import {
  ArgumentOutOfRangeError,
  KeyNotFoundError,
  ObjectDisposedError,
} from './infrastructure/error/CacheErrors';
import type { Logger } from './infrastructure/logging/Logger';
import { type CacheSpanTags, CacheTracingManager } from './infrastructure/tracing/CacheTracingManager';
import { type ObservableCacheChange, ObservableCacheChanges } from './ObservableCacheChange';
import { ObservableCachedElement } from './ObservableCachedElement';
import {
  type AddOptions,
  type CacheOperationOptions,
  type CacheStats,
  type DisposalState,
  type ExpirationOptions,
  type IObservableCache,
  ObservableCacheExpirationType,
  type ObservableCacheConfig,
  type ValueProducer,
} from './types';

type PendingNotification<K, V> =
  | { kind: 'change'; change: ObservableCacheChange<K, V> }
  | { kind: 'error'; error: Error };

/**
 * Handle returned by {@link ObservableInMemoryCache.suppressChangeNotifications}
 */
export interface ChangeNotificationsResumption {
  /** Resumes notifications, emitting a Reset if requested */
  dispose(): Promise<void>;
}

export class ObservableInMemoryCache<K, V> implements IObservableCache<K, V> {
  private readonly config: ResolvedObservableCacheConfig<K, V>;
  private readonly store: ObservableDictionary<K, ObservableCachedElement<K, V>>;
  private readonly lock = new AsyncReaderWriterLock();
  private readonly scheduler: ExpirationScheduler<K, V>;
  private readonly changeStream: ChangeStream<ObservableCacheChange<K, V>>;
  private readonly countStream: ChangeStream<number>;
  private readonly statsManager: CacheStatsManager;
  private readonly tracing: CacheTracingManager;
  private readonly errorFactory: CacheErrorFactory;
  private readonly logger: Logger;
  private readonly storeSubscriptions: Subscription[];

  private pending: PendingNotification<K, V>[] = [];
  private pendingCount: number | undefined;
  private publishedCount = 0;
  private state: DisposalState = 'active';
  private disposal: Promise<void> | undefined;

  constructor(config: ObservableCacheConfig<K, V> = {}) {
    this.config = resolveObservableCacheConfig(config);
    this.logger = this.config.logger.child({ component: 'observable-cache' });
    this.errorFactory = new CacheErrorFactory(this.logger, this.config.instrumentation?.onError);
    this.statsManager = new CacheStatsManager(this.config.instrumentation);
    this.tracing = new CacheTracingManager(this.config.tracing);

    this.store = new ObservableDictionary({
      thresholdAmountWhenChangesAreNotifiedAsReset: this.config.thresholdAmountWhenChangesAreNotifiedAsReset,
      onMutation: (change) => this.trackExpiration(change),
    });
    this.changeStream = new ChangeStream('cache-changes', {
      onObserverError: (error) => this.errorFactory.observerFailed('cache-changes', error),
    });
    this.countStream = new ChangeStream('cache-count', {
      current: () => this.publishedCount,
      onObserverError: (error) => this.errorFactory.observerFailed('cache-count', error),
    });
    this.scheduler = new ExpirationScheduler((elements) => this.handleExpiredElements(elements), {
      expiredElementsBufferMs: this.config.expiredElementsBufferMs,
      logger: this.logger,
    });

    this.storeSubscriptions = [
      this.store.changes.subscribe((change) => this.enqueueChange(change)),
      this.store.countChanges.subscribe((count) => {
        this.pendingCount = count;
      }),
    ];
  }

  /** Live change records; late subscribers see no history */
  get changes(): Subscribable<ObservableCacheChange<K, V>> {
    return this.changeStream;
  }

  /** The current count on subscription, then every distinct change */
  get countChanges(): Subscribable<number> {
    return this.countStream;
  }

  get count(): number {
    this.throwIfDisposed();
    return this.store.count;
  }

  get isDisposed(): boolean {
    return this.state !== 'active';
  }

  // Mutations

  add(key: K, value: V, options: AddOptions = {}): Promise<void> {
    return this.write('add', options, () => {
      this.store.add(key, this.createElement(key, value, options));
    }, { key });
  }

  /**
   * Adds entries in iteration order. The first duplicate key fails the call;
   * entries added before it stay in the cache.
   */
  addRange(entries: Iterable<readonly [K, V]>, options: AddOptions = {}): Promise<void> {
    return this.write('add_range', options, (signal) => {
      const elements = Array.from(entries, ([key, value]): [K, ObservableCachedElement<K, V>] => [
        key,
        this.createElement(key, value, options),
      ]);
      this.store.addRange(elements, signal);
    });
  }

  addOrUpdate(key: K, value: V, options: AddOptions = {}): Promise<void> {
    return this.write('add_or_update', options, () => {
      this.store.set(key, this.createElement(key, value, options));
    }, { key });
  }

  /**
   * Replaces the value of a present key. Expiry and expiration type are kept,
   * the expiry counting from now.
   */
  update(key: K, value: V, options: CacheOperationOptions = {}): Promise<void> {
    return this.write('update', options, () => {
      const current = this.store.get(key);
      this.store.replace(key, current.withValue(value));
    }, { key });
  }

  updateExpiration(
    key: K,
    expiry: number,
    expirationType: ObservableCacheExpirationType,
    options: CacheOperationOptions = {}
  ): Promise<void> {
    return this.write('update_expiration', options, () => {
      const current = this.store.get(key);
      this.store.replace(key, this.createElement(key, current.value, { expiry, expirationType }));
    }, { key });
  }

  remove(key: K, options: CacheOperationOptions = {}): Promise<void> {
    return this.write('remove', options, () => {
      this.store.remove(key);
    }, { key });
  }

  /**
   * Removes keys in iteration order. The first missing key fails the call;
   * keys removed before it stay removed.
   */
  removeRange(keys: Iterable<K>, options: CacheOperationOptions = {}): Promise<void> {
    return this.write('remove_range', options, (signal) => {
      this.store.removeRange(keys, signal);
    });
  }

  /**
   * Removes everything, notified as a single Reset
   */
  clear(options: CacheOperationOptions = {}): Promise<void> {
    return this.write('clear', options, () => {
      this.store.clear();
    });
  }

  getOrAdd(key: K, producer: ValueProducer<K, V>, options: AddOptions = {}): Promise<V> {
    return this.write('get_or_add', options, async (signal) => {
      const existing = this.store.tryGet(key);
      if (existing) {
        this.recordHit('get_or_add');
        return existing.value;
      }

      this.recordMiss('get_or_add');
      const value = await producer(key, signal);
      throwIfCanceled(signal);
      this.store.add(key, this.createElement(key, value, options));
      return value;
    }, { key });
  }

  tryAdd(key: K, value: V, options: AddOptions = {}): Promise<boolean> {
    return this.write('try_add', options, () => this.store.tryAdd(key, this.createElement(key, value, options)), {
      key,
    });
  }

  tryRemove(key: K, options: CacheOperationOptions = {}): Promise<boolean> {
    return this.write('try_remove', options, () => this.store.tryRemove(key), { key });
  }

  tryUpdate(key: K, value: V, options: CacheOperationOptions = {}): Promise<boolean> {
    return this.write('try_update', options, () => {
      const current = this.store.tryGet(key);
      if (!current) return false;
      this.store.replace(key, current.withValue(value));
      return true;
    }, { key });
  }

  // Reads

  get(key: K, options: CacheOperationOptions = {}): Promise<V> {
    return this.read('get', options, () => this.lookup(key, 'get').value, { key });
  }

  getMany(keys: Iterable<K>, options: CacheOperationOptions = {}): Promise<V[]> {
    return this.read('get_many', options, (signal) => {
      const values: V[] = [];
      for (const key of keys) {
        throwIfCanceled(signal);
        values.push(this.lookup(key, 'get_many').value);
      }
      return values;
    });
  }

  contains(key: K, options: CacheOperationOptions = {}): Promise<boolean> {
    return this.read('contains', options, () => this.store.has(key), { key });
  }

  containsAll(keys: Iterable<K>, options: CacheOperationOptions = {}): Promise<boolean> {
    return this.read('contains_all', options, () => {
      for (const key of keys) {
        if (!this.store.has(key)) return false;
      }
      return true;
    });
  }

  containsWhich(keys: Iterable<K>, options: CacheOperationOptions = {}): Promise<K[]> {
    return this.read('contains_which', options, () => Array.from(keys).filter((key) => this.store.has(key)));
  }

  expiresAt(key: K, options: CacheOperationOptions = {}): Promise<number> {
    return this.read('expires_at', options, () => this.store.get(key).expiresAt, { key });
  }

  expiresIn(key: K, options: CacheOperationOptions = {}): Promise<number> {
    return this.read('expires_in', options, () => this.store.get(key).expiresIn(), { key });
  }

  // Notifications & lifecycle

  /**
   * Stops change records until the returned handle is disposed. Mutations
   * made meanwhile are not reported individually; a Reset is emitted on
   * resumption when `signalResetWhenFinished` is set.
   */
  suppressChangeNotifications(signalResetWhenFinished = true): ChangeNotificationsResumption {
    this.throwIfDisposed();
    const suppression = this.store.suppressChangeNotifications(signalResetWhenFinished);

    let resumption: Promise<void> | undefined;
    return {
      dispose: () => {
        if (!resumption) {
          resumption = this.isDisposed
            ? Promise.resolve(suppression.dispose())
            : this.write('resume_change_notifications', {}, () => suppression.dispose());
        }
        return resumption;
      },
    };
  }

  getStats(): Readonly<CacheStats> {
    this.statsManager.updateItemCount(this.store.count);
    return this.statsManager.getStats();
  }

  /**
   * Lets queued operations finish, then stops expiration handling and
   * completes both streams. Repeated calls share the same completion.
   */
  dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.shutdown();
    }
    return this.disposal;
  }

  private async shutdown(): Promise<void> {
    this.transitionTo('disposing');
    this.scheduler.dispose();
    await this.lock.dispose();
    await this.scheduler.whenIdle();

    for (const subscription of this.storeSubscriptions) {
      subscription.unsubscribe();
    }
    this.store.dispose();
    this.changeStream.complete();
    this.countStream.complete();
    this.transitionTo('disposed');
  }

  // Expiration

  private trackExpiration(change: DictionaryChange<K, ObservableCachedElement<K, V>>): void {
    switch (change.type) {
      case DictionaryChangeType.ItemAdded:
      case DictionaryChangeType.ItemReplaced:
        this.scheduler.schedule(change.value);
        break;
      case DictionaryChangeType.ItemRemoved:
        this.scheduler.unschedule(change.key);
        break;
      case DictionaryChangeType.Reset:
        this.scheduler.reconcile(this.store.values());
        break;
    }
  }

  private async handleExpiredElements(elements: ObservableCachedElement<K, V>[]): Promise<void> {
    if (this.isDisposed) return;

    await this.write('expire', {}, async (signal) => {
      // elements replaced or removed since their timer fired are skipped
      const due = elements.filter((element) => this.store.tryGet(element.key) === element);
      if (due.length === 0) return;

      this.statsManager.recordExpirations(due.length);
      for (const element of due) {
        // held back like every other change record; the resumption Reset covers it
        if (this.store.isNotifying) {
          this.pending.push({ kind: 'change', change: ObservableCacheChanges.itemExpired(element) });
        }
        this.tracing.recordExpirations(element.expirationType, 1);
      }

      const toUpdate: ObservableCachedElement<K, V>[] = [];
      for (const element of due) {
        if (element.expirationType === ObservableCacheExpirationType.Remove) {
          this.store.remove(element.key);
          this.statsManager.recordEvictions();
        } else if (element.expirationType === ObservableCacheExpirationType.Update) {
          toUpdate.push(element);
        }
      }

      if (toUpdate.length > 0) {
        await this.refresh(toUpdate, signal);
      }
    });
  }

  private async refresh(elements: ObservableCachedElement<K, V>[], signal: AbortSignal): Promise<void> {
    const { singleKeyUpdater, multipleKeysUpdater } = this.config;

    if (multipleKeysUpdater && (elements.length > 1 || !singleKeyUpdater)) {
      const keys = elements.map((element) => element.key);
      let updates: Map<K, V | undefined>;
      try {
        updates = new Map(await multipleKeysUpdater(keys, signal));
      } catch (error) {
        this.reportExpirationFailure(keys, error);
        return;
      }
      for (const element of elements) {
        this.applyRefresh(element, updates.get(element.key));
      }
      return;
    }

    if (!singleKeyUpdater) return;

    for (const element of elements) {
      let value: V | undefined;
      try {
        value = await singleKeyUpdater(element.key, signal);
      } catch (error) {
        this.reportExpirationFailure([element.key], error);
        continue;
      }
      this.applyRefresh(element, value);
    }
  }

  private applyRefresh(element: ObservableCachedElement<K, V>, value: V | undefined): void {
    if (value === undefined) {
      this.store.remove(element.key);
      this.statsManager.recordEvictions();
      return;
    }
    this.store.replace(element.key, element.withValue(value));
    this.statsManager.recordRefreshes();
  }

  private reportExpirationFailure(keys: K[], cause: unknown): void {
    const error = this.errorFactory.expirationHandlingFailed(keys, cause);
    this.pending.push({ kind: 'error', error });
  }

  // Plumbing

  private write<T>(
    operation: string,
    options: CacheOperationOptions,
    work: (signal: AbortSignal) => T | Promise<T>,
    tags?: Partial<CacheSpanTags>
  ): Promise<T> {
    return this.execute(operation, options, true, work, tags);
  }

  private read<T>(
    operation: string,
    options: CacheOperationOptions,
    work: (signal: AbortSignal) => T | Promise<T>,
    tags?: Partial<CacheSpanTags>
  ): Promise<T> {
    return this.execute(operation, options, false, work, tags);
  }

  private async execute<T>(
    operation: string,
    options: CacheOperationOptions,
    exclusive: boolean,
    work: (signal: AbortSignal) => T | Promise<T>,
    tags?: Partial<CacheSpanTags>
  ): Promise<T> {
    this.throwIfDisposed();
    throwIfCanceled(options.signal);

    const context = options.executionContext ?? this.config.executionContext;
    const signal = linkSignals(options.signal);
    const startTime = Date.now();
    let success = false;

    try {
      const result = await this.tracing.traceOperation(
        operation,
        async () => {
          const ticket = exclusive
            ? await this.lock.acquireWriterLock({ signal: options.signal })
            : await this.lock.acquireReaderLock({ signal: options.signal });
          try {
            throwIfCanceled(options.signal);
            if (!exclusive) {
              return await context.schedule(() => work(signal));
            }
            try {
              return await context.schedule(() => work(signal));
            } finally {
              await this.publishPending(context);
            }
          } finally {
            ticket.release();
          }
        },
        { operation, ...tags }
      );
      success = true;
      return result;
    } finally {
      this.config.instrumentation?.onCommand?.(operation, Date.now() - startTime, success);
      if (exclusive && success) {
        this.statsManager.updateItemCount(this.store.count);
        this.statsManager.updateAndNotify();
      }
    }
  }

  private enqueueChange(change: DictionaryChange<K, ObservableCachedElement<K, V>>): void {
    this.pending.push({ kind: 'change', change: this.toCacheChange(change) });
  }

  private toCacheChange(change: DictionaryChange<K, ObservableCachedElement<K, V>>): ObservableCacheChange<K, V> {
    switch (change.type) {
      case DictionaryChangeType.ItemAdded:
        return ObservableCacheChanges.itemAdded(change.value);
      case DictionaryChangeType.ItemReplaced:
        return ObservableCacheChanges.itemValueReplaced(change.value, change.oldValue);
      case DictionaryChangeType.ItemRemoved:
        return ObservableCacheChanges.itemRemoved(change.value);
      case DictionaryChangeType.Reset:
        return ObservableCacheChanges.reset();
    }
  }

  /**
   * Delivers everything the current writer produced, in order, on the
   * operation's execution context
   */
  private async publishPending(context: ExecutionContext): Promise<void> {
    const notifications = this.pending;
    this.pending = [];
    const count = this.pendingCount;
    this.pendingCount = undefined;
    const countChanged = count !== undefined && count !== this.publishedCount;

    if (notifications.length === 0 && !countChanged) return;

    await context.schedule(() => {
      for (const notification of notifications) {
        if (notification.kind === 'change') {
          this.changeStream.next(notification.change);
        } else if (!this.changeStream.error(notification.error)) {
          this.logger.warn({ err: notification.error }, 'no change observer handles errors');
        }
      }
      if (countChanged) {
        this.publishedCount = count;
        this.countStream.next(count);
      }
    });
  }

  private createElement(key: K, value: V, options: ExpirationOptions): ObservableCachedElement<K, V> {
    const expirationType = options.expirationType ?? this.config.defaultExpirationType;
    if (
      expirationType === ObservableCacheExpirationType.Update &&
      !this.config.singleKeyUpdater &&
      !this.config.multipleKeysUpdater
    ) {
      throw new ArgumentOutOfRangeError(
        'expirationType',
        'Update expiration requires a singleKeyUpdater or multipleKeysUpdater'
      );
    }
    return new ObservableCachedElement(key, value, options.expiry ?? this.config.defaultExpiryMs, expirationType);
  }

  private lookup(key: K, operation: string): ObservableCachedElement<K, V> {
    const element = this.store.tryGet(key);
    if (!element) {
      this.recordMiss(operation);
      throw new KeyNotFoundError(key);
    }
    this.recordHit(operation);
    return element;
  }

  private recordHit(operation: string): void {
    this.statsManager.recordHit();
    this.tracing.recordHit(operation);
  }

  private recordMiss(operation: string): void {
    this.statsManager.recordMiss();
    this.tracing.recordMiss(operation);
  }

  private throwIfDisposed(): void {
    if (this.isDisposed) {
      throw new ObjectDisposedError('ObservableInMemoryCache');
    }
  }

  private transitionTo(state: DisposalState): void {
    const previous = this.state;
    this.state = state;
    this.logger.debug({ from: previous, to: state }, 'cache state changed');
  }
}
