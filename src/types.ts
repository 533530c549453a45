/**
 * Observable cache types and interfaces
 */

import type { Logger } from './infrastructure/logging/Logger';
import type { Subscribable } from './core/events/ChangeStream';
import type { ExecutionContext } from './core/execution/ExecutionContext';
import type { ObservableCacheChange } from './ObservableCacheChange';

/**
 * What happens to an element once its expiry has elapsed
 */
export enum ObservableCacheExpirationType {
  /** Only an ItemExpired notification is emitted */
  DoNothing = 'DoNothing',
  /** The element is removed from the cache */
  Remove = 'Remove',
  /** The element's value is regenerated through the configured updater */
  Update = 'Update',
}

/**
 * Lifecycle of disposable components
 */
export type DisposalState = 'active' | 'disposing' | 'disposed';

/**
 * Options every cache operation accepts
 */
export type CacheOperationOptions = {
  /** Cancels the operation at its next checkpoint */
  signal?: AbortSignal;
  /** Where the operation body runs and its notifications are delivered */
  executionContext?: ExecutionContext;
};

/**
 * Expiration options for operations that create elements
 */
export type ExpirationOptions = {
  /** Milliseconds until the element expires, `Infinity` for never */
  expiry?: number;
  /** What happens once the element expires */
  expirationType?: ObservableCacheExpirationType;
};

export type AddOptions = CacheOperationOptions & ExpirationOptions;

/**
 * Produces a value for a single key
 */
export type ValueProducer<K, V> = (key: K, signal: AbortSignal) => V | Promise<V>;

/**
 * Regenerates the value of one expired key. Resolving with `undefined`
 * removes the element instead.
 */
export type SingleKeyUpdater<K, V> = (key: K, signal: AbortSignal) => V | undefined | Promise<V | undefined>;

/**
 * Regenerates the values of several expired keys at once. Keys missing
 * from the result are removed.
 */
export type MultipleKeysUpdater<K, V> = (
  keys: readonly K[],
  signal: AbortSignal
) => Iterable<readonly [K, V | undefined]> | Promise<Iterable<readonly [K, V | undefined]>>;

/**
 * Instrumentation hooks for observability
 */
export type InstrumentationHooks = {
  onCommand?: (command: string, latencyMs: number, success: boolean) => void;
  onError?: (error: Error) => void;
  onStats?: (stats: CacheStats) => void;
};

/**
 * Cache statistics
 */
export type CacheStats = {
  /** Number of reads that found their key */
  hits: number;
  /** Number of reads that did not */
  misses: number;
  /** Number of elements removed because they expired */
  evictions: number;
  /** Number of elements whose expiry elapsed */
  expirations: number;
  /** Number of elements regenerated by an updater */
  refreshes: number;
  /** Number of cached items */
  itemCount: number;
  /** Hit rate percentage */
  hitRate: number;
  /** Last update timestamp */
  lastUpdated: number;
};

/**
 * Distributed tracing configuration
 */
export type TracingConfig = {
  /** Whether tracing is enabled */
  enabled: boolean;
  /** Service name for traces and meters */
  serviceName: string;
  /** Service version */
  serviceVersion?: string;
};

/**
 * Cache configuration
 */
export type ObservableCacheConfig<K, V> = {
  /** Expiry of elements added without one, in milliseconds */
  defaultExpiryMs?: number;
  /** Expiration type of elements added without one */
  defaultExpirationType?: ObservableCacheExpirationType;
  /** How long expired elements are collected before they are handled together, in milliseconds */
  expiredElementsBufferMs?: number;
  /** Range operations touching at least this many items emit one Reset instead */
  thresholdAmountWhenChangesAreNotifiedAsReset?: number;
  /** Regenerates single expired elements of type Update */
  singleKeyUpdater?: SingleKeyUpdater<K, V>;
  /** Regenerates expired elements of type Update in bulk */
  multipleKeysUpdater?: MultipleKeysUpdater<K, V>;
  /** Default execution context of all operations */
  executionContext?: ExecutionContext;
  /** Parent logger; defaults to the library's root logger */
  logger?: Logger;
  tracing?: TracingConfig;
  instrumentation?: InstrumentationHooks;
};

/**
 * Read operations, admitted to the reader lane
 */
export type ICacheReads<K, V> = {
  /** Value of a key; fails with KeyNotFoundError when absent */
  get(key: K, options?: CacheOperationOptions): Promise<V>;

  /** Values of several keys, in key order */
  getMany(keys: Iterable<K>, options?: CacheOperationOptions): Promise<V[]>;

  contains(key: K, options?: CacheOperationOptions): Promise<boolean>;

  /** True for an empty input */
  containsAll(keys: Iterable<K>, options?: CacheOperationOptions): Promise<boolean>;

  /** The subset of `keys` present in the cache, in input order */
  containsWhich(keys: Iterable<K>, options?: CacheOperationOptions): Promise<K[]>;

  /** Epoch milliseconds at which a key expires, `Infinity` for never */
  expiresAt(key: K, options?: CacheOperationOptions): Promise<number>;

  /** Milliseconds until a key expires, zero once it has */
  expiresIn(key: K, options?: CacheOperationOptions): Promise<number>;
};

/**
 * Mutations, admitted to the writer lane
 */
export type ICacheWrites<K, V> = {
  add(key: K, value: V, options?: AddOptions): Promise<void>;
  addRange(entries: Iterable<readonly [K, V]>, options?: AddOptions): Promise<void>;
  addOrUpdate(key: K, value: V, options?: AddOptions): Promise<void>;
  update(key: K, value: V, options?: CacheOperationOptions): Promise<void>;
  updateExpiration(
    key: K,
    expiry: number,
    expirationType: ObservableCacheExpirationType,
    options?: CacheOperationOptions
  ): Promise<void>;
  remove(key: K, options?: CacheOperationOptions): Promise<void>;
  removeRange(keys: Iterable<K>, options?: CacheOperationOptions): Promise<void>;
  clear(options?: CacheOperationOptions): Promise<void>;
  getOrAdd(key: K, producer: ValueProducer<K, V>, options?: AddOptions): Promise<V>;
  tryAdd(key: K, value: V, options?: AddOptions): Promise<boolean>;
  tryRemove(key: K, options?: CacheOperationOptions): Promise<boolean>;
  tryUpdate(key: K, value: V, options?: CacheOperationOptions): Promise<boolean>;
};

/**
 * Notification surface
 */
export type ICacheNotifications<K, V> = {
  /** Live change records, without replay */
  readonly changes: Subscribable<ObservableCacheChange<K, V>>;
  /** Current count first, then every distinct change */
  readonly countChanges: Subscribable<number>;
  readonly count: number;
};

export type IObservableCache<K, V> = ICacheReads<K, V> &
  ICacheWrites<K, V> &
  ICacheNotifications<K, V> & {
    getStats(): Readonly<CacheStats>;
    dispose(): Promise<void>;
  };
