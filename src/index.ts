/**
 * observable-cache - Observable in-memory cache
 *
 * - Per-element expiration with remove, refresh or notify-only policies
 * - Live change stream and count stream
 * - Reads and writes serialized by an async reader/writer lock
 * - Generic object pool with one-shot tickets
 * - Structured logging and OpenTelemetry tracing
 */

// Cache
export { ObservableInMemoryCache, type ChangeNotificationsResumption } from './ObservableInMemoryCache';
export { ObservableCachedElement, NEVER_EXPIRES } from './ObservableCachedElement';
export {
  ObservableCacheChangeType,
  ObservableCacheChanges,
  type ObservableCacheChange,
  type ItemAddedChange,
  type ItemValueReplacedChange,
  type ItemRemovedChange,
  type ItemExpiredChange,
  type ResetChange,
} from './ObservableCacheChange';
export { DEFAULT_OBSERVABLE_CACHE_CONFIG, resolveObservableCacheConfig } from './config';

// Building blocks
export {
  ObservableDictionary,
  DictionaryChangeType,
  type DictionaryChange,
  type ChangeNotificationSuppression,
} from './core/store/ObservableDictionary';
export { ExpirationScheduler } from './core/expiration/ExpirationScheduler';
export { ChangeStream, type Observer, type Subscribable, type Subscription } from './core/events/ChangeStream';
export {
  CurrentExecutionContext,
  ImmediateExecutionContext,
  currentExecutionContext,
  immediateExecutionContext,
  type ExecutionContext,
} from './core/execution/ExecutionContext';
export { AsyncReaderWriterLock, type ReaderWriterLockStats } from './core/threading/AsyncReaderWriterLock';
export { ReaderWriterLockTicket } from './core/threading/ReaderWriterLockTicket';
export {
  Pool,
  PooledValueAcquisitionMode,
  type InstanceBuilder,
  type PoolConfig,
  type PoolStats,
  type AcquireOptions,
} from './core/pooling/Pool';
export { Pooled, PooledState } from './core/pooling/Pooled';

// Infrastructure services
export { CacheStatsManager } from './core/services/CacheStatsManager';
export { CacheErrorFactory } from './infrastructure/error/CacheErrorFactory';
export { CacheTracingManager } from './infrastructure/tracing/CacheTracingManager';
export { getLogger, setLogger, type Logger } from './infrastructure/logging/Logger';
export {
  CacheError,
  KeyAlreadyExistsError,
  KeyNotFoundError,
  ArgumentOutOfRangeError,
  ObjectDisposedError,
  OperationCanceledError,
  InvalidOperationError,
  ExpirationHandlingError,
  isCacheError,
  type CacheErrorCode,
} from './infrastructure/error/CacheErrors';

// Types and interfaces
export {
  ObservableCacheExpirationType,
  type DisposalState,
  type CacheOperationOptions,
  type ExpirationOptions,
  type AddOptions,
  type ValueProducer,
  type SingleKeyUpdater,
  type MultipleKeysUpdater,
  type InstrumentationHooks,
  type CacheStats,
  type TracingConfig,
  type ObservableCacheConfig,
  type ICacheReads,
  type ICacheWrites,
  type ICacheNotifications,
  type IObservableCache,
} from './types';
