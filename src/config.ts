/**
 * Cache configuration defaults and validation
 */

import { currentExecutionContext, type ExecutionContext } from './core/execution/ExecutionContext';
import { ArgumentOutOfRangeError } from './infrastructure/error/CacheErrors';
import { getLogger, type Logger } from './infrastructure/logging/Logger';
import { assertValidExpiry } from './ObservableCachedElement';
import {
  type InstrumentationHooks,
  type MultipleKeysUpdater,
  ObservableCacheExpirationType,
  type ObservableCacheConfig,
  type SingleKeyUpdater,
  type TracingConfig,
} from './types';

export const DEFAULT_OBSERVABLE_CACHE_CONFIG = {
  defaultExpiryMs: Number.POSITIVE_INFINITY,
  defaultExpirationType: ObservableCacheExpirationType.Remove,
  expiredElementsBufferMs: 5000,
  thresholdAmountWhenChangesAreNotifiedAsReset: Number.POSITIVE_INFINITY,
  tracing: { enabled: false, serviceName: 'observable-cache' },
} as const satisfies ObservableCacheConfig<unknown, unknown>;

export type ResolvedObservableCacheConfig<K, V> = {
  defaultExpiryMs: number;
  defaultExpirationType: ObservableCacheExpirationType;
  expiredElementsBufferMs: number;
  thresholdAmountWhenChangesAreNotifiedAsReset: number;
  singleKeyUpdater: SingleKeyUpdater<K, V> | undefined;
  multipleKeysUpdater: MultipleKeysUpdater<K, V> | undefined;
  executionContext: ExecutionContext;
  logger: Logger;
  tracing: TracingConfig;
  instrumentation: InstrumentationHooks | undefined;
};

export function resolveObservableCacheConfig<K, V>(
  config: ObservableCacheConfig<K, V> = {}
): ResolvedObservableCacheConfig<K, V> {
  const resolved: ResolvedObservableCacheConfig<K, V> = {
    defaultExpiryMs: config.defaultExpiryMs ?? DEFAULT_OBSERVABLE_CACHE_CONFIG.defaultExpiryMs,
    defaultExpirationType: config.defaultExpirationType ?? DEFAULT_OBSERVABLE_CACHE_CONFIG.defaultExpirationType,
    expiredElementsBufferMs: config.expiredElementsBufferMs ?? DEFAULT_OBSERVABLE_CACHE_CONFIG.expiredElementsBufferMs,
    thresholdAmountWhenChangesAreNotifiedAsReset:
      config.thresholdAmountWhenChangesAreNotifiedAsReset ??
      DEFAULT_OBSERVABLE_CACHE_CONFIG.thresholdAmountWhenChangesAreNotifiedAsReset,
    singleKeyUpdater: config.singleKeyUpdater,
    multipleKeysUpdater: config.multipleKeysUpdater,
    executionContext: config.executionContext ?? currentExecutionContext,
    logger: config.logger ?? getLogger(),
    tracing: config.tracing ?? DEFAULT_OBSERVABLE_CACHE_CONFIG.tracing,
    instrumentation: config.instrumentation,
  };

  assertValidExpiry(resolved.defaultExpiryMs, 'defaultExpiryMs');

  if (!Number.isFinite(resolved.expiredElementsBufferMs) || resolved.expiredElementsBufferMs < 0) {
    throw new ArgumentOutOfRangeError('expiredElementsBufferMs', 'Must be a finite number, zero or greater');
  }

  if (
    Number.isNaN(resolved.thresholdAmountWhenChangesAreNotifiedAsReset) ||
    resolved.thresholdAmountWhenChangesAreNotifiedAsReset < 1
  ) {
    throw new ArgumentOutOfRangeError('thresholdAmountWhenChangesAreNotifiedAsReset', 'Must be one or greater');
  }

  if (
    resolved.defaultExpirationType === ObservableCacheExpirationType.Update &&
    !resolved.singleKeyUpdater &&
    !resolved.multipleKeysUpdater
  ) {
    throw new ArgumentOutOfRangeError(
      'defaultExpirationType',
      'Update expiration requires a singleKeyUpdater or multipleKeysUpdater'
    );
  }

  return resolved;
}
