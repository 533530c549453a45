import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { ExpirationHandlingError } from '../infrastructure/error/CacheErrors';
import { type ObservableCacheChange, ObservableCacheChangeType } from '../ObservableCacheChange';
import { ObservableInMemoryCache } from '../ObservableInMemoryCache';
import { type ObservableCacheConfig, ObservableCacheExpirationType } from '../types';

type Recorder = {
  changes: ObservableCacheChange<string, string>[];
  /** Resolves once `count` changes have been seen */
  received(count: number): Promise<void>;
};

const record = (cache: ObservableInMemoryCache<string, string>): Recorder => {
  const changes: ObservableCacheChange<string, string>[] = [];
  const waiters: Array<{ count: number; resolve: () => void }> = [];
  cache.changes.subscribe((change) => {
    changes.push(change);
    for (const waiter of waiters.filter((candidate) => changes.length >= candidate.count)) {
      waiters.splice(waiters.indexOf(waiter), 1);
      waiter.resolve();
    }
  });
  return {
    changes,
    received: (count) =>
      changes.length >= count ? Promise.resolve() : new Promise((resolve) => waiters.push({ count, resolve })),
  };
};

const types = (changes: ObservableCacheChange<string, string>[]): ObservableCacheChangeType[] =>
  changes.map((change) => change.changeType);

describe('ObservableInMemoryCache expiration', () => {
  let cache: ObservableInMemoryCache<string, string>;

  const createCache = (config: ObservableCacheConfig<string, string> = {}): ObservableInMemoryCache<string, string> => {
    cache = new ObservableInMemoryCache({ expiredElementsBufferMs: 10, ...config });
    return cache;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(async () => {
    await cache.dispose();
    vi.useRealTimers();
  });

  it('removes elements of type Remove after notifying their expiry', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 1_000 });

    await vi.advanceTimersByTimeAsync(1_010);
    await recorder.received(3);

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemExpired,
      ObservableCacheChangeType.ItemRemoved,
    ]);
    expect(recorder.changes[1]).toEqual({
      changeType: ObservableCacheChangeType.ItemExpired,
      key: 'a',
      value: 'A',
      expiresAt: 1_000,
      expirationType: ObservableCacheExpirationType.Remove,
    });
    expect(cache.count).toBe(0);
    expect(cache.getStats()).toMatchObject({ expirations: 1, evictions: 1 });
  });

  it('uses the default expiry for elements added without one', async () => {
    createCache({ defaultExpiryMs: 500 });
    const recorder = record(cache);
    await cache.add('a', 'A');

    expect(await cache.expiresAt('a')).toBe(500);
    await vi.advanceTimersByTimeAsync(510);
    await recorder.received(3);

    expect(cache.count).toBe(0);
  });

  it('only notifies elements of type DoNothing', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.DoNothing });

    await vi.advanceTimersByTimeAsync(1_010);
    await recorder.received(2);
    await vi.advanceTimersByTimeAsync(5_000);

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemExpired,
    ]);
    expect(await cache.get('a')).toBe('A');
  });

  it('collects expired elements for the buffer window', async () => {
    createCache({ expiredElementsBufferMs: 500 });
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 1_000 });
    await cache.add('b', 'B', { expiry: 1_200 });

    await vi.advanceTimersByTimeAsync(1_400);
    expect(recorder.changes).toHaveLength(2);

    await vi.advanceTimersByTimeAsync(100);
    await recorder.received(6);

    expect(
      recorder.changes
        .slice(2)
        .map((change) =>
          change.changeType === ObservableCacheChangeType.Reset ? change.changeType : `${change.changeType}:${change.key}`
        )
    ).toEqual(['ItemExpired:a', 'ItemExpired:b', 'ItemRemoved:a', 'ItemRemoved:b']);
  });

  it('does not expire elements replaced before their expiry', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 1_000 });
    await cache.addOrUpdate('a', 'AA');

    await vi.advanceTimersByTimeAsync(2_000);

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemValueReplaced,
    ]);
    expect(await cache.get('a')).toBe('AA');
  });

  it('does not expire removed elements', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 1_000 });
    await cache.remove('a');
    await cache.add('a', 'A2');

    await vi.advanceTimersByTimeAsync(2_000);

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemRemoved,
      ObservableCacheChangeType.ItemAdded,
    ]);
  });

  it('restarts the expiry on update', async () => {
    createCache();
    await cache.add('a', 'A', { expiry: 1_000 });

    await vi.advanceTimersByTimeAsync(600);
    await cache.update('a', 'AA');

    expect(await cache.expiresAt('a')).toBe(1_600);
    expect(await cache.expiresIn('a')).toBe(1_000);
  });

  it('applies a new expiration through updateExpiration', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A');

    await cache.updateExpiration('a', 1_000, ObservableCacheExpirationType.Remove);
    await vi.advanceTimersByTimeAsync(1_010);
    await recorder.received(4);

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemValueReplaced,
      ObservableCacheChangeType.ItemExpired,
      ObservableCacheChangeType.ItemRemoved,
    ]);
  });

  it('keeps expiring elements added while notifications were suppressed', async () => {
    createCache();
    const recorder = record(cache);
    const suppression = cache.suppressChangeNotifications();
    await cache.add('a', 'A', { expiry: 1_000 });
    await suppression.dispose();

    await vi.advanceTimersByTimeAsync(1_010);
    await recorder.received(3);

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.Reset,
      ObservableCacheChangeType.ItemExpired,
      ObservableCacheChangeType.ItemRemoved,
    ]);
  });

  it('holds back expiry notifications while notifications are suppressed', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 10 });
    await cache.add('b', 'B', { expiry: 10, expirationType: ObservableCacheExpirationType.DoNothing });
    const suppression = cache.suppressChangeNotifications();
    const evicted = new Promise<void>((resolve) => {
      cache.countChanges.subscribe((count) => {
        if (count === 1) resolve();
      });
    });

    await vi.advanceTimersByTimeAsync(20);
    await evicted;

    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemAdded,
    ]);
    expect(cache.count).toBe(1);
    expect(cache.getStats()).toMatchObject({ expirations: 2, evictions: 1 });

    await suppression.dispose();
    expect(types(recorder.changes)).toEqual([
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.ItemAdded,
      ObservableCacheChangeType.Reset,
    ]);
  });

  it('handles expired elements only after an in-flight writer finishes', async () => {
    createCache();
    const recorder = record(cache);
    await cache.add('a', 'A', { expiry: 1_000 });
    let finishProducing: (value: string) => void = () => undefined;
    const produced = new Promise<string>((resolve) => {
      finishProducing = resolve;
    });

    const adding = cache.getOrAdd('b', () => produced);
    await vi.advanceTimersByTimeAsync(1_010);

    expect(types(recorder.changes)).toEqual([ObservableCacheChangeType.ItemAdded]);
    expect(cache.count).toBe(1);

    finishProducing('B');
    await adding;
    await recorder.received(4);

    expect(
      recorder.changes.map((change) =>
        change.changeType === ObservableCacheChangeType.Reset ? change.changeType : `${change.changeType}:${change.key}`
      )
    ).toEqual(['ItemAdded:a', 'ItemAdded:b', 'ItemExpired:a', 'ItemRemoved:a']);
  });

  describe('Update', () => {
    it('refreshes a single element through the single key updater', async () => {
      const singleKeyUpdater = vi.fn((key: string) => `${key}-refreshed`);
      createCache({ singleKeyUpdater });
      const recorder = record(cache);
      await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });

      await vi.advanceTimersByTimeAsync(1_010);
      await recorder.received(3);

      expect(recorder.changes[2]).toEqual({
        changeType: ObservableCacheChangeType.ItemValueReplaced,
        key: 'a',
        value: 'a-refreshed',
        oldValue: 'A',
        expiresAt: 2_010,
        expirationType: ObservableCacheExpirationType.Update,
      });
      expect(singleKeyUpdater).toHaveBeenCalledTimes(1);
      expect(cache.getStats()).toMatchObject({ expirations: 1, refreshes: 1 });
    });

    it('refreshes again once the refreshed value expires', async () => {
      const singleKeyUpdater = vi.fn((key: string) => `${key}-refreshed`);
      createCache({ singleKeyUpdater });
      const recorder = record(cache);
      await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });

      await vi.advanceTimersByTimeAsync(1_010);
      await recorder.received(3);
      await vi.advanceTimersByTimeAsync(1_010);
      await recorder.received(5);

      expect(singleKeyUpdater).toHaveBeenCalledTimes(2);
    });

    it('refreshes batches through the multiple keys updater', async () => {
      const multipleKeysUpdater = vi.fn((keys: readonly string[]) =>
        keys.map((key): [string, string | undefined] => [key, key === 'a' ? 'A-refreshed' : undefined])
      );
      const singleKeyUpdater = vi.fn((key: string) => key);
      createCache({ singleKeyUpdater, multipleKeysUpdater });
      const recorder = record(cache);
      await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });
      await cache.add('b', 'B', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });

      await vi.advanceTimersByTimeAsync(1_010);
      await recorder.received(6);

      expect(multipleKeysUpdater).toHaveBeenCalledTimes(1);
      expect(multipleKeysUpdater.mock.calls[0]?.[0]).toEqual(['a', 'b']);
      expect(singleKeyUpdater).not.toHaveBeenCalled();
      expect(types(recorder.changes.slice(2))).toEqual([
        ObservableCacheChangeType.ItemExpired,
        ObservableCacheChangeType.ItemExpired,
        ObservableCacheChangeType.ItemValueReplaced,
        ObservableCacheChangeType.ItemRemoved,
      ]);
      expect(await cache.get('a')).toBe('A-refreshed');
      expect(await cache.contains('b')).toBe(false);
    });

    it('uses the multiple keys updater for single elements when it is the only one', async () => {
      const multipleKeysUpdater = vi.fn((keys: readonly string[]) =>
        keys.map((key): [string, string] => [key, `${key}-bulk`])
      );
      createCache({ multipleKeysUpdater });
      const recorder = record(cache);
      await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });

      await vi.advanceTimersByTimeAsync(1_010);
      await recorder.received(3);

      expect(await cache.get('a')).toBe('a-bulk');
    });

    it('removes the element when the updater returns undefined', async () => {
      createCache({ singleKeyUpdater: () => undefined });
      const recorder = record(cache);
      await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });

      await vi.advanceTimersByTimeAsync(1_010);
      await recorder.received(3);

      expect(types(recorder.changes)).toEqual([
        ObservableCacheChangeType.ItemAdded,
        ObservableCacheChangeType.ItemExpired,
        ObservableCacheChangeType.ItemRemoved,
      ]);
      expect(cache.count).toBe(0);
    });

    it('reports updater failures on the error channel and keeps the element', async () => {
      const onError = vi.fn();
      createCache({
        singleKeyUpdater: () => {
          throw new Error('upstream unavailable');
        },
        instrumentation: { onError },
      });
      const errors: Error[] = [];
      const failed = new Promise<void>((resolve) => {
        cache.changes.subscribe({
          next: () => undefined,
          error: (error) => {
            errors.push(error);
            resolve();
          },
        });
      });
      await cache.add('a', 'A', { expiry: 1_000, expirationType: ObservableCacheExpirationType.Update });

      await vi.advanceTimersByTimeAsync(1_010);
      await failed;

      expect(errors).toHaveLength(1);
      const [error] = errors;
      expect(error).toBeInstanceOf(ExpirationHandlingError);
      expect(error).toMatchObject({ keys: ['a'], code: 'cache/expiration_handling_failed' });
      expect(error?.cause).toEqual(new Error('upstream unavailable'));
      expect(onError).toHaveBeenCalledWith(error);
      expect(await cache.get('a')).toBe('A');
    });
  });
});
