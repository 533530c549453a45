/**
 * Observable Dictionary
 * Keyed store that reports every mutation on a change stream and every
 * distinct count on a count stream.
 */

import {
  ArgumentOutOfRangeError,
  InvalidOperationError,
  KeyAlreadyExistsError,
  KeyNotFoundError,
} from '../../infrastructure/error/CacheErrors';
import { ChangeStream, type Subscribable } from '../events/ChangeStream';
import { throwIfCanceled } from '../execution/CancellationHelper';

export enum DictionaryChangeType {
  ItemAdded = 'ItemAdded',
  ItemReplaced = 'ItemReplaced',
  ItemRemoved = 'ItemRemoved',
  Reset = 'Reset',
}

export type DictionaryChange<K, V> =
  | { readonly type: DictionaryChangeType.ItemAdded; readonly key: K; readonly value: V }
  | { readonly type: DictionaryChangeType.ItemReplaced; readonly key: K; readonly value: V; readonly oldValue: V }
  | { readonly type: DictionaryChangeType.ItemRemoved; readonly key: K; readonly value: V }
  | { readonly type: DictionaryChangeType.Reset };

export type ObservableDictionaryOptions<K, V> = {
  /** Range operations touching at least this many items emit a single Reset */
  thresholdAmountWhenChangesAreNotifiedAsReset?: number;
  /** Sees every mutation, including those made while notifications are suppressed */
  onMutation?: (change: DictionaryChange<K, V>) => void;
  onObserverError?: (error: unknown) => void;
};

/**
 * Scoped suppression of change notifications
 */
export interface ChangeNotificationSuppression {
  dispose(): void;
}

export class ObservableDictionary<K, V> {
  private readonly items = new Map<K, { value: V }>();
  private readonly changeStream: ChangeStream<DictionaryChange<K, V>>;
  private readonly countStream: ChangeStream<number>;
  private readonly resetThreshold: number;
  private readonly onMutation: ((change: DictionaryChange<K, V>) => void) | undefined;
  private suppressed = false;
  private lastNotifiedCount = 0;

  constructor(options: ObservableDictionaryOptions<K, V> = {}) {
    const threshold = options.thresholdAmountWhenChangesAreNotifiedAsReset ?? Number.POSITIVE_INFINITY;
    if (Number.isNaN(threshold) || threshold < 1) {
      throw new ArgumentOutOfRangeError(
        'thresholdAmountWhenChangesAreNotifiedAsReset',
        'Must be one or greater'
      );
    }
    this.resetThreshold = threshold;
    this.onMutation = options.onMutation;
    this.changeStream = new ChangeStream('dictionary-changes', { onObserverError: options.onObserverError });
    this.countStream = new ChangeStream('dictionary-count', { onObserverError: options.onObserverError });
  }

  get changes(): Subscribable<DictionaryChange<K, V>> {
    return this.changeStream;
  }

  get countChanges(): Subscribable<number> {
    return this.countStream;
  }

  get count(): number {
    return this.items.size;
  }

  get isNotifying(): boolean {
    return !this.suppressed;
  }

  has(key: K): boolean {
    return this.items.has(key);
  }

  get(key: K): V {
    const entry = this.items.get(key);
    if (!entry) {
      throw new KeyNotFoundError(key);
    }
    return entry.value;
  }

  tryGet(key: K): V | undefined {
    return this.items.get(key)?.value;
  }

  keys(): IterableIterator<K> {
    return this.items.keys();
  }

  *values(): IterableIterator<V> {
    for (const entry of this.items.values()) {
      yield entry.value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, entry] of this.items) {
      yield [key, entry.value];
    }
  }

  add(key: K, value: V): void {
    if (this.items.has(key)) {
      throw new KeyAlreadyExistsError(key);
    }
    this.items.set(key, { value });
    this.notify({ type: DictionaryChangeType.ItemAdded, key, value });
  }

  tryAdd(key: K, value: V): boolean {
    if (this.items.has(key)) return false;
    this.add(key, value);
    return true;
  }

  /**
   * Add or replace
   */
  set(key: K, value: V): void {
    if (this.items.has(key)) {
      this.replace(key, value);
    } else {
      this.add(key, value);
    }
  }

  replace(key: K, value: V): void {
    const entry = this.items.get(key);
    if (!entry) {
      throw new KeyNotFoundError(key);
    }
    const oldValue = entry.value;
    this.items.set(key, { value });
    this.notify({ type: DictionaryChangeType.ItemReplaced, key, value, oldValue });
  }

  remove(key: K): V {
    const entry = this.items.get(key);
    if (!entry) {
      throw new KeyNotFoundError(key);
    }
    const { value } = entry;
    this.items.delete(key);
    this.notify({ type: DictionaryChangeType.ItemRemoved, key, value });
    return value;
  }

  /**
   * Removes the key when present and, given a predicate, only while its
   * current value satisfies it.
   */
  tryRemove(key: K, predicate?: (value: V) => boolean): boolean {
    const entry = this.items.get(key);
    if (!entry || (predicate && !predicate(entry.value))) return false;
    this.remove(key);
    return true;
  }

  clear(): void {
    this.items.clear();
    this.notify({ type: DictionaryChangeType.Reset });
  }

  /**
   * Adds entries one by one in iteration order. Stops at the first
   * duplicate key; entries added before it stay.
   */
  addRange(entries: Iterable<readonly [K, V]>, signal?: AbortSignal): void {
    const batch = Array.from(entries);
    this.inBatch(batch.length, () => {
      for (const [key, value] of batch) {
        throwIfCanceled(signal);
        this.add(key, value);
      }
    });
  }

  /**
   * Removes keys one by one in iteration order. Stops at the first missing
   * key; keys removed before it stay removed.
   */
  removeRange(keys: Iterable<K>, signal?: AbortSignal): void {
    const batch = Array.from(keys);
    this.inBatch(batch.length, () => {
      for (const key of batch) {
        throwIfCanceled(signal);
        this.remove(key);
      }
    });
  }

  /**
   * Stops change notifications until the returned guard is disposed.
   * The count stream keeps notifying.
   */
  suppressChangeNotifications(signalResetWhenFinished = true): ChangeNotificationSuppression {
    if (this.suppressed) {
      throw new InvalidOperationError('Change notifications are already suppressed');
    }
    this.suppressed = true;

    let disposed = false;
    return {
      dispose: () => {
        if (disposed) return;
        disposed = true;
        this.suppressed = false;
        if (signalResetWhenFinished) {
          this.changeStream.next({ type: DictionaryChangeType.Reset });
        }
      },
    };
  }

  /**
   * Completes both streams
   */
  dispose(): void {
    this.changeStream.complete();
    this.countStream.complete();
  }

  private inBatch(size: number, work: () => void): void {
    if (size < this.resetThreshold || this.suppressed) {
      work();
      return;
    }

    const suppression = this.suppressChangeNotifications(true);
    try {
      work();
    } finally {
      suppression.dispose();
    }
  }

  private notify(change: DictionaryChange<K, V>): void {
    this.onMutation?.(change);
    if (!this.suppressed) {
      this.changeStream.next(change);
    }
    if (this.items.size !== this.lastNotifiedCount) {
      this.lastNotifiedCount = this.items.size;
      this.countStream.next(this.items.size);
    }
  }
}
