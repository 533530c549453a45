/**
 * Change records published on a cache's change stream
 */

import type { ObservableCachedElement } from './ObservableCachedElement';
import type { ObservableCacheExpirationType } from './types';

export enum ObservableCacheChangeType {
  ItemAdded = 'ItemAdded',
  ItemValueReplaced = 'ItemValueReplaced',
  ItemRemoved = 'ItemRemoved',
  ItemExpired = 'ItemExpired',
  Reset = 'Reset',
}

type ItemChange<T extends ObservableCacheChangeType, K, V> = {
  readonly changeType: T;
  readonly key: K;
  readonly value: V;
  readonly expiresAt: number;
  readonly expirationType: ObservableCacheExpirationType;
};

export type ItemAddedChange<K, V> = ItemChange<ObservableCacheChangeType.ItemAdded, K, V>;

export type ItemValueReplacedChange<K, V> = ItemChange<ObservableCacheChangeType.ItemValueReplaced, K, V> & {
  readonly oldValue: V;
};

export type ItemRemovedChange<K, V> = ItemChange<ObservableCacheChangeType.ItemRemoved, K, V>;

export type ItemExpiredChange<K, V> = ItemChange<ObservableCacheChangeType.ItemExpired, K, V>;

/** Consumers should re-read the whole cache */
export type ResetChange = {
  readonly changeType: ObservableCacheChangeType.Reset;
};

export type ObservableCacheChange<K, V> =
  | ItemAddedChange<K, V>
  | ItemValueReplacedChange<K, V>
  | ItemRemovedChange<K, V>
  | ItemExpiredChange<K, V>
  | ResetChange;

function itemChange<T extends ObservableCacheChangeType, K, V>(
  changeType: T,
  element: ObservableCachedElement<K, V>
): ItemChange<T, K, V> {
  return Object.freeze({
    changeType,
    key: element.key,
    value: element.value,
    expiresAt: element.expiresAt,
    expirationType: element.expirationType,
  });
}

export const ObservableCacheChanges = {
  itemAdded<K, V>(element: ObservableCachedElement<K, V>): ItemAddedChange<K, V> {
    return itemChange(ObservableCacheChangeType.ItemAdded, element);
  },

  itemValueReplaced<K, V>(
    element: ObservableCachedElement<K, V>,
    previous: ObservableCachedElement<K, V>
  ): ItemValueReplacedChange<K, V> {
    return Object.freeze({
      ...itemChange(ObservableCacheChangeType.ItemValueReplaced, element),
      oldValue: previous.value,
    });
  },

  itemRemoved<K, V>(element: ObservableCachedElement<K, V>): ItemRemovedChange<K, V> {
    return itemChange(ObservableCacheChangeType.ItemRemoved, element);
  },

  itemExpired<K, V>(element: ObservableCachedElement<K, V>): ItemExpiredChange<K, V> {
    return itemChange(ObservableCacheChangeType.ItemExpired, element);
  },

  reset(): ResetChange {
    return Object.freeze({ changeType: ObservableCacheChangeType.Reset });
  },
} as const;
