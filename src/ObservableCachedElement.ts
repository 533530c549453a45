import { ArgumentOutOfRangeError } from './infrastructure/error/CacheErrors';
import { ObservableCacheExpirationType } from './types';

/** `expiresAt` of elements that never expire */
export const NEVER_EXPIRES = Number.POSITIVE_INFINITY;

export function assertValidExpiry(expiry: number, paramName = 'expiry'): void {
  if (Number.isNaN(expiry) || expiry < 0) {
    throw new ArgumentOutOfRangeError(paramName, 'Expiry must be zero or greater');
  }
}

/**
 * A cached value together with its expiration metadata. Never mutated:
 * replacing a value or its expiration creates a new element.
 */
export class ObservableCachedElement<K, V> {
  /** Epoch milliseconds, or {@link NEVER_EXPIRES} */
  readonly expiresAt: number;

  constructor(
    readonly key: K,
    readonly value: V,
    /** Relative expiry in milliseconds the element was created with */
    readonly expiry: number,
    readonly expirationType: ObservableCacheExpirationType = ObservableCacheExpirationType.Remove,
    now: number = Date.now()
  ) {
    assertValidExpiry(expiry);
    this.expiresAt = expiry === Number.POSITIVE_INFINITY ? NEVER_EXPIRES : now + expiry;
  }

  get expires(): boolean {
    return this.expiresAt !== NEVER_EXPIRES;
  }

  hasExpired(now: number = Date.now()): boolean {
    return this.expiresAt <= now;
  }

  expiresIn(now: number = Date.now()): number {
    return Math.max(0, this.expiresAt - now);
  }

  /**
   * Same key and expiration policy, new value, expiry counted from `now`
   */
  withValue(value: V, now?: number): ObservableCachedElement<K, V> {
    return new ObservableCachedElement(this.key, value, this.expiry, this.expirationType, now);
  }
}
