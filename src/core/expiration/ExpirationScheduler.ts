/**
 * Expiration Scheduler
 * One timer per expiring element. Elements whose timers fire are collected
 * for a buffering window and handed to the expiration handler together.
 */

import { getLogger } from '../../infrastructure/logging/Logger';
import type { Logger } from '../../infrastructure/logging/Logger';
import type { ObservableCachedElement } from '../../ObservableCachedElement';

/** Longest delay a Node.js timer accepts */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export type ExpirationHandler<K, V> = (elements: ObservableCachedElement<K, V>[]) => Promise<void>;

export type ExpirationSchedulerOptions = {
  /** How long fired elements are collected before being handled, in milliseconds */
  expiredElementsBufferMs: number;
  logger?: Logger;
};

type ScheduledExpiration<K, V> = {
  element: ObservableCachedElement<K, V>;
  timer: NodeJS.Timeout;
};

export class ExpirationScheduler<K, V> {
  private readonly scheduled = new Map<K, ScheduledExpiration<K, V>>();
  private buffer: ObservableCachedElement<K, V>[] = [];
  private flushTimer: NodeJS.Timeout | undefined;
  private pendingFlush: Promise<void> = Promise.resolve();
  private disposed = false;
  private readonly logger: Logger;

  constructor(
    private readonly handler: ExpirationHandler<K, V>,
    private readonly options: ExpirationSchedulerOptions
  ) {
    this.logger = (options.logger ?? getLogger()).child({ component: 'expiration-scheduler' });
  }

  get scheduledCount(): number {
    return this.scheduled.size;
  }

  get bufferedCount(): number {
    return this.buffer.length;
  }

  /**
   * Track an element's expiry, replacing whatever was tracked for its key
   */
  schedule(element: ObservableCachedElement<K, V>): void {
    this.unschedule(element.key);
    if (this.disposed || !element.expires) return;

    this.scheduled.set(element.key, { element, timer: this.arm(element) });
  }

  unschedule(key: K): void {
    const entry = this.scheduled.get(key);
    if (entry) {
      clearTimeout(entry.timer);
      this.scheduled.delete(key);
    }
  }

  /**
   * Drop every timer and track exactly the given elements
   */
  reconcile(elements: Iterable<ObservableCachedElement<K, V>>): void {
    this.clearTimers();
    for (const element of elements) {
      this.schedule(element);
    }
  }

  /**
   * Resolves once the handler has finished with everything flushed so far
   */
  whenIdle(): Promise<void> {
    return this.pendingFlush;
  }

  dispose(): void {
    this.disposed = true;
    this.clearTimers();
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = undefined;
    }
    this.buffer = [];
  }

  private arm(element: ObservableCachedElement<K, V>): NodeJS.Timeout {
    const delay = Math.min(Math.max(element.expiresIn(), 1), MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => this.onTimer(element), delay);
    timer.unref();
    return timer;
  }

  private onTimer(element: ObservableCachedElement<K, V>): void {
    const entry = this.scheduled.get(element.key);
    if (!entry || entry.element !== element) return;

    // delays beyond the timer maximum are covered in several hops
    if (!element.hasExpired()) {
      entry.timer = this.arm(element);
      return;
    }

    this.scheduled.delete(element.key);
    this.buffer.push(element);
    this.scheduleFlush();
  }

  private scheduleFlush(): void {
    if (this.flushTimer || this.disposed) return;

    this.flushTimer = setTimeout(() => {
      this.flushTimer = undefined;
      this.flush();
    }, Math.max(this.options.expiredElementsBufferMs, 1));
    this.flushTimer.unref();
  }

  private flush(): void {
    const elements = this.buffer;
    this.buffer = [];
    if (elements.length === 0 || this.disposed) return;

    this.logger.debug({ count: elements.length }, 'handling expired elements');
    this.pendingFlush = this.pendingFlush
      .then(() => this.handler(elements))
      .catch((error: unknown) => {
        this.logger.error({ err: error, count: elements.length }, 'expired elements could not be handled');
      });
  }

  private clearTimers(): void {
    for (const entry of this.scheduled.values()) {
      clearTimeout(entry.timer);
    }
    this.scheduled.clear();
  }
}
