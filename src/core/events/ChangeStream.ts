/**
 * Live multicast notification stream
 * Publish/subscribe over an EventEmitter, with a separate error channel
 * that does not terminate the stream.
 */

import { EventEmitter } from 'node:events';

import { getLogger } from '../../infrastructure/logging/Logger';

export interface Observer<T> {
  next(value: T): void;
  error?(error: Error): void;
  complete?(): void;
}

export interface Subscription {
  readonly closed: boolean;
  unsubscribe(): void;
}

export interface Subscribable<T> {
  subscribe(observer: Observer<T> | ((value: T) => void)): Subscription;
}

export interface ChangeStreamOptions<T> {
  /** Value handed to each new subscriber before any live notification */
  current?: () => T;
  /** Called when an observer throws from one of its callbacks */
  onObserverError?: (error: unknown) => void;
}

const NEXT = 'next';
const ERROR = 'error';
const COMPLETE = 'complete';

export class ChangeStream<T> implements Subscribable<T> {
  private readonly emitter = new EventEmitter();
  private readonly logger = getLogger().child({ component: 'change-stream' });
  private completed = false;

  constructor(
    readonly name: string,
    private readonly options: ChangeStreamOptions<T> = {}
  ) {
    this.emitter.setMaxListeners(0);
  }

  get observerCount(): number {
    return this.emitter.listenerCount(NEXT);
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  subscribe(observerOrNext: Observer<T> | ((value: T) => void)): Subscription {
    const observer: Observer<T> =
      typeof observerOrNext === 'function' ? { next: observerOrNext } : observerOrNext;

    if (this.completed) {
      this.guard(() => observer.complete?.());
      return { closed: true, unsubscribe: () => undefined };
    }

    const onNext = (value: T): void => this.guard(() => observer.next(value));
    const onError = (error: Error): void => this.guard(() => observer.error?.(error));
    const onComplete = (): void => {
      detach();
      this.guard(() => observer.complete?.());
    };

    let closed = false;
    const detach = (): void => {
      if (closed) return;
      closed = true;
      this.emitter.off(NEXT, onNext);
      this.emitter.off(ERROR, onError);
      this.emitter.off(COMPLETE, onComplete);
    };

    this.emitter.on(NEXT, onNext);
    if (observer.error) {
      this.emitter.on(ERROR, onError);
    }
    this.emitter.on(COMPLETE, onComplete);

    const { current } = this.options;
    if (current) {
      onNext(current());
    }

    return {
      get closed() {
        return closed;
      },
      unsubscribe: detach,
    };
  }

  next(value: T): void {
    if (this.completed) return;
    this.emitter.emit(NEXT, value);
  }

  /**
   * Deliver an error to every observer that handles errors.
   * Returns false when there is none.
   */
  error(error: Error): boolean {
    if (this.completed || this.emitter.listenerCount(ERROR) === 0) {
      return false;
    }
    this.emitter.emit(ERROR, error);
    return true;
  }

  complete(): void {
    if (this.completed) return;
    this.completed = true;
    this.emitter.emit(COMPLETE);
    this.emitter.removeAllListeners();
  }

  private guard(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error({ err: error, stream: this.name }, 'observer threw while being notified');
      this.options.onObserverError?.(error);
    }
  }
}
