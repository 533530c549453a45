/**
 * Async Reader/Writer Lock
 * Two admission lanes: any number of concurrent readers, or one exclusive writer.
 *
 * Waiters are admitted in arrival order. A queued writer holds back every
 * reader that arrived after it, so writers cannot be starved by a steady
 * stream of readers.
 *
 * The lock is not re-entrant: acquiring it again while holding a ticket on
 * the same instance deadlocks as soon as a writer is involved.
 */

import { ObjectDisposedError, OperationCanceledError } from '../../infrastructure/error/CacheErrors';
import { getLogger } from '../../infrastructure/logging/Logger';
import type { DisposalState } from '../../types';
import { type CancellationOptions, throwIfCanceled } from '../execution/CancellationHelper';
import { currentExecutionContext, type ExecutionContext } from '../execution/ExecutionContext';
import { ReaderWriterLockTicket } from './ReaderWriterLockTicket';

export interface LockWorkOptions extends CancellationOptions {
  executionContext?: ExecutionContext | undefined;
}

export type ReaderWriterLockStats = {
  activeReaders: number;
  writerActive: boolean;
  queuedReaders: number;
  queuedWriters: number;
};

type LockWaiter = {
  exclusive: boolean;
  grant: () => void;
};

export class AsyncReaderWriterLock {
  private readonly queue: LockWaiter[] = [];
  private nextTicketId = 0;
  private activeReaders = 0;
  private writerActive = false;
  private state: DisposalState = 'active';
  private disposal: Promise<void> | undefined;

  private readonly logger = getLogger().child({ component: 'reader-writer-lock' });

  get isDisposed(): boolean {
    return this.state !== 'active';
  }

  /**
   * Resolves once the caller is admitted to the concurrent (reader) lane
   */
  acquireReaderLock(options: CancellationOptions = {}): Promise<ReaderWriterLockTicket> {
    return this.acquire(false, options.signal);
  }

  /**
   * Resolves once the caller is admitted to the exclusive (writer) lane
   */
  acquireWriterLock(options: CancellationOptions = {}): Promise<ReaderWriterLockTicket> {
    return this.acquire(true, options.signal);
  }

  async withReaderLock<T>(work: () => T | Promise<T>, options: LockWorkOptions = {}): Promise<T> {
    return this.runLocked(await this.acquireReaderLock(options), work, options);
  }

  async withWriterLock<T>(work: () => T | Promise<T>, options: LockWorkOptions = {}): Promise<T> {
    return this.runLocked(await this.acquireWriterLock(options), work, options);
  }

  getStats(): ReaderWriterLockStats {
    let queuedWriters = 0;
    for (const waiter of this.queue) {
      if (waiter.exclusive) queuedWriters++;
    }
    return {
      activeReaders: this.activeReaders,
      writerActive: this.writerActive,
      queuedReaders: this.queue.length - queuedWriters,
      queuedWriters,
    };
  }

  /**
   * Waits for outstanding work through one last exclusive acquisition, then
   * rejects all further acquisitions. Repeated calls share the same completion.
   */
  dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.drain();
    }
    return this.disposal;
  }

  private async drain(): Promise<void> {
    this.transitionTo('disposing');
    const ticket = await this.enqueue(true, undefined);
    this.transitionTo('disposed');
    ticket.release();
  }

  private async runLocked<T>(
    ticket: ReaderWriterLockTicket,
    work: () => T | Promise<T>,
    options: LockWorkOptions
  ): Promise<T> {
    try {
      throwIfCanceled(options.signal);
      return await (options.executionContext ?? currentExecutionContext).schedule(work);
    } finally {
      ticket.release();
    }
  }

  private acquire(exclusive: boolean, signal: AbortSignal | undefined): Promise<ReaderWriterLockTicket> {
    if (this.isDisposed) {
      return Promise.reject(new ObjectDisposedError('AsyncReaderWriterLock'));
    }
    if (signal?.aborted) {
      return Promise.reject(new OperationCanceledError(signal.reason));
    }
    return this.enqueue(exclusive, signal);
  }

  private enqueue(exclusive: boolean, signal: AbortSignal | undefined): Promise<ReaderWriterLockTicket> {
    return new Promise<ReaderWriterLockTicket>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.queue.indexOf(waiter);
        if (index < 0) return;
        this.queue.splice(index, 1);
        reject(new OperationCanceledError(signal?.reason));
        // a cancelled writer at the head may have been holding readers back
        this.admit();
      };

      const waiter: LockWaiter = {
        exclusive,
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve(this.issueTicket(exclusive));
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
      this.admit();
    });
  }

  private admit(): void {
    while (!this.writerActive) {
      const head = this.queue[0];
      if (!head) return;

      if (head.exclusive) {
        if (this.activeReaders > 0) return;
        this.queue.shift();
        this.writerActive = true;
        head.grant();
        return;
      }

      this.queue.shift();
      this.activeReaders++;
      head.grant();
    }
  }

  private issueTicket(exclusive: boolean): ReaderWriterLockTicket {
    const id = ++this.nextTicketId;
    return new ReaderWriterLockTicket(id, exclusive, () => {
      if (exclusive) {
        this.writerActive = false;
      } else {
        this.activeReaders--;
      }
      this.admit();
    });
  }

  private transitionTo(state: DisposalState): void {
    const previous = this.state;
    this.state = state;
    this.logger.debug({ from: previous, to: state }, 'lock state changed');
  }
}
