import { beforeEach, describe, expect, it } from 'vitest';

import type { ExecutionContext } from '../core/execution/ExecutionContext';
import { AsyncReaderWriterLock } from '../core/threading/AsyncReaderWriterLock';
import { ObjectDisposedError, OperationCanceledError } from '../infrastructure/error/CacheErrors';

const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));
const pause = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

class RecordingContext implements ExecutionContext {
  calls = 0;

  async schedule<T>(work: () => T | Promise<T>): Promise<T> {
    this.calls++;
    return await work();
  }
}

describe('AsyncReaderWriterLock reader lane', () => {
  let lock: AsyncReaderWriterLock;

  beforeEach(() => {
    lock = new AsyncReaderWriterLock();
  });

  it('admits readers concurrently', async () => {
    const first = await lock.acquireReaderLock();
    const second = await lock.acquireReaderLock();

    expect(lock.getStats()).toEqual({
      activeReaders: 2,
      writerActive: false,
      queuedReaders: 0,
      queuedWriters: 0,
    });

    first.release();
    second.release();
    expect(lock.getStats().activeReaders).toBe(0);
  });

  it('issues tickets with increasing ids', async () => {
    const first = await lock.acquireReaderLock();
    const second = await lock.acquireReaderLock();

    expect(second.id).toBeGreaterThan(first.id);
    expect(first.isExclusive).toBe(false);
  });

  it('ignores repeated releases of a ticket', async () => {
    const ticket = await lock.acquireReaderLock();

    ticket.release();
    ticket.release();

    expect(ticket.isReleased).toBe(true);
    expect(lock.getStats().activeReaders).toBe(0);
  });

  it('overlaps reader work', async () => {
    let active = 0;
    let maxActive = 0;
    const work = async (): Promise<void> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await pause(5);
      active--;
    };

    await Promise.all([lock.withReaderLock(work), lock.withReaderLock(work), lock.withReaderLock(work)]);

    expect(maxActive).toBe(3);
  });
});

describe('AsyncReaderWriterLock writer lane', () => {
  let lock: AsyncReaderWriterLock;

  beforeEach(() => {
    lock = new AsyncReaderWriterLock();
  });

  it('holds a writer back until readers release', async () => {
    const reader = await lock.acquireReaderLock();
    let admitted = false;
    const writer = lock.acquireWriterLock().then((ticket) => {
      admitted = true;
      return ticket;
    });

    await flush();
    expect(admitted).toBe(false);
    expect(lock.getStats().queuedWriters).toBe(1);

    reader.release();
    const ticket = await writer;

    expect(admitted).toBe(true);
    expect(ticket.isExclusive).toBe(true);
    expect(lock.getStats().writerActive).toBe(true);
  });

  it('queues readers that arrive behind a waiting writer', async () => {
    const reader = await lock.acquireReaderLock();
    const order: string[] = [];
    const writer = lock.acquireWriterLock().then((ticket) => {
      order.push('writer');
      return ticket;
    });
    const lateReader = lock.acquireReaderLock().then((ticket) => {
      order.push('reader');
      return ticket;
    });

    await flush();
    expect(order).toEqual([]);

    reader.release();
    const writerTicket = await writer;
    await flush();
    expect(order).toEqual(['writer']);

    writerTicket.release();
    (await lateReader).release();
    expect(order).toEqual(['writer', 'reader']);
  });

  it('runs writer work one at a time', async () => {
    let active = 0;
    let maxActive = 0;
    const work = async (): Promise<void> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await pause(5);
      active--;
    };

    await Promise.all([lock.withWriterLock(work), lock.withWriterLock(work), lock.withWriterLock(work)]);

    expect(maxActive).toBe(1);
  });

  it('releases the lane when the work throws', async () => {
    await expect(
      lock.withWriterLock(() => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    expect(lock.getStats().writerActive).toBe(false);
  });

  it('runs the work on the given execution context', async () => {
    const executionContext = new RecordingContext();

    const result = await lock.withWriterLock(() => 42, { executionContext });

    expect(result).toBe(42);
    expect(executionContext.calls).toBe(1);
  });
});

describe('AsyncReaderWriterLock cancellation', () => {
  it('rejects an already canceled acquisition', async () => {
    const lock = new AsyncReaderWriterLock();
    const controller = new AbortController();
    controller.abort();

    await expect(lock.acquireWriterLock({ signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCanceledError
    );
  });

  it('drops a canceled waiter and admits those behind it', async () => {
    const lock = new AsyncReaderWriterLock();
    const reader = await lock.acquireReaderLock();
    const controller = new AbortController();
    const writer = lock.acquireWriterLock({ signal: controller.signal });
    const assertion = expect(writer).rejects.toBeInstanceOf(OperationCanceledError);
    const lateReader = lock.acquireReaderLock();

    controller.abort();
    await assertion;
    const lateTicket = await lateReader;

    expect(lock.getStats()).toEqual({
      activeReaders: 2,
      writerActive: false,
      queuedReaders: 0,
      queuedWriters: 0,
    });
    reader.release();
    lateTicket.release();
  });

  it('does not run the work when canceled while queued', async () => {
    const lock = new AsyncReaderWriterLock();
    const writer = await lock.acquireWriterLock();
    const controller = new AbortController();
    let ran = false;
    const queued = lock.withReaderLock(
      () => {
        ran = true;
      },
      { signal: controller.signal }
    );
    const assertion = expect(queued).rejects.toBeInstanceOf(OperationCanceledError);

    controller.abort();
    writer.release();

    await assertion;
    expect(ran).toBe(false);
    expect(lock.getStats().activeReaders).toBe(0);
  });
});

describe('AsyncReaderWriterLock.dispose', () => {
  it('waits for held tickets', async () => {
    const lock = new AsyncReaderWriterLock();
    const reader = await lock.acquireReaderLock();
    let disposed = false;
    const disposal = lock.dispose().then(() => {
      disposed = true;
    });

    await flush();
    expect(disposed).toBe(false);

    reader.release();
    await disposal;

    expect(disposed).toBe(true);
    expect(lock.isDisposed).toBe(true);
  });

  it('rejects acquisitions once disposal has started', async () => {
    const lock = new AsyncReaderWriterLock();
    const disposal = lock.dispose();

    await expect(lock.acquireReaderLock()).rejects.toBeInstanceOf(ObjectDisposedError);
    await expect(lock.acquireWriterLock()).rejects.toBeInstanceOf(ObjectDisposedError);
    await disposal;
  });

  it('shares a single completion between calls', async () => {
    const lock = new AsyncReaderWriterLock();

    const first = lock.dispose();
    const second = lock.dispose();

    expect(second).toBe(first);
    await first;
  });
});
