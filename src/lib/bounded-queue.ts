/**
 * Bounded FIFO queue with a single serial consumer.
 *
 * Capacity is held by an async-mutex Semaphore: `push` waits for a free
 * slot, which is how a fast producer gets slowed down to the consumer's
 * pace. The slot is given back as soon as the consumer takes the item.
 */

import { E_CANCELED, Semaphore } from 'async-mutex';
import { logger } from './logger';

export class QueueClosedError extends Error {
  constructor(queueName: string) {
    super(`Queue ${queueName} is closed`);
    this.name = 'QueueClosedError';
  }
}

interface QueueEntry<T> {
  value: T;
  release: () => void;
}

export class BoundedQueue<T> {
  private readonly entries: QueueEntry<T>[] = [];
  private readonly slots: Semaphore;
  private wakeConsumer: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private inFlight = 0;
  private consuming = false;
  private closed = false;

  constructor(
    readonly name: string,
    readonly capacity: number
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue ${name}: capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Semaphore(capacity);
  }

  /** Items waiting to be consumed */
  get depth(): number {
    return this.entries.length;
  }

  /**
   * Enqueue a value, waiting while the queue is full.
   * @throws QueueClosedError if the queue is closed before a slot frees up
   */
  async push(value: T): Promise<void> {
    if (this.closed) {
      throw new QueueClosedError(this.name);
    }

    let release: () => void;
    try {
      [, release] = await this.slots.acquire();
    } catch (error) {
      if (error === E_CANCELED) {
        throw new QueueClosedError(this.name);
      }
      throw error;
    }

    if (this.closed) {
      release();
      throw new QueueClosedError(this.name);
    }

    this.entries.push({ value, release });
    this.wakeConsumer?.();
  }

  /**
   * Drain the queue until it is closed, one value at a time.
   * A handler failure is logged and the loop moves on to the next value.
   */
  async consume(handler: (value: T) => Promise<void> | void): Promise<void> {
    if (this.consuming) {
      throw new Error(`Queue ${this.name} already has a consumer`);
    }
    this.consuming = true;

    while (!this.closed) {
      const entry = this.entries.shift();
      if (!entry) {
        await new Promise<void>((resolve) => {
          this.wakeConsumer = resolve;
        });
        this.wakeConsumer = null;
        continue;
      }

      entry.release();
      this.inFlight++;
      try {
        await handler(entry.value);
      } catch (error) {
        logger.error({ err: error, queue: this.name }, `[Queue:${this.name}] Handler failed, value dropped`);
      } finally {
        this.inFlight--;
        this.notifyIfIdle();
      }
    }

    this.consuming = false;
  }

  /**
   * Resolves once nothing is buffered and no value is being handled.
   */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop draining. Buffered values are discarded; a value already being
   * handled runs to completion. Producers waiting for a slot get
   * QueueClosedError.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    const dropped = this.entries.splice(0);
    for (const entry of dropped) {
      entry.release();
    }
    if (dropped.length > 0) {
      logger.warn({ queue: this.name, dropped: dropped.length }, `[Queue:${this.name}] Closed with pending values`);
    }

    this.slots.cancel();
    this.wakeConsumer?.();
    this.flushIdleWaiters();
  }

  private isIdle(): boolean {
    return this.closed || (this.entries.length === 0 && this.inFlight === 0);
  }

  private notifyIfIdle(): void {
    if (this.isIdle()) {
      this.flushIdleWaiters();
    }
  }

  private flushIdleWaiters(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
