import { afterEach, describe, expect, it, vi } from 'vitest';
import { BoundedQueue, QueueClosedError } from './bounded-queue';
import { logger } from './logger';

vi.mock('./logger', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe('BoundedQueue', () => {
  let queue: BoundedQueue<string>;

  afterEach(() => {
    queue.close();
    vi.clearAllMocks();
  });

  it('rejects a capacity below one', () => {
    queue = new BoundedQueue('ok', 1);
    expect(() => new BoundedQueue('broken', 0)).toThrow(RangeError);
  });

  it('hands values to the consumer in push order', async () => {
    queue = new BoundedQueue('fifo', 5);
    const seen: string[] = [];
    void queue.consume((value) => {
      seen.push(value);
    });

    await queue.push('a');
    await queue.push('b');
    await queue.push('c');
    await queue.whenIdle();

    expect(seen).toEqual(['a', 'b', 'c']);
  });

  it('holds producers back while the queue is full', async () => {
    queue = new BoundedQueue('backpressure', 1);
    await queue.push('a');

    let secondAccepted = false;
    const second = queue.push('b').then(() => {
      secondAccepted = true;
    });
    await tick();
    expect(secondAccepted).toBe(false);
    expect(queue.depth).toBe(1);

    const seen: string[] = [];
    void queue.consume((value) => {
      seen.push(value);
    });
    await second;
    await queue.whenIdle();

    expect(secondAccepted).toBe(true);
    expect(seen).toEqual(['a', 'b']);
  });

  it('keeps draining after a handler failure', async () => {
    queue = new BoundedQueue('failing', 5);
    const seen: string[] = [];
    void queue.consume((value) => {
      if (value === 'bad') throw new Error('boom');
      seen.push(value);
    });

    await queue.push('bad');
    await queue.push('good');
    await queue.whenIdle();

    expect(seen).toEqual(['good']);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('allows a single consumer', async () => {
    queue = new BoundedQueue('single', 1);
    void queue.consume(() => undefined);

    await expect(queue.consume(() => undefined)).rejects.toThrow('Queue single already has a consumer');
  });

  it('rejects blocked and later producers once closed', async () => {
    queue = new BoundedQueue('closing', 1);
    await queue.push('a');
    const blocked = queue.push('b');

    queue.close();

    await expect(blocked).rejects.toBeInstanceOf(QueueClosedError);
    await expect(queue.push('c')).rejects.toBeInstanceOf(QueueClosedError);
    expect(queue.depth).toBe(0);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('ends the consumer loop on close', async () => {
    queue = new BoundedQueue('ending', 1);
    const consumer = queue.consume(() => undefined);
    await tick();

    queue.close();

    await expect(consumer).resolves.toBeUndefined();
    await expect(queue.whenIdle()).resolves.toBeUndefined();
  });
});
