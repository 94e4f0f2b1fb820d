import { describe, it, expect } from 'vitest';
import { ReadyQueue } from './ready-queue.js';

describe('ReadyQueue', () => {
  it('is FIFO across batches and sorted within a batch', () => {
    const queue = new ReadyQueue();
    queue.enqueueBatch(['c', 'a']);
    queue.enqueueBatch(['b']);

    expect(queue.toArray()).toEqual(['a', 'c', 'b']);
    expect(queue.shift()).toBe('a');
    expect(queue.size).toBe(2);
  });

  it('ignores ids already queued', () => {
    const queue = new ReadyQueue();
    queue.enqueueBatch(['a', 'a']);
    queue.enqueueBatch(['a', 'b']);
    expect(queue.toArray()).toEqual(['a', 'b']);
  });

  it('remove and drain', () => {
    const queue = new ReadyQueue();
    queue.enqueueBatch(['a', 'b', 'c']);

    expect(queue.remove('b')).toBe(true);
    expect(queue.remove('b')).toBe(false);
    expect(queue.drain()).toEqual(['a', 'c']);
    expect(queue.shift()).toBeUndefined();
  });
});
