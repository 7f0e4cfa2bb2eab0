import { describe, it, expect, beforeEach } from 'vitest';
import { ProjectionQueue } from './queue.js';

describe('ProjectionQueue', () => {
  let queue: ProjectionQueue;

  beforeEach(() => {
    queue = new ProjectionQueue();
  });

  it('keeps one pending task per id and lets newer versions supersede it', () => {
    expect(queue.enqueue('lead', 'l1', 1, 0)).toBe('queued');
    expect(queue.enqueue('lead', 'l1', 3, 10)).toBe('superseded');
    expect(queue.enqueue('lead', 'l1', 2, 20)).toBe('ignored');

    expect(queue.size).toBe(1);
    expect(queue.pendingVersion('lead', 'l1')).toBe(3);
    expect(queue.oldestEnqueuedAt()).toBe(0);
  });

  it('tracks ids of different entity types separately', () => {
    queue.enqueue('lead', 'x', 1, 0);
    queue.enqueue('offer', 'x', 1, 0);
    expect(queue.size).toBe(2);
  });

  it('never hands out an id that is already in flight', () => {
    queue.enqueue('lead', 'l1', 1, 0);
    const first = queue.take(0);
    expect(first?.version).toBe(1);

    expect(queue.enqueue('lead', 'l1', 2, 5)).toBe('queued');
    expect(queue.take(5)).toBeNull();
    expect(queue.inFlightCount).toBe(1);

    if (first) queue.complete(first);
    expect(queue.take(5)?.version).toBe(2);
  });

  it('holds retried tasks back until they are due', () => {
    queue.enqueue('offer', 'o1', 4, 0);
    const task = queue.take(0);
    expect(task).not.toBeNull();
    if (!task) return;

    queue.retry(task, 100);
    expect(queue.nextDueAt()).toBe(100);
    expect(queue.take(50)).toBeNull();

    const again = queue.take(100);
    expect(again?.attempts).toBe(1);
    expect(again?.version).toBe(4);
  });

  it('merges a failed task into a newer one queued meanwhile', () => {
    queue.enqueue('lead', 'l1', 1, 0);
    const task = queue.take(0);
    if (!task) throw new Error('expected a task');

    queue.enqueue('lead', 'l1', 2, 5);
    queue.retry(task, 500);

    expect(queue.size).toBe(1);
    expect(queue.pendingVersion('lead', 'l1')).toBe(2);
    expect(queue.oldestEnqueuedAt()).toBe(0);
    // The newer change is not held back by the older failure.
    expect(queue.take(5)?.version).toBe(2);
  });

  it('reports nothing due when empty', () => {
    expect(queue.take(0)).toBeNull();
    expect(queue.nextDueAt()).toBeNull();
    expect(queue.oldestEnqueuedAt()).toBeNull();
  });
});
