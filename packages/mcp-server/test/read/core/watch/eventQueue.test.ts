/**
 * Tests for the per-path debounce queue
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { EventQueue } from '../../../../src/core/read/watch/eventQueue.js';

describe('EventQueue', () => {
  let settled: string[];
  let queue: EventQueue;

  beforeEach(() => {
    vi.useFakeTimers();
    settled = [];
    queue = new EventQueue(100, (path) => {
      settled.push(path);
    });
  });

  afterEach(() => {
    queue.clear();
    vi.useRealTimers();
  });

  it('should fold a burst of events on one path into one settle', () => {
    queue.push('change', '/vault/a.md');
    queue.push('change', '/vault/a.md');
    queue.push('change', '/vault/a.md');

    expect(queue.size).toBe(1);
    expect(queue.eventCount).toBe(3);

    vi.advanceTimersByTime(99);
    expect(settled).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(settled).toEqual(['/vault/a.md']);
    expect(queue.size).toBe(0);
  });

  it('should restart the timer on every event', () => {
    queue.push('add', '/vault/a.md');
    vi.advanceTimersByTime(80);
    queue.push('change', '/vault/a.md');
    vi.advanceTimersByTime(80);

    expect(settled).toEqual([]);

    vi.advanceTimersByTime(20);
    expect(settled).toEqual(['/vault/a.md']);
  });

  it('should settle paths independently', () => {
    queue.push('change', '/vault/a.md');
    vi.advanceTimersByTime(50);
    queue.push('change', '/vault/b.md');

    vi.advanceTimersByTime(60);
    expect(settled).toEqual(['/vault/a.md']);

    vi.advanceTimersByTime(50);
    expect(settled).toEqual(['/vault/a.md', '/vault/b.md']);
  });

  it('should cancel a pending path on unlink', () => {
    queue.push('add', '/vault/a.md');
    queue.push('unlink', '/vault/a.md');

    expect(queue.size).toBe(0);
    vi.advanceTimersByTime(500);
    expect(settled).toEqual([]);
  });

  it('should settle everything on flush', () => {
    queue.push('change', '/vault/b.md');
    queue.push('change', '/vault/a.md');

    queue.flush();

    expect(settled).toEqual(['/vault/b.md', '/vault/a.md']);
    vi.advanceTimersByTime(500);
    expect(settled).toHaveLength(2);
  });

  it('should drop pending paths on clear', () => {
    queue.push('change', '/vault/a.md');
    queue.clear();

    vi.advanceTimersByTime(500);
    expect(settled).toEqual([]);
  });

  it('should normalize backslashes', () => {
    queue.push('change', 'C:\\vault\\a.md');
    queue.flush();

    expect(settled).toEqual(['C:/vault/a.md']);
  });
});
