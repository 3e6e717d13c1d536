/**
 * Per-path debounce queue
 *
 * Bursts of add/change events on one path settle into a single reconcile once
 * the path has been quiet for `debounceMs`. An unlink cancels whatever was
 * pending for that path.
 */

import type { WatchEventType } from './types.js';
import { normalizePath } from './pathFilter.js';

interface PendingPath {
  timer: NodeJS.Timeout;
  events: number;
}

export class EventQueue {
  private pending: Map<string, PendingPath> = new Map();
  private debounceMs: number;
  private onSettled: (path: string) => void;

  constructor(debounceMs: number, onSettled: (path: string) => void) {
    this.debounceMs = debounceMs;
    this.onSettled = onSettled;
  }

  /**
   * Record an event for a path and restart its debounce timer
   */
  push(type: WatchEventType, rawPath: string): void {
    const path = normalizePath(rawPath);
    const existing = this.pending.get(path);

    if (existing) {
      clearTimeout(existing.timer);
    }

    if (type === 'unlink') {
      this.pending.delete(path);
      return;
    }

    this.pending.set(path, {
      timer: setTimeout(() => this.flushPath(path), this.debounceMs),
      events: (existing?.events ?? 0) + 1,
    });
  }

  private flushPath(path: string): void {
    const pending = this.pending.get(path);
    if (!pending) return;

    clearTimeout(pending.timer);
    this.pending.delete(path);
    this.onSettled(path);
  }

  /**
   * Settle every pending path now
   */
  flush(): void {
    for (const path of [...this.pending.keys()]) {
      this.flushPath(path);
    }
  }

  /**
   * Number of paths waiting to settle
   */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Total raw events folded into the pending paths
   */
  get eventCount(): number {
    let count = 0;
    for (const pending of this.pending.values()) {
      count += pending.events;
    }
    return count;
  }

  /**
   * Drop all pending paths without processing
   */
  clear(): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
    }
    this.pending.clear();
  }
}
