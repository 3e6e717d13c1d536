/**
 * Types for the metadata watcher
 */

/**
 * Configuration for the metadata watcher
 */
export interface WatcherConfig {
  /** Quiet period per path before the note is reconciled (default: 500) */
  debounceMs: number;

  /** Force polling mode instead of native watchers (default: false) */
  usePolling: boolean;

  /** Polling interval when in polling mode (default: 5000) */
  pollInterval: number;

  /** Log changes without writing them (default: false) */
  dryRun: boolean;
}

export const DEFAULT_WATCHER_CONFIG: WatcherConfig = {
  debounceMs: 500,
  usePolling: false,
  pollInterval: 5000,
  dryRun: false,
};

/**
 * Raw chokidar event types the watcher cares about
 */
export type WatchEventType = 'add' | 'change' | 'unlink';

export type WatcherState = 'idle' | 'ready' | 'processing' | 'error' | 'stopped';

/**
 * Watcher status info
 */
export interface WatcherStatus {
  state: WatcherState;
  pendingPaths: number;
  /** Raw events folded into paths that have not settled yet */
  pendingEvents: number;
  processedCount: number;
  failedCount: number;
  lastProcessed: number | null;
  error: Error | null;
}
