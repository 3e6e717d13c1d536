/**
 * Metadata watcher
 *
 * Watches the vault with chokidar and reconciles each note once its events
 * have settled. Notes are processed one at a time. The watcher's own writes
 * come back as change events, and reconciling them again finds nothing to do.
 */

import fs from 'fs/promises';
import { watch, type FSWatcher } from 'chokidar';
import { ClassificationCache } from '@vault-hierarchy/core';
import { ensureFileMetadata } from '../../write/ensure.js';
import type { EnsureFileResult } from '../../write/types.js';
import { serverLog } from '../../shared/serverLog.js';
import { EventQueue } from './eventQueue.js';
import { createIgnoreFunction, getRelativePath, shouldWatch } from './pathFilter.js';
import {
  DEFAULT_WATCHER_CONFIG,
  type WatchEventType,
  type WatcherConfig,
  type WatcherState,
  type WatcherStatus,
} from './types.js';

export { DEFAULT_WATCHER_CONFIG, type WatcherConfig, type WatcherStatus };
export { shouldWatch, normalizePath, getRelativePath } from './pathFilter.js';

export interface CreateWatcherOptions {
  /** Path to the vault root */
  vaultPath: string;

  config?: Partial<WatcherConfig>;

  /** Called after each note is reconciled */
  onResult?: (result: EnsureFileResult) => void;

  /** Called when a note cannot be reconciled */
  onError?: (notePath: string, error: Error) => void;
}

export interface MetadataWatcher {
  readonly status: WatcherStatus;

  /** Paths waiting for their debounce or for processing */
  readonly pendingCount: number;

  start(): void;

  stop(): Promise<void>;

  /** Feed a raw file event (chokidar handlers call this) */
  enqueue(type: WatchEventType, filePath: string): void;

  /** Settle all debounced paths immediately */
  flush(): void;

  /** Resolves once nothing is being processed */
  idle(): Promise<void>;
}

export function createMetadataWatcher(options: CreateWatcherOptions): MetadataWatcher {
  const { vaultPath, onResult, onError } = options;
  const config: WatcherConfig = { ...DEFAULT_WATCHER_CONFIG, ...options.config };

  let state: WatcherState = 'idle';
  let error: Error | null = null;
  let processedCount = 0;
  let failedCount = 0;
  let lastProcessed: number | null = null;
  let watcher: FSWatcher | null = null;
  let cache: ClassificationCache | null = null;

  const ready: string[] = [];
  let drainPromise: Promise<void> | null = null;

  const processPath = async (filePath: string): Promise<void> => {
    const notePath = getRelativePath(vaultPath, filePath);
    state = 'processing';

    try {
      if (!cache) {
        cache = new ClassificationCache(await fs.realpath(vaultPath));
      }
      const result = await ensureFileMetadata(vaultPath, notePath, { dryRun: config.dryRun, cache });
      processedCount++;
      lastProcessed = Date.now();
      state = 'ready';
      onResult?.(result);
    } catch (err) {
      const e = err instanceof Error ? err : new Error(String(err));
      failedCount++;
      error = e;
      state = 'error';
      serverLog('watcher', `${notePath}: ${e.message}`, 'error');
      onError?.(notePath, e);
    }
  };

  const drain = async (): Promise<void> => {
    while (ready.length > 0) {
      const next = ready.shift();
      if (next === undefined) break;
      await processPath(next);
    }
  };

  const schedule = (filePath: string): void => {
    if (!ready.includes(filePath)) {
      ready.push(filePath);
    }
    if (!drainPromise) {
      drainPromise = drain().finally(() => {
        drainPromise = null;
      });
    }
  };

  const eventQueue = new EventQueue(config.debounceMs, schedule);

  const instance: MetadataWatcher = {
    get status(): WatcherStatus {
      return {
        state,
        pendingPaths: eventQueue.size + ready.length,
        pendingEvents: eventQueue.eventCount,
        processedCount,
        failedCount,
        lastProcessed,
        error,
      };
    },

    get pendingCount() {
      return eventQueue.size + ready.length;
    },

    start() {
      if (watcher) {
        serverLog('watcher', 'Watcher already started', 'warn');
        return;
      }

      serverLog('watcher', `Starting file watcher (debounce: ${config.debounceMs}ms, polling: ${config.usePolling}, dryRun: ${config.dryRun})`);

      watcher = watch(vaultPath, {
        ignored: createIgnoreFunction(vaultPath),
        persistent: true,
        ignoreInitial: true,
        awaitWriteFinish: {
          stabilityThreshold: 300,
          pollInterval: 100,
        },
        usePolling: config.usePolling,
        interval: config.usePolling ? config.pollInterval : undefined,
      });

      watcher.on('add', (path) => instance.enqueue('add', path));
      watcher.on('change', (path) => instance.enqueue('change', path));
      watcher.on('unlink', (path) => instance.enqueue('unlink', path));

      watcher.on('ready', () => {
        state = 'ready';
        serverLog('watcher', 'File watcher ready');
      });

      watcher.on('error', (err) => {
        const e = err instanceof Error ? err : new Error(String(err));
        state = 'error';
        error = e;
        serverLog('watcher', `Watcher error: ${e.message}`, 'error');
      });
    },

    async stop() {
      eventQueue.clear();
      if (watcher) {
        await watcher.close();
        watcher = null;
      }
      await instance.idle();
      state = 'stopped';
      serverLog('watcher', 'File watcher stopped');
    },

    enqueue(type, filePath) {
      if (!shouldWatch(filePath, vaultPath)) {
        return;
      }
      eventQueue.push(type, filePath);
    },

    flush() {
      eventQueue.flush();
    },

    async idle() {
      while (drainPromise) {
        await drainPromise;
      }
    },
  };

  return instance;
}
