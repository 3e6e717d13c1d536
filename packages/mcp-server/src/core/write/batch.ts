/**
 * Batch ensure: reconcile every note in a vault
 *
 * Each file is isolated. A file that fails is recorded and the batch moves on;
 * the failed paths are written to the vault's failed-file list so a later run
 * can retry just those.
 */

import fs from 'fs/promises';
import path from 'path';
import { ClassificationCache, isVaultHierarchyError } from '@vault-hierarchy/core';
import { scanVault } from '../read/vault.js';
import { serverLog } from '../shared/serverLog.js';
import { DEFAULT_CONCURRENCY, FAILED_FILES_LIST } from './constants.js';
import { ensureFileMetadata } from './ensure.js';
import type { BatchResult, EnsureFileResult, FileFailure } from './types.js';

export interface BatchOptions {
  dryRun?: boolean;
  /** Process only the files listed in the failed-file list */
  retryFailed?: boolean;
  /** Files processed in parallel (default 4) */
  concurrency?: number;
}

/**
 * Read the failed-file list. Missing list means nothing to retry.
 */
export async function readFailedList(vaultPath: string): Promise<string[] | null> {
  try {
    const raw = await fs.readFile(path.join(vaultPath, FAILED_FILES_LIST), 'utf-8');
    return raw
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export async function writeFailedList(vaultPath: string, failures: FileFailure[]): Promise<void> {
  const body = failures.map(f => f.path).join('\n') + '\n';
  await fs.writeFile(path.join(vaultPath, FAILED_FILES_LIST), body, 'utf-8');
}

export async function removeFailedList(vaultPath: string): Promise<boolean> {
  const listPath = path.join(vaultPath, FAILED_FILES_LIST);
  try {
    await fs.access(listPath);
  } catch {
    return false;
  }
  await fs.rm(listPath, { force: true });
  return true;
}

function failureCode(error: unknown): string {
  if (isVaultHierarchyError(error)) {
    return error.code;
  }
  if (error instanceof Error && error.name === 'YAMLException') {
    return 'PARSE_ERROR';
  }
  return 'IO_ERROR';
}

/**
 * Run `worker` over `items` with at most `limit` in flight.
 */
async function runWithConcurrency<T>(
  items: T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  let next = 0;
  const runners = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      await worker(items[index], index);
    }
  });
  await Promise.all(runners);
}

/**
 * Ensure hierarchy metadata for every markdown note in the vault (or, with
 * retryFailed, for the notes in the failed-file list).
 */
export async function ensureVaultMetadata(
  vaultPath: string,
  options: BatchOptions = {}
): Promise<BatchResult> {
  const { dryRun = false, retryFailed = false, concurrency = DEFAULT_CONCURRENCY } = options;

  let notePaths: string[];
  if (retryFailed) {
    const listed = await readFailedList(vaultPath);
    if (listed === null) {
      serverLog('batch', `No ${FAILED_FILES_LIST} found, nothing to retry`);
      notePaths = [];
    } else {
      notePaths = listed;
    }
  } else {
    const files = await scanVault(vaultPath);
    notePaths = files.map(f => f.path);
  }

  const realVault = await fs.realpath(vaultPath);
  const cache = new ClassificationCache(realVault);

  const outcomes: Array<EnsureFileResult | FileFailure> = new Array(notePaths.length);

  await runWithConcurrency(notePaths, concurrency, async (notePath, index) => {
    try {
      outcomes[index] = await ensureFileMetadata(vaultPath, notePath, { dryRun, cache });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      serverLog('batch', `${notePath}: ${message}`, 'error');
      outcomes[index] = { path: notePath, code: failureCode(error), message };
    }
  });

  const results: EnsureFileResult[] = [];
  const failures: FileFailure[] = [];
  for (const outcome of outcomes) {
    if ('code' in outcome) {
      failures.push(outcome);
    } else {
      results.push(outcome);
    }
  }

  const skippedFiles = results.filter(r => r.status === 'skipped').length;
  const updatedFiles = results.filter(r => r.status === 'updated').length;

  const batch: BatchResult = {
    success: failures.length === 0,
    dryRun,
    totalFiles: notePaths.length,
    processedFiles: results.length - skippedFiles,
    updatedFiles,
    skippedFiles,
    failedFiles: failures.length,
    failures,
    results,
  };

  if (!dryRun) {
    if (failures.length > 0) {
      await writeFailedList(vaultPath, failures);
      batch.failedListPath = FAILED_FILES_LIST;
      serverLog('batch', `Wrote ${failures.length} failed path(s) to ${FAILED_FILES_LIST}`, 'warn');
    } else if (await removeFailedList(vaultPath)) {
      serverLog('batch', `Removed stale ${FAILED_FILES_LIST}`);
    }
  }

  const prefix = dryRun ? '[DRY RUN] ' : '';
  serverLog(
    'batch',
    `${prefix}Processed ${batch.processedFiles}/${batch.totalFiles} files: ${updatedFiles} updated, ${skippedFiles} skipped, ${failures.length} failed`
  );

  return batch;
}
