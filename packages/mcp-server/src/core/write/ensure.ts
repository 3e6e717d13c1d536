/**
 * Ensure hierarchy metadata for a single note
 *
 * read frontmatter → detectAndReconcile → log changes → write back (unless dry run)
 */

import fs from 'fs/promises';
import path from 'path';
import {
  AmbiguousDepthError,
  ClassificationCache,
  detectAndReconcile,
} from '@vault-hierarchy/core';
import { serverLog } from '../shared/serverLog.js';
import { logReconciliation } from './logging.js';
import { readVaultFile, writeVaultFile } from './writer.js';
import type { EnsureFileResult } from './types.js';

export interface EnsureOptions {
  dryRun?: boolean;
  /** Classification cache bound to the resolved vault root */
  cache?: ClassificationCache;
}

/**
 * Markdown notes only; everything else is skipped.
 */
export function isMarkdownPath(notePath: string): boolean {
  return notePath.toLowerCase().endsWith('.md');
}

/**
 * Resolve symlinks for the vault root and the note. The hierarchy is derived
 * from where the note really lives.
 */
export async function resolveRealPaths(
  vaultPath: string,
  notePath: string
): Promise<{ realVault: string; realFile: string }> {
  const realVault = await fs.realpath(vaultPath);
  const fullPath = path.join(vaultPath, notePath);

  try {
    const realFile = await fs.realpath(fullPath);
    return { realVault, realFile };
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`File not found: ${notePath}`);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new AmbiguousDepthError(notePath, `could not resolve symlinks (${reason})`);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reconcile one note's Program/Course/Class/Module and index-type fields
 * with its location in the vault.
 */
export async function ensureFileMetadata(
  vaultPath: string,
  notePath: string,
  options: EnsureOptions = {}
): Promise<EnsureFileResult> {
  const { dryRun = false, cache } = options;
  const displayPath = notePath.replace(/\\/g, '/');

  if (!isMarkdownPath(notePath)) {
    return {
      path: displayPath,
      status: 'skipped',
      dryRun,
      changes: [],
      reason: 'not a markdown file',
    };
  }

  const { realVault, realFile } = await resolveRealPaths(vaultPath, notePath);
  const { content, frontmatter, lineEnding } = await readVaultFile(vaultPath, notePath);

  const detection = detectAndReconcile(realVault, realFile, frontmatter, { cache });
  const { changes, indexType, maxLevel, indexTypeValidation } = detection;

  const result: EnsureFileResult = {
    path: displayPath,
    status: changes.length > 0 ? 'updated' : 'unchanged',
    dryRun,
    changes,
    indexType,
    maxLevel,
  };

  if (!indexTypeValidation.matches) {
    result.indexTypeMismatch = { stored: indexTypeValidation.stored, derived: indexTypeValidation.derived };
    serverLog(
      'ensure',
      `${displayPath}: stored index-type ${JSON.stringify(indexTypeValidation.stored)} does not match path-derived "${indexTypeValidation.derived}"`,
      'warn'
    );
  }

  if (changes.length === 0) {
    return result;
  }

  logReconciliation(displayPath, changes, { dryRun });

  if (!dryRun) {
    await writeVaultFile(vaultPath, notePath, content, detection.frontmatter, lineEnding);
  }

  return result;
}
