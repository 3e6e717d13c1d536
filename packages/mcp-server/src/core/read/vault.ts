/**
 * Vault scanner - finds all markdown notes under the vault root
 */

import * as fs from 'fs';
import * as path from 'path';
import { serverLog } from '../shared/serverLog.js';

/** Directories never scanned (hidden directories are skipped as well) */
const EXCLUDED_DIRS = new Set([
  '.obsidian',
  '.trash',
  '.git',
  'node_modules',
]);

/** File info returned by the scanner */
export interface VaultFile {
  path: string;        // Relative path from vault root, forward slashes
  absolutePath: string;
  modified: Date;
}

export function isExcludedDirectory(name: string): boolean {
  return EXCLUDED_DIRS.has(name) || name.startsWith('.');
}

/**
 * Recursively scan a vault directory for markdown files, sorted by path.
 */
export async function scanVault(vaultPath: string): Promise<VaultFile[]> {
  const files: VaultFile[] = [];

  async function scan(dir: string, relativePath: string = ''): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      // Unreadable directories (permissions etc.) are skipped, not fatal
      serverLog('batch', `Could not read directory ${dir}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
      return;
    }

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      const relPath = relativePath ? `${relativePath}/${entry.name}` : entry.name;

      if (entry.isDirectory()) {
        if (isExcludedDirectory(entry.name)) {
          continue;
        }
        await scan(fullPath, relPath);
      } else if ((entry.isFile() || entry.isSymbolicLink()) && entry.name.toLowerCase().endsWith('.md')) {
        if (entry.name.startsWith('.')) {
          continue;
        }
        try {
          const stats = await fs.promises.stat(fullPath);
          files.push({
            path: relPath,
            absolutePath: fullPath,
            modified: stats.mtime,
          });
        } catch (err) {
          // Broken or looping symlinks still go to the batch, which records the failure
          if (entry.isSymbolicLink()) {
            files.push({ path: relPath, absolutePath: fullPath, modified: new Date(0) });
          } else {
            serverLog('batch', `Could not stat ${fullPath}: ${err instanceof Error ? err.message : String(err)}`, 'warn');
          }
        }
      }
    }
  }

  await scan(vaultPath);
  files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  return files;
}
