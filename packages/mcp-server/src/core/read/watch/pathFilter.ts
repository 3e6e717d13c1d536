/**
 * Path filtering for the metadata watcher
 *
 * Only markdown notes outside system directories reach the reconciler.
 */

import path from 'path';

/**
 * Directories to always ignore, on top of any hidden directory
 */
const IGNORED_DIRECTORIES: Set<string> = new Set([
  'node_modules',
  '__pycache__',
]);

/**
 * Editor and OS droppings that can end in .md
 */
const IGNORED_PATTERNS = [
  /^\.#/,          // Emacs lock files (.#filename)
  /~$/,            // Backup files (filename~)
  /^#.*#$/,        // Emacs auto-save (#filename#)
  /\.orig$/,       // Merge conflict originals
  /\.sync-conflict-/i,
];

function isIgnoredDirectory(segment: string): boolean {
  return segment.startsWith('.') || IGNORED_DIRECTORIES.has(segment);
}

/**
 * Convert backslashes to forward slashes
 */
export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/**
 * Get relative path from vault root, forward slashes
 */
export function getRelativePath(vaultPath: string, filePath: string): string {
  return normalizePath(path.relative(vaultPath, filePath));
}

/**
 * Check if a file should be reconciled by the watcher
 */
export function shouldWatch(filePath: string, vaultPath: string): boolean {
  const relativePath = getRelativePath(vaultPath, filePath);
  const segments = relativePath.split('/').filter(s => s.length > 0);

  if (segments.length === 0 || segments[0] === '..') {
    return false;
  }

  for (const segment of segments.slice(0, -1)) {
    if (isIgnoredDirectory(segment)) {
      return false;
    }
  }

  const filename = segments[segments.length - 1];

  if (!filename.toLowerCase().endsWith('.md')) {
    return false;
  }

  if (filename.startsWith('.')) {
    return false;
  }

  return !IGNORED_PATTERNS.some(pattern => pattern.test(filename));
}

/**
 * Create a chokidar-compatible ignore function
 *
 * Chokidar calls this for both files and directories; a directory that is
 * ignored is never descended into, so only system directories are ignored here.
 */
export function createIgnoreFunction(vaultPath: string): (filePath: string) => boolean {
  return (filePath: string): boolean => {
    const segments = getRelativePath(vaultPath, filePath).split('/').filter(s => s.length > 0);

    if (segments.length === 0) {
      return false; // Vault root
    }

    if (segments.some(isIgnoredDirectory)) {
      return true;
    }

    const lastSegment = segments[segments.length - 1];

    // Looks like a directory: let chokidar descend into it
    if (!lastSegment.toLowerCase().endsWith('.md')) {
      return false;
    }

    return !shouldWatch(filePath, vaultPath);
  };
}
