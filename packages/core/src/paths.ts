/**
 * Path classification: where a file sits in the Program → Course → Class →
 * Module folder tree.
 *
 * Pure string work on normalized paths. Nothing here touches the filesystem,
 * so symlinks must be resolved by the caller before classifying.
 */

import path from 'path';
import { AmbiguousDepthError, OutOfVaultError } from './errors.js';
import { MAX_HIERARCHY_LEVEL, type PathClassification } from './types.js';

const DRIVE_ROOT_REGEX = /^[a-zA-Z]:\/$/;
const DRIVE_PREFIX_REGEX = /^[a-zA-Z]:\//;

/**
 * Normalize a path for comparison: forward slashes, collapsed `.`/`..` and
 * duplicate separators, no trailing separator. Case is preserved.
 */
export function normalizeVaultPath(input: string): string {
  const slashed = input.trim().replace(/\\/g, '/');
  if (slashed === '') return '';

  let normalized = path.posix.normalize(slashed);
  while (normalized.length > 1 && normalized.endsWith('/') && !DRIVE_ROOT_REGEX.test(normalized)) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

export function isAbsoluteVaultPath(input: string): boolean {
  const slashed = input.replace(/\\/g, '/');
  return slashed.startsWith('/') || DRIVE_PREFIX_REGEX.test(slashed);
}

function splitSegments(normalized: string): string[] {
  return normalized.split('/').filter(segment => segment.length > 0);
}

/**
 * Index files are named after their containing folder (`Finance/Finance.md`)
 * or are a folder's `index.md`.
 */
export function isIndexFileName(fileName: string, folderName: string): boolean {
  const ext = path.posix.extname(fileName);
  if (ext.toLowerCase() !== '.md') return false;

  const stem = fileName.slice(0, -ext.length).toLowerCase();
  return stem === 'index' || (folderName !== '' && stem === folderName.toLowerCase());
}

/**
 * Classify a file's position under the vault root.
 *
 * Relative file paths are taken relative to the vault root. Containment is
 * checked segment by segment, ignoring case.
 *
 * @throws OutOfVaultError when the file is not below the vault root
 * @throws AmbiguousDepthError when the file is the vault root itself or a path is empty
 */
export function classifyPath(vaultRoot: string, filePath: string): PathClassification {
  const root = normalizeVaultPath(vaultRoot);
  if (root === '') {
    throw new AmbiguousDepthError(filePath, 'vault root is empty');
  }

  const joined = isAbsoluteVaultPath(filePath) ? filePath : `${root}/${filePath}`;
  const file = normalizeVaultPath(joined);
  if (normalizeVaultPath(filePath) === '') {
    throw new AmbiguousDepthError(filePath, 'file path is empty');
  }

  const rootSegments = splitSegments(root);
  const fileSegments = splitSegments(file);

  const insideRoot =
    isAbsoluteVaultPath(root) === isAbsoluteVaultPath(file) &&
    fileSegments.length >= rootSegments.length &&
    rootSegments.every((segment, i) => segment.toLowerCase() === fileSegments[i].toLowerCase());

  if (!insideRoot) {
    throw new OutOfVaultError(root, file);
  }

  const relative = fileSegments.slice(rootSegments.length);
  if (relative.length === 0) {
    throw new AmbiguousDepthError(file, 'path is the vault root itself');
  }

  const fileName = relative[relative.length - 1];
  const segments = relative.slice(0, -1);
  const containingFolder = segments.length > 0
    ? segments[segments.length - 1]
    : rootSegments[rootSegments.length - 1] ?? '';

  return {
    vaultRoot: root,
    filePath: file,
    relativePath: relative.join('/'),
    segments,
    depth: segments.length,
    level: Math.min(segments.length, MAX_HIERARCHY_LEVEL),
    fileName,
    isIndexFile: isIndexFileName(fileName, containingFolder),
  };
}
