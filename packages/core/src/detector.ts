/**
 * Hierarchy detector: path in, reconciled frontmatter out.
 *
 * classify → derive index type → resolve canonical values → reconcile.
 * Each call is pure given its inputs and safe to run in parallel across files.
 */

import type { ClassificationCache } from './cache.js';
import { deriveIndexType, maxLevelFor, validateIndexType } from './indexType.js';
import { classifyPath, normalizeVaultPath } from './paths.js';
import { reconcileFrontmatter } from './reconciler.js';
import { resolveCanonicalValues } from './resolver.js';
import type { Frontmatter, HierarchyDetectionResult } from './types.js';

export interface DetectOptions {
  /** Cache to classify through; used only when bound to the same vault root */
  cache?: ClassificationCache;
}

export function detectAndReconcile(
  vaultRoot: string,
  filePath: string,
  existing: Frontmatter,
  options: DetectOptions = {}
): HierarchyDetectionResult {
  const { cache } = options;
  const classification = cache && cache.vaultRoot === normalizeVaultPath(vaultRoot)
    ? cache.get(filePath)
    : classifyPath(vaultRoot, filePath);

  const indexTypeValidation = validateIndexType(classification, existing);
  const indexType = deriveIndexType(classification);
  const maxLevel = maxLevelFor(classification, indexType);
  const canonical = resolveCanonicalValues(classification, indexType);
  const { frontmatter, changes } = reconcileFrontmatter(existing, canonical, maxLevel, indexType);

  return {
    frontmatter,
    changes,
    classification,
    indexType,
    maxLevel,
    canonical,
    indexTypeValidation,
  };
}
