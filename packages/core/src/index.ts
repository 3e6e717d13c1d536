/**
 * @vault-hierarchy/core
 *
 * Path-derived Program → Course → Class → Module metadata for Markdown vaults.
 */

export * from './types.js';
export * from './errors.js';
export {
  classifyPath,
  normalizeVaultPath,
  isAbsoluteVaultPath,
  isIndexFileName,
} from './paths.js';
export {
  MAX_LEVEL_BY_INDEX_TYPE,
  deriveIndexType,
  isIndexType,
  maxLevelFor,
  validateIndexType,
} from './indexType.js';
export {
  fieldLevel,
  isHierarchyField,
  resolveCanonicalValues,
} from './resolver.js';
export { partitionFrontmatter, reconcileFrontmatter } from './reconciler.js';
export { ClassificationCache } from './cache.js';
export { detectAndReconcile, type DetectOptions } from './detector.js';
