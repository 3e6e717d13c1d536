/**
 * Index-type derivation and validation.
 *
 * The index type is always derived from the path. A stored `index-type`
 * value is a hint at most and never feeds back into the derivation.
 */

import {
  INDEX_TYPE_KEY,
  INDEX_TYPES,
  MAX_HIERARCHY_LEVEL,
  type Frontmatter,
  type IndexType,
  type IndexTypeValidation,
  type PathClassification,
} from './types.js';

/** Deepest hierarchy field each index type may carry. */
export const MAX_LEVEL_BY_INDEX_TYPE: Readonly<Record<Exclude<IndexType, 'none'>, number>> = {
  main: 0,
  program: 1,
  course: 2,
  class: 3,
  module: 4,
};

const INDEX_TYPE_BY_LEVEL: readonly Exclude<IndexType, 'none'>[] = ['main', 'program', 'course', 'class', 'module'];

export function isIndexType(value: unknown): value is IndexType {
  return typeof value === 'string' && (INDEX_TYPES as readonly string[]).includes(value);
}

/**
 * Index type for a classified path. Content files are `none`; index files
 * map depth 0..4 to main..module, and anything deeper stays module.
 */
export function deriveIndexType(classification: PathClassification): IndexType {
  if (!classification.isIndexFile) return 'none';
  return INDEX_TYPE_BY_LEVEL[Math.min(classification.depth, MAX_HIERARCHY_LEVEL)];
}

/**
 * Deepest hierarchy level applicable to the file.
 *
 * Content files inherit the level of their innermost folder, so a note in a
 * class folder gets program/course/class and one in a module folder also
 * gets module.
 */
export function maxLevelFor(classification: PathClassification, indexType: IndexType): number {
  if (indexType === 'none') return classification.level;
  return MAX_LEVEL_BY_INDEX_TYPE[indexType];
}

/**
 * Compare a stored `index-type` with the derived one.
 *
 * Content files match only when no `index-type` key is stored at all.
 */
export function validateIndexType(
  classification: PathClassification,
  frontmatter: Frontmatter
): IndexTypeValidation {
  const derived = deriveIndexType(classification);
  const hasStored = Object.prototype.hasOwnProperty.call(frontmatter, INDEX_TYPE_KEY);
  const stored = hasStored ? frontmatter[INDEX_TYPE_KEY] : undefined;

  const matches = derived === 'none' ? !hasStored : stored === derived;
  return { derived, stored, hasStored, matches };
}
