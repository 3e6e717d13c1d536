/**
 * Canonical hierarchy values from folder names
 */

import { maxLevelFor } from './indexType.js';
import {
  HIERARCHY_FIELDS,
  type CanonicalHierarchy,
  type HierarchyField,
  type IndexType,
  type PathClassification,
} from './types.js';

export function isHierarchyField(key: string): key is HierarchyField {
  return (HIERARCHY_FIELDS as readonly string[]).includes(key);
}

/** Level of a hierarchy field: program 1 through module 4. */
export function fieldLevel(field: HierarchyField): number {
  return HIERARCHY_FIELDS.indexOf(field) + 1;
}

/**
 * Map each applicable hierarchy field to the folder name at its depth.
 *
 * Folder names are used exactly as they appear on disk. Index types with
 * maxLevel 0 (main) get an empty mapping.
 */
export function resolveCanonicalValues(
  classification: PathClassification,
  indexType: IndexType
): CanonicalHierarchy {
  const maxLevel = maxLevelFor(classification, indexType);
  const canonical: CanonicalHierarchy = {};

  for (const field of HIERARCHY_FIELDS) {
    const level = fieldLevel(field);
    if (level > maxLevel) break;

    const folder = classification.segments[level - 1];
    if (folder === undefined) break;
    canonical[field] = folder;
  }

  return canonical;
}
