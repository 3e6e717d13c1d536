/**
 * Frontmatter reconciliation
 *
 * Brings a file's hierarchy fields and `index-type` into agreement with the
 * values derived from its path:
 *
 * - applicable fields are added when missing and overwritten when they hold
 *   anything other than the canonical string (empty, a list, another name)
 * - fields deeper than maxLevel are removed, whatever they hold
 * - index files carry the derived `index-type`; content files carry none
 * - every other key is copied through untouched, in its original order
 *
 * The input is never mutated, and reconciling the output again produces no
 * changes.
 */

import { fieldLevel, isHierarchyField } from './resolver.js';
import {
  HIERARCHY_FIELDS,
  INDEX_TYPE_KEY,
  type CanonicalHierarchy,
  type FieldChange,
  type Frontmatter,
  type IndexType,
  type PartitionedFrontmatter,
  type ReconciliationResult,
} from './types.js';

function hasOwn(obj: Frontmatter, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}

/**
 * Assign as an own data property, so keys such as `__proto__` coming from
 * parsed YAML stay plain keys.
 */
function assignField(target: Frontmatter, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

/**
 * Split frontmatter into hierarchy fields, `index-type` and passthrough keys.
 */
export function partitionFrontmatter(frontmatter: Frontmatter): PartitionedFrontmatter {
  const partitioned: PartitionedFrontmatter = {
    hierarchy: {},
    hasIndexType: false,
    passthrough: {},
  };

  for (const [key, value] of Object.entries(frontmatter)) {
    if (isHierarchyField(key)) {
      partitioned.hierarchy[key] = value;
    } else if (key === INDEX_TYPE_KEY) {
      partitioned.indexType = value;
      partitioned.hasIndexType = true;
    } else {
      assignField(partitioned.passthrough, key, value);
    }
  }

  return partitioned;
}

/**
 * Reconcile existing frontmatter against the canonical hierarchy.
 *
 * Works from the partitioned input: hierarchy fields and `index-type` are
 * decided by policy, passthrough keys are copied as they are. Keys that are
 * kept stay where they were; newly added hierarchy fields are appended in
 * level order, then a new `index-type`. Never throws on the shape of
 * existing values.
 */
export function reconcileFrontmatter(
  existing: Frontmatter,
  canonical: CanonicalHierarchy,
  maxLevel: number,
  indexType: IndexType
): ReconciliationResult {
  const { hierarchy, indexType: storedIndexType, hasIndexType, passthrough } = partitionFrontmatter(existing);
  const frontmatter: Frontmatter = {};
  const changes: FieldChange[] = [];
  const carriesIndexType = indexType !== 'none';

  // Walk the original key order so kept keys keep their position
  for (const key of Object.keys(existing)) {
    if (isHierarchyField(key)) {
      const value = hierarchy[key];
      const expected = fieldLevel(key) <= maxLevel ? canonical[key] : undefined;
      if (expected === undefined) {
        changes.push({ kind: 'removed', field: key, oldValue: value });
        continue;
      }
      assignField(frontmatter, key, expected);
      if (value !== expected) {
        changes.push({
          kind: 'corrected',
          field: key,
          oldValue: value,
          newValue: expected,
          malformed: typeof value !== 'string',
        });
      }
      continue;
    }

    if (key === INDEX_TYPE_KEY) {
      if (!carriesIndexType) {
        changes.push({ kind: 'removed', field: INDEX_TYPE_KEY, oldValue: storedIndexType });
        continue;
      }
      assignField(frontmatter, key, indexType);
      if (storedIndexType !== indexType) {
        changes.push({
          kind: 'corrected',
          field: INDEX_TYPE_KEY,
          oldValue: storedIndexType,
          newValue: indexType,
          malformed: typeof storedIndexType !== 'string',
        });
      }
      continue;
    }

    assignField(frontmatter, key, passthrough[key]);
  }

  for (const field of HIERARCHY_FIELDS) {
    if (fieldLevel(field) > maxLevel) break;
    const expected = canonical[field];
    if (expected === undefined || hasOwn(hierarchy, field)) continue;

    assignField(frontmatter, field, expected);
    changes.push({ kind: 'added', field, newValue: expected });
  }

  if (carriesIndexType && !hasIndexType) {
    assignField(frontmatter, INDEX_TYPE_KEY, indexType);
    changes.push({ kind: 'added', field: INDEX_TYPE_KEY, newValue: indexType });
  }

  return { frontmatter, changes };
}
