/**
 * Shared types for vault hierarchy detection
 */

/**
 * Hierarchy fields in level order: program is level 1, module is level 4.
 */
export const HIERARCHY_FIELDS = ['program', 'course', 'class', 'module'] as const;

export type HierarchyField = typeof HIERARCHY_FIELDS[number];

/** Deepest recognized hierarchy level (module). */
export const MAX_HIERARCHY_LEVEL = 4;

/** Frontmatter key holding the index type of index files. */
export const INDEX_TYPE_KEY = 'index-type';

export const INDEX_TYPES = ['none', 'main', 'program', 'course', 'class', 'module'] as const;

export type IndexType = typeof INDEX_TYPES[number];

/** Keys the reconciler owns; everything else passes through. */
export type ManagedField = HierarchyField | typeof INDEX_TYPE_KEY;

/**
 * One file's YAML header. Hierarchy keys are a subset; all other keys are
 * opaque to the reconciler.
 */
export type Frontmatter = Record<string, unknown>;

/**
 * Frontmatter split into the keys the reconciler manages and the rest.
 */
export interface PartitionedFrontmatter {
  /** Hierarchy fields present in the input, values untouched */
  hierarchy: Partial<Record<HierarchyField, unknown>>;
  /** Raw `index-type` value, when the key is present */
  indexType?: unknown;
  hasIndexType: boolean;
  /** All other keys, in input order */
  passthrough: Frontmatter;
}

/**
 * Result of classifying a file's position under the vault root.
 */
export interface PathClassification {
  /** Normalized vault root (forward slashes, no trailing separator) */
  vaultRoot: string;
  /** Normalized absolute file path */
  filePath: string;
  /** File path relative to the vault root */
  relativePath: string;
  /** Folder names between the vault root and the file's folder */
  segments: string[];
  /** Number of folders between root and file; may exceed 4 */
  depth: number;
  /** Hierarchy level of the file's position, depth capped at 4 */
  level: number;
  fileName: string;
  /** File named after its containing folder (or index.md) */
  isIndexFile: boolean;
}

/** Field name to folder name, for levels 1..maxLevel only. */
export type CanonicalHierarchy = Partial<Record<HierarchyField, string>>;

export type FieldChange =
  | { kind: 'added'; field: ManagedField; newValue: string }
  | { kind: 'corrected'; field: ManagedField; oldValue: unknown; newValue: string; malformed: boolean }
  | { kind: 'removed'; field: ManagedField; oldValue: unknown };

export interface ReconciliationResult {
  frontmatter: Frontmatter;
  changes: FieldChange[];
}

/**
 * Outcome of checking a stored `index-type` against the path-derived one.
 */
export interface IndexTypeValidation {
  derived: IndexType;
  stored: unknown;
  hasStored: boolean;
  /** True when the stored value agrees with the derived type (or is rightly absent) */
  matches: boolean;
}

/**
 * Full output of the detector: reconciliation plus everything derived on the way.
 */
export interface HierarchyDetectionResult extends ReconciliationResult {
  classification: PathClassification;
  indexType: IndexType;
  maxLevel: number;
  canonical: CanonicalHierarchy;
  indexTypeValidation: IndexTypeValidation;
}
