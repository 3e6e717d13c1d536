import type { FieldChange, IndexType } from '@vault-hierarchy/core';

/**
 * Outcome of ensuring one note's hierarchy metadata
 */
export type EnsureStatus = 'updated' | 'unchanged' | 'skipped';

export interface EnsureFileResult {
  /** Vault-relative path, forward slashes */
  path: string;
  status: EnsureStatus;
  /** True when nothing was written; `updated` then means "would update" */
  dryRun: boolean;
  changes: FieldChange[];
  indexType?: IndexType;
  maxLevel?: number;
  /** Why the file was skipped */
  reason?: string;
  /** Stored index-type that disagreed with the path, if any */
  indexTypeMismatch?: { stored: unknown; derived: IndexType };
}

/**
 * One file that could not be processed in a batch
 */
export interface FileFailure {
  path: string;
  /** VaultHierarchyError code, or PARSE_ERROR / IO_ERROR */
  code: string;
  message: string;
}

export interface BatchResult {
  success: boolean;
  dryRun: boolean;
  totalFiles: number;
  /** Files reconciled without error (updated or unchanged) */
  processedFiles: number;
  updatedFiles: number;
  skippedFiles: number;
  failedFiles: number;
  failures: FileFailure[];
  results: EnsureFileResult[];
  /** Vault-relative path of the failed-file list, when one was written */
  failedListPath?: string;
}

/**
 * JSON payload every tool returns
 */
export interface ToolResult {
  success: boolean;
  message: string;
  path: string;
  dryRun?: boolean;
  /** Estimated token count for this response */
  tokensEstimate?: number;
  details?: unknown;
}
