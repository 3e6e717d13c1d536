/**
 * Shared constants for the metadata pipeline
 */

/** Failed-file list written into the vault root after a batch with failures */
export const FAILED_FILES_LIST = 'failed_metadata_files.txt';

export const DEFAULT_CONCURRENCY = 4;

export const DEFAULT_DEBOUNCE_MS = 500;

/**
 * Estimate token count from a string or object.
 * Uses the rough approximation of ~4 characters per token.
 */
export function estimateTokens(content: string | object): number {
  const str = typeof content === 'string' ? content : JSON.stringify(content);
  return Math.ceil(str.length / 4);
}
