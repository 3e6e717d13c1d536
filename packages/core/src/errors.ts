/**
 * Typed errors for hierarchy detection.
 *
 * Every error is scoped to the file being classified; callers processing a
 * batch catch these per file and move on.
 */

export type HierarchyErrorCode =
  | 'OUT_OF_VAULT'
  | 'AMBIGUOUS_DEPTH';

export class VaultHierarchyError extends Error {
  readonly code: HierarchyErrorCode;
  readonly filePath: string;

  constructor(code: HierarchyErrorCode, filePath: string, message: string) {
    super(message);
    this.name = 'VaultHierarchyError';
    this.code = code;
    this.filePath = filePath;
  }
}

/** The file does not live under the configured vault root. */
export class OutOfVaultError extends VaultHierarchyError {
  readonly vaultRoot: string;

  constructor(vaultRoot: string, filePath: string) {
    super('OUT_OF_VAULT', filePath, `Path is not inside the vault: ${filePath} (vault: ${vaultRoot})`);
    this.name = 'OutOfVaultError';
    this.vaultRoot = vaultRoot;
  }
}

/** The file's hierarchy depth cannot be determined. */
export class AmbiguousDepthError extends VaultHierarchyError {
  constructor(filePath: string, reason: string) {
    super('AMBIGUOUS_DEPTH', filePath, `Cannot determine hierarchy depth for ${filePath || '(empty path)'}: ${reason}`);
    this.name = 'AmbiguousDepthError';
  }
}

export function isVaultHierarchyError(error: unknown): error is VaultHierarchyError {
  return error instanceof VaultHierarchyError;
}
