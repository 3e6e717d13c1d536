/**
 * Explicit classification cache, bound to one vault root.
 *
 * Callers that classify many files against the same root can keep one of
 * these per run. Changing the root drops every entry.
 */

import { classifyPath, normalizeVaultPath } from './paths.js';
import type { PathClassification } from './types.js';

export class ClassificationCache {
  private root: string;
  private readonly entries = new Map<string, PathClassification>();

  constructor(vaultRoot: string) {
    this.root = normalizeVaultPath(vaultRoot);
  }

  get vaultRoot(): string {
    return this.root;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Classify a file, reusing an earlier result for the same normalized path.
   * Errors are not cached.
   */
  get(filePath: string): PathClassification {
    const key = normalizeVaultPath(filePath);
    const cached = this.entries.get(key);
    if (cached) return cached;

    const classification = classifyPath(this.root, filePath);
    this.entries.set(key, classification);
    return classification;
  }

  /** Rebind to a new vault root; clears the cache when the root changes. */
  setVaultRoot(vaultRoot: string): void {
    const next = normalizeVaultPath(vaultRoot);
    if (next === this.root) return;
    this.root = next;
    this.entries.clear();
  }

  clear(): void {
    this.entries.clear();
  }
}
