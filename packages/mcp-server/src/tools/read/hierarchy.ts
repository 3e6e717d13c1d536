/**
 * Hierarchy tools - classify a path and preview reconciliation without disk access
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  classifyPath,
  deriveIndexType,
  detectAndReconcile,
  maxLevelFor,
  resolveCanonicalValues,
} from '@vault-hierarchy/core';
import {
  errorFromException,
  formatMcpResult,
  successResult,
  type McpResponse,
} from '../../core/write/mutation-helpers.js';

export function registerHierarchyTools(
  server: McpServer,
  getVaultPath: () => string
): void {
  // ========================================
  // Tool: classify_path
  // ========================================
  server.registerTool(
    'classify_path',
    {
      title: 'Classify Path',
      description:
        'Classify a note path inside the vault: folder depth, whether it is an index file, its derived index-type, ' +
        'the deepest hierarchy level it may carry and the canonical program/course/class/module values.',
      inputSchema: {
        path: z.string().describe('Vault-relative path to the note (e.g., "Finance/Corporate Finance/Week 1.md")'),
      },
    },
    async ({ path: notePath }): Promise<McpResponse> => {
      try {
        const classification = classifyPath(getVaultPath(), notePath);
        const indexType = deriveIndexType(classification);
        const maxLevel = maxLevelFor(classification, indexType);
        const canonical = resolveCanonicalValues(classification, indexType);

        return formatMcpResult(
          successResult(classification.relativePath, `${classification.relativePath} is ${indexType === 'none' ? 'content' : `a ${indexType} index`} at depth ${classification.depth}`, {
            details: {
              segments: classification.segments,
              depth: classification.depth,
              level: classification.level,
              isIndexFile: classification.isIndexFile,
              indexType,
              maxLevel,
              canonical,
            },
          })
        );
      } catch (error) {
        return formatMcpResult(errorFromException(notePath, 'classify path', error));
      }
    }
  );

  // ========================================
  // Tool: preview_reconcile
  // ========================================
  server.registerTool(
    'preview_reconcile',
    {
      title: 'Preview Reconcile',
      description:
        'Reconcile a supplied frontmatter object against a note path and return the corrected frontmatter and change log. Nothing is written.',
      inputSchema: {
        path: z.string().describe('Vault-relative path to the note'),
        frontmatter: z.record(z.unknown()).default({}).describe('Existing frontmatter mapping to reconcile'),
      },
    },
    async ({ path: notePath, frontmatter }): Promise<McpResponse> => {
      try {
        const result = detectAndReconcile(getVaultPath(), notePath, frontmatter);

        return formatMcpResult(
          successResult(result.classification.relativePath, `${result.changes.length} change(s)`, {
            dryRun: true,
            details: {
              indexType: result.indexType,
              maxLevel: result.maxLevel,
              frontmatter: result.frontmatter,
              changes: result.changes,
              indexTypeMatches: result.indexTypeValidation.matches,
            },
          })
        );
      } catch (error) {
        return formatMcpResult(errorFromException(notePath, 'preview reconcile', error));
      }
    }
  );
}
