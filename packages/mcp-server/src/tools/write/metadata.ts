/**
 * Metadata tools - ensure hierarchy frontmatter on disk
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ensureFileMetadata } from '../../core/write/ensure.js';
import { ensureVaultMetadata } from '../../core/write/batch.js';
import { validatePath } from '../../core/write/writer.js';
import {
  errorFromException,
  errorResult,
  formatMcpResult,
  successResult,
  type McpResponse,
} from '../../core/write/mutation-helpers.js';
import { serverLog } from '../../core/shared/serverLog.js';

export function registerMetadataTools(
  server: McpServer,
  getVaultPath: () => string,
  getConcurrency: () => number
): void {
  server.registerTool(
    'ensure_metadata',
    {
      title: 'Ensure Metadata',
      description:
        'Reconcile program/course/class/module and index-type frontmatter with folder structure. ' +
        'With a path, fixes that note; without one, fixes every note in the vault. ' +
        'Failed files are listed in failed_metadata_files.txt; retry_failed processes only those.',
      inputSchema: {
        path: z.string().optional().describe('Vault-relative note path. Omit to process the whole vault'),
        dry_run: z.boolean().default(false).describe('Report changes without writing them'),
        retry_failed: z.boolean().default(false).describe('Process only the files listed in failed_metadata_files.txt'),
      },
    },
    async ({ path: notePath, dry_run: dryRun, retry_failed: retryFailed }): Promise<McpResponse> => {
      const vaultPath = getVaultPath();

      if (notePath !== undefined) {
        if (!validatePath(vaultPath, notePath)) {
          return formatMcpResult(errorResult(notePath, 'Invalid path: path traversal not allowed'));
        }
        try {
          const result = await ensureFileMetadata(vaultPath, notePath, { dryRun });
          const verb = result.status === 'updated' ? (dryRun ? 'Would update' : 'Updated') : result.status === 'skipped' ? 'Skipped' : 'No changes for';
          return formatMcpResult(
            successResult(result.path, `${verb} ${result.path}`, { dryRun, details: result })
          );
        } catch (error) {
          serverLog('tools', `ensure_metadata ${notePath}: ${error instanceof Error ? error.message : String(error)}`, 'error');
          return formatMcpResult(errorFromException(notePath, 'ensure metadata', error));
        }
      }

      try {
        const batch = await ensureVaultMetadata(vaultPath, {
          dryRun,
          retryFailed,
          concurrency: getConcurrency(),
        });
        const message = `${dryRun ? '[DRY RUN] ' : ''}Processed ${batch.processedFiles}/${batch.totalFiles} files: ` +
          `${batch.updatedFiles} updated, ${batch.skippedFiles} skipped, ${batch.failedFiles} failed`;
        const summary = {
          totalFiles: batch.totalFiles,
          processedFiles: batch.processedFiles,
          updatedFiles: batch.updatedFiles,
          skippedFiles: batch.skippedFiles,
          failedFiles: batch.failedFiles,
          failures: batch.failures,
          failedListPath: batch.failedListPath,
          updated: batch.results.filter(r => r.status === 'updated').map(r => ({ path: r.path, changes: r.changes })),
        };
        const result = batch.success
          ? successResult('.', message, { dryRun, details: summary })
          : errorResult('.', message, { dryRun, details: summary });
        return formatMcpResult(result);
      } catch (error) {
        return formatMcpResult(errorFromException('.', 'ensure vault metadata', error));
      }
    }
  );
}
