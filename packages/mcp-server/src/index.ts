#!/usr/bin/env node
/**
 * Vault Hierarchy - keeps program/course/class/module frontmatter in step
 * with folder structure
 *
 * Tools:
 * - classify_path, preview_reconcile (read, no disk writes)
 * - ensure_metadata (single note or whole vault, dry run, retry failed)
 * - server_log, health_check
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadServerConfig } from './core/read/config.js';
import { createMetadataWatcher, type MetadataWatcher } from './core/read/watch/index.js';
import { serverLog } from './core/shared/serverLog.js';
import { createHierarchyServer } from './server.js';

// ============================================================================
// Configuration
// ============================================================================

const config = loadServerConfig();

let watcher: MetadataWatcher | null = null;

const server = createHierarchyServer({
  getVaultPath: () => config.vaultPath,
  getConcurrency: () => config.concurrency,
  getWatcherStatus: () => watcher?.status ?? null,
});

// ============================================================================
// Main Entry Point
// ============================================================================

async function main() {
  serverLog('server', `Starting vault-hierarchy server, vault: ${config.vaultPath}`);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  serverLog('server', 'MCP server connected');

  if (!config.watch) {
    serverLog('watcher', 'File watcher disabled (VAULT_HIERARCHY_WATCH=false)');
    return;
  }

  watcher = createMetadataWatcher({
    vaultPath: config.vaultPath,
    config: { debounceMs: config.debounceMs, dryRun: config.dryRun },
  });
  watcher.start();
}

async function shutdown(signal: string) {
  serverLog('server', `Received ${signal}, shutting down`);
  if (watcher) {
    await watcher.stop();
  }
  await server.close();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error) => {
      console.error('[Vault] Shutdown failed:', error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error('[Vault] Fatal error:', error);
  process.exit(1);
});
