/**
 * System tools - activity log and health
 */

import * as fs from 'fs';
import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getServerLog, getServerUptimeMs, LOG_COMPONENTS } from '../../core/shared/serverLog.js';
import type { WatcherStatus } from '../../core/read/watch/index.js';

export function registerSystemTools(
  server: McpServer,
  getVaultPath: () => string,
  getWatcherStatus: () => WatcherStatus | null = () => null
): void {
  server.registerTool(
    'server_log',
    {
      title: 'Server Log',
      description: 'Recent server activity: reconciled fields, skipped and failed files, watcher events.',
      inputSchema: {
        since: z.number().optional().describe('Only entries after this epoch-ms timestamp'),
        component: z.enum(LOG_COMPONENTS).optional().describe('Only entries from this component'),
        limit: z.number().int().positive().max(200).default(50).describe('Maximum entries to return'),
      },
    },
    async ({ since, component, limit }) => {
      const log = getServerLog({ since, component, limit });
      return { content: [{ type: 'text' as const, text: JSON.stringify(log, null, 2) }] };
    }
  );

  server.registerTool(
    'health_check',
    {
      title: 'Health Check',
      description: 'Check server health: vault accessibility, watcher state and uptime.',
      inputSchema: {},
    },
    async () => {
      const vaultPath = getVaultPath();
      const recommendations: string[] = [];

      let vaultAccessible = false;
      try {
        fs.accessSync(vaultPath, fs.constants.R_OK | fs.constants.W_OK);
        vaultAccessible = true;
      } catch {
        recommendations.push('Vault path is not readable and writable. Check VAULT_PATH / PROJECT_PATH.');
      }

      const watcher = getWatcherStatus();
      if (watcher?.state === 'error' && watcher.error) {
        recommendations.push(`Watcher reported an error: ${watcher.error.message}`);
      }

      let status: 'healthy' | 'degraded' | 'unhealthy';
      if (!vaultAccessible) {
        status = 'unhealthy';
      } else if (recommendations.length > 0) {
        status = 'degraded';
      } else {
        status = 'healthy';
      }

      const output = {
        status,
        vault_path: vaultPath,
        vault_accessible: vaultAccessible,
        watcher: watcher
          ? {
            state: watcher.state,
            pending_paths: watcher.pendingPaths,
            pending_events: watcher.pendingEvents,
            processed: watcher.processedCount,
            failed: watcher.failedCount,
            last_processed: watcher.lastProcessed,
          }
          : null,
        server_uptime_ms: getServerUptimeMs(),
        recommendations,
      };

      return { content: [{ type: 'text' as const, text: JSON.stringify(output, null, 2) }] };
    }
  );
}
