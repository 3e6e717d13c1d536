/**
 * Tests for server_log and health_check
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { clearServerLog, serverLog } from '../../src/core/shared/serverLog.js';
import type { WatcherStatus } from '../../src/core/read/watch/index.js';
import { createTestServer, type TestServerContext } from '../helpers/createTestServer.js';
import { createTempVault, cleanupTempVault } from '../helpers/testUtils.js';

describe('system tools', () => {
  let tempVault: string;
  let ctx: TestServerContext | null;

  beforeEach(async () => {
    tempVault = await createTempVault();
    ctx = null;
    clearServerLog();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await ctx?.close();
    await cleanupTempVault(tempVault);
    vi.restoreAllMocks();
  });

  describe('server_log', () => {
    it('should return entries filtered by component', async () => {
      ctx = await createTestServer(tempVault);
      serverLog('config', 'loaded');
      serverLog('batch', 'Processed 0/0 files');

      const { body } = await ctx.callTool('server_log', { component: 'config' });

      expect(body).toMatchObject({
        entries: [{ component: 'config', message: 'loaded', level: 'info' }],
      });
    });

    it('should apply the limit to the most recent entries', async () => {
      ctx = await createTestServer(tempVault);
      serverLog('ensure', 'first');
      serverLog('ensure', 'second');

      const { body } = await ctx.callTool('server_log', { limit: 1 });

      expect(body).toMatchObject({ entries: [{ message: 'second' }] });
    });
  });

  describe('health_check', () => {
    it('should report a healthy vault without a watcher', async () => {
      ctx = await createTestServer(tempVault);

      const { body } = await ctx.callTool('health_check');

      expect(body).toMatchObject({
        status: 'healthy',
        vault_path: tempVault,
        vault_accessible: true,
        watcher: null,
        recommendations: [],
      });
    });

    it('should report degraded health when the watcher failed', async () => {
      const status: WatcherStatus = {
        state: 'error',
        pendingPaths: 2,
        pendingEvents: 5,
        processedCount: 3,
        failedCount: 1,
        lastProcessed: 1_700_000_000_000,
        error: new Error('File not found: Prog/gone.md'),
      };
      ctx = await createTestServer(tempVault, { getWatcherStatus: () => status });

      const { body } = await ctx.callTool('health_check');

      expect(body).toMatchObject({
        status: 'degraded',
        watcher: { state: 'error', pending_paths: 2, pending_events: 5, processed: 3, failed: 1, last_processed: 1_700_000_000_000 },
        recommendations: ['Watcher reported an error: File not found: Prog/gone.md'],
      });
    });

    it('should report an inaccessible vault as unhealthy', async () => {
      ctx = await createTestServer(path.join(tempVault, 'missing'));

      const { body } = await ctx.callTool('health_check');

      expect(body).toMatchObject({
        status: 'unhealthy',
        vault_accessible: false,
        recommendations: ['Vault path is not readable and writable. Check VAULT_PATH / PROJECT_PATH.'],
      });
    });
  });
});
