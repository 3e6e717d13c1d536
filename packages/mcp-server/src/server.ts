import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { WatcherStatus } from './core/read/watch/index.js';
import { registerHierarchyTools } from './tools/read/hierarchy.js';
import { registerSystemTools } from './tools/read/system.js';
import { registerMetadataTools } from './tools/write/metadata.js';

export const SERVER_NAME = 'vault-hierarchy';
export const SERVER_VERSION = '0.1.0';

export interface HierarchyServerOptions {
  getVaultPath: () => string;
  getConcurrency: () => number;
  getWatcherStatus?: () => WatcherStatus | null;
}

/**
 * Create an MCP server with every hierarchy tool registered
 */
export function createHierarchyServer(options: HierarchyServerOptions): McpServer {
  const { getVaultPath, getConcurrency, getWatcherStatus } = options;

  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerHierarchyTools(server, getVaultPath);
  registerMetadataTools(server, getVaultPath, getConcurrency);
  registerSystemTools(server, getVaultPath, getWatcherStatus);

  return server;
}
