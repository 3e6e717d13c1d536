/**
 * Server Activity Log: in-memory ring buffer for runtime diagnostics
 *
 * Appends to the buffer AND writes to console.error (stdout belongs to the
 * MCP stdio transport). The buffer is queryable via the `server_log` tool.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export const LOG_COMPONENTS = ['server', 'config', 'ensure', 'batch', 'watcher', 'tools'] as const;

export type LogComponent = typeof LOG_COMPONENTS[number];

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const serverStartTs = Date.now();

/**
 * Log a message to the ring buffer and stderr.
 */
export function serverLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = {
    ts: Date.now(),
    component,
    message,
    level,
  };

  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  const prefix = level === 'error' ? '[Vault] ERROR' : level === 'warn' ? '[Vault] WARN' : '[Vault]';
  console.error(`${prefix} [${component}] ${message}`);
}

/**
 * Query the log buffer with optional filters.
 */
export function getServerLog(options: {
  since?: number;
  component?: string;
  limit?: number;
} = {}): { entries: LogEntry[]; server_uptime_ms: number } {
  const { since, component, limit = 100 } = options;

  let entries = buffer;

  if (since) {
    entries = entries.filter(e => e.ts > since);
  }

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  // Most recent entries (tail of buffer)
  if (entries.length > limit) {
    entries = entries.slice(-limit);
  }

  return {
    entries,
    server_uptime_ms: getServerUptimeMs(),
  };
}

export function getServerUptimeMs(): number {
  return Date.now() - serverStartTs;
}

/**
 * Empty the buffer. Used by tests.
 */
export function clearServerLog(): void {
  buffer.length = 0;
}
