/**
 * Change-log formatting for reconciled notes
 */

import type { FieldChange } from '@vault-hierarchy/core';
import { serverLog, type LogComponent } from '../shared/serverLog.js';

function formatValue(value: unknown): string {
  if (value instanceof Date) {
    return `"${value.toISOString()}"`;
  }
  const json = JSON.stringify(value);
  return json === undefined ? String(value) : json;
}

/**
 * One human-readable line per change, e.g.
 * `Finance/Corporate Finance/Corporate Finance.md: corrected course "Old" -> "Corporate Finance"`
 */
export function formatChange(notePath: string, change: FieldChange): string {
  switch (change.kind) {
    case 'added':
      return `${notePath}: added ${change.field} ${formatValue(change.newValue)}`;
    case 'corrected': {
      const suffix = change.malformed ? ' (malformed)' : '';
      return `${notePath}: corrected ${change.field} ${formatValue(change.oldValue)} -> ${formatValue(change.newValue)}${suffix}`;
    }
    case 'removed':
      return `${notePath}: removed ${change.field} ${formatValue(change.oldValue)}`;
  }
}

/**
 * Log every change individually. Returns the lines written.
 */
export function logReconciliation(
  notePath: string,
  changes: FieldChange[],
  options: { dryRun?: boolean; component?: LogComponent } = {}
): string[] {
  const { dryRun = false, component = 'ensure' } = options;
  const lines = changes.map(change => formatChange(notePath, change));
  for (const line of lines) {
    serverLog(component, dryRun ? `[DRY RUN] ${line}` : line);
  }
  return lines;
}
