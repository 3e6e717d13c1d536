/**
 * Shared helpers for tool results
 */

import { isVaultHierarchyError } from '@vault-hierarchy/core';
import { estimateTokens } from './constants.js';
import type { ToolResult } from './types.js';

/**
 * MCP response format
 */
export type McpResponse = {
  content: [{ type: 'text'; text: string }];
  isError?: boolean;
};

/**
 * Format a ToolResult as an MCP response. Failed results are flagged isError.
 */
export function formatMcpResult(result: ToolResult): McpResponse {
  if (result.tokensEstimate === undefined || result.tokensEstimate === 0) {
    result.tokensEstimate = estimateTokens(result);
  }
  const response: McpResponse = { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  if (!result.success) {
    response.isError = true;
  }
  return response;
}

/**
 * Create an error ToolResult
 */
export function errorResult(
  notePath: string,
  message: string,
  extras?: Partial<ToolResult>
): ToolResult {
  const result: ToolResult = {
    success: false,
    message,
    path: notePath,
    tokensEstimate: 0,
    ...extras,
  };
  result.tokensEstimate = estimateTokens(result);
  return result;
}

/**
 * Create a success ToolResult
 */
export function successResult(
  notePath: string,
  message: string,
  extras?: Partial<ToolResult>
): ToolResult {
  const result: ToolResult = {
    success: true,
    message,
    path: notePath,
    tokensEstimate: 0,
    ...extras,
  };
  result.tokensEstimate = estimateTokens(result);
  return result;
}

/**
 * Turn a thrown value into an error result, keeping the hierarchy error code
 */
export function errorFromException(notePath: string, action: string, error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  if (isVaultHierarchyError(error)) {
    return errorResult(notePath, `Failed to ${action}: ${message}`, { details: { code: error.code } });
  }
  return errorResult(notePath, `Failed to ${action}: ${message}`);
}
