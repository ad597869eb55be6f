/**
 * Tool result helpers
 *
 * Every tool answers with pretty-printed JSON text carrying a `success` flag.
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'pino';

import { describeError } from '../errors.js';

export function jsonResult(payload: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ success: true, ...payload }, null, 2) }]
  };
}

export function errorResult(error: string, details: Record<string, unknown> = {}): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify({ success: false, error, ...details }, null, 2) }],
    isError: true
  };
}

/**
 * Service results that already carry their own `success` flag
 */
export function outcomeResult(result: { success: boolean }): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    ...(!result.success && { isError: true })
  };
}

/**
 * Run a tool handler; anything it throws becomes a failure result
 */
export async function guard(
  logger: Logger,
  tool: string,
  failurePrefix: string,
  handler: () => Promise<CallToolResult>
): Promise<CallToolResult> {
  try {
    return await handler();
  } catch (error) {
    const message = `${failurePrefix}: ${describeError(error)}`;
    logger.error({ tool, error: describeError(error) }, 'Tool failed');
    return errorResult(message);
  }
}
