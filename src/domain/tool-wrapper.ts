/**
 * Tool Wrapper Utility
 * Wraps MCP tool handlers with requestId context, start/end logging,
 * call and latency metrics, and error tracking
 */

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { runWithContext, generateRequestId } from './request-context.js';
import { logger } from './logger.js';
import { metrics } from './metrics.js';

/**
 * Tool handler function type
 */
export type ToolHandler<TArgs> = (args: TArgs) => Promise<CallToolResult>;

/**
 * Wrap a tool handler with observability instrumentation
 */
export function wrapTool<TArgs>(toolName: string, handler: ToolHandler<TArgs>): ToolHandler<TArgs> {
  return async (args: TArgs): Promise<CallToolResult> => {
    const requestId = generateRequestId();
    const startTime = Date.now();

    return runWithContext({ requestId, toolName, startTime }, async () => {
      try {
        logger.logToolStart(toolName, args, requestId);

        const result = await handler(args);

        const latencyMs = Date.now() - startTime;
        const outcome: 'success' | 'error' = result.isError ? 'error' : 'success';
        const errorCode = result.isError ? extractErrorCode(result.structuredContent) : undefined;

        logger.logToolEnd(toolName, latencyMs, outcome, requestId, errorCode);
        metrics.incrementToolCall(toolName, outcome);
        metrics.recordLatency(toolName, latencyMs);

        return result;
      } catch (error) {
        // Handlers return error results; anything thrown is unexpected
        const latencyMs = Date.now() - startTime;

        logger.logToolEnd(toolName, latencyMs, 'error', requestId, 'INTERNAL_ERROR');
        logger.logError(error instanceof Error ? error : new Error(String(error)), {
          requestId,
          toolName,
          context: 'tool_wrapper',
        });

        metrics.incrementToolCall(toolName, 'error');
        metrics.recordLatency(toolName, latencyMs);

        throw error;
      }
    });
  };
}

/**
 * Read `error.code` from the structured content built by buildErrorResponse
 */
function extractErrorCode(structuredContent: Record<string, unknown> | undefined): string | undefined {
  const error = structuredContent?.error;
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
