/**
 * MCP Tool Error Tracking Wrapper
 *
 * Higher-order function that wraps MCP tool handlers with 3-strike
 * error tracking. On success, the strike count resets. After
 * STRIKE_LIMIT consecutive failures, returns an escalation message.
 */

import { recordStrike, clearStrikes, STRIKE_LIMIT } from '../guardrails/strikes.js';
import { logger } from '../config/logger.js';

/**
 * MCP tool handler return type — index signature required by MCP SDK
 */
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

/**
 * Tool handler matching the MCP SDK callback. The second arg (extra) is
 * passed by the SDK and forwarded untouched.
 */
export type ToolHandler<T = Record<string, unknown>> = (params: T, extra?: unknown) => Promise<ToolResult>;

export function withErrorTracking<T>(
  toolName: string,
  handler: ToolHandler<T>
): ToolHandler<T> {
  return async (params: T, extra?: unknown): Promise<ToolResult> => {
    try {
      const result = await handler(params, extra);
      clearStrikes(toolName);
      return result;
    } catch (error) {
      const count = recordStrike(toolName);
      const msg = error instanceof Error ? error.message : 'Unknown error';
      logger.error(`Tool ${toolName} failed (strike ${count}/${STRIKE_LIMIT})`, { error: msg });

      if (count >= STRIKE_LIMIT) {
        return {
          content: [{
            type: 'text' as const,
            text: `**${STRIKE_LIMIT}-STRIKE LIMIT REACHED** for \`${toolName}\`\n\n` +
              `Failed ${count} times. Stopping to escalate.\n` +
              `Last error: ${msg}\n\n` +
              `Do NOT retry. Explain what failed and ask the user for guidance.`,
          }],
          isError: true,
        };
      }

      return {
        content: [{
          type: 'text' as const,
          text: `**ERROR** (strike ${count}/${STRIKE_LIMIT}): ${toolName} failed\n${msg}`,
        }],
        isError: true,
      };
    }
  };
}
