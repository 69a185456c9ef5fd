/**
 * MCP Prompts
 *
 * Workflow templates exposed as MCP prompts.
 *
 * Available prompts:
 * - plan-migration: derive, review and export a strategy for one table
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

export function registerPrompts(server: McpServer): void {
  server.prompt(
    'plan-migration',
    'Plan a table migration: derive a strategy, review its risk factors and export the report',
    {
      table: z.string().max(200).describe('Table, collection or dataset name'),
      source: z.string().max(100).describe('Source system (e.g. "postgresql")'),
      target: z.string().max(100).describe('Target system (e.g. "bigquery")'),
      size_mb: z.string().max(20).optional().describe('Data size in MB (defaults to the form value)'),
    },
    ({ table, source, target, size_mb }) => {
      const sizeArg = size_mb ? `, size_mb: ${size_mb}` : '';

      return {
        messages: [
          {
            role: 'user' as const,
            content: {
              type: 'text' as const,
              text: `Plan the migration of "${table}" from ${source} to ${target}.

Workflow:
1. Derive a strategy: derive_strategy(name: "${table}", source_system: "${source}", target_system: "${target}"${sizeArg})
2. Review the risk level and each risk factor; if the risk is HIGH, explain which input drives it
3. Compare the primary strategy with the fallback parameters
4. Export the report: export_strategy(write: true)`,
            },
          },
        ],
      };
    }
  );
}
