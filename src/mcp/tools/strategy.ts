/**
 * MCP Strategy Tools
 *
 * Zero-cost strategy derivation (NO AI calls). Each derived strategy is
 * appended to the server's session history and becomes the current
 * strategy for export.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { migrationFieldsShape, requestFromFields } from '../../advisor/request.js';
import type { MigrationFields } from '../../advisor/request.js';
import {
  formatHistoryTable,
  formatSessionSummary,
  formatStrategyReport,
} from '../../advisor/format.js';
import { exportStrategyReport, serializeStrategy } from '../../export/report.js';
import type { AdvisorSession } from '../../session/session.js';
import { withErrorTracking } from '../with-error-tracking.js';
import { logger } from '../../config/logger.js';

export function registerStrategyTools(server: McpServer, session: AdvisorSession): void {
  server.tool(
    'derive_strategy',
    'Derive a deterministic migration strategy (performance estimates, tuning parameters, risk level, recommendations) from table size, schema complexity, systems and resource constraints. All fields are optional and default to the dashboard form values. Example: { "size_mb": 1000, "schema_complexity": 0.6, "source_system": "postgresql", "target_system": "bigquery" }',
    migrationFieldsShape,
    { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false },
    withErrorTracking('derive_strategy', async (fields: MigrationFields) => {
      const entry = session.optimize(requestFromFields(fields));

      const text = [
        formatStrategyReport(entry.strategy),
        '',
        '```json',
        serializeStrategy(entry.strategy),
        '```',
      ].join('\n');

      return { content: [{ type: 'text' as const, text }] };
    }),
  );

  server.tool(
    'session_history',
    'List the strategies generated in this session with summary aggregates (count, average quality, most common risk level)',
    {
      format: z.enum(['table', 'json']).optional().default('table')
        .describe('Output format: table (markdown) or json (full entries)'),
    },
    { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false },
    withErrorTracking('session_history', async ({ format }: { format: 'table' | 'json' }) => {
      const entries = session.history.entries();
      const summary = session.history.summary();

      const text = format === 'json'
        ? JSON.stringify({ summary, entries }, null, 2)
        : [
          '# Session Summary',
          '',
          formatSessionSummary(summary),
          '',
          '# Optimization History',
          '',
          formatHistoryTable(entries),
        ].join('\n');

      return { content: [{ type: 'text' as const, text }] };
    }),
  );

  server.tool(
    'export_strategy',
    'Export the current strategy as a JSON report. Returns the timestamped file name; with write=true also writes the file to the export directory.',
    {
      write: z.boolean().optional().default(false)
        .describe('Write the JSON report to the export directory'),
    },
    { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false },
    withErrorTracking('export_strategy', async ({ write }: { write: boolean }) => {
      const strategy = session.currentStrategy;
      if (!strategy) {
        return {
          content: [{
            type: 'text' as const,
            text: 'No strategy to export yet. Call derive_strategy first.',
          }],
        };
      }

      const target = exportStrategyReport(strategy, { write });
      logger.info('Strategy export requested', { write, target });

      return {
        content: [{
          type: 'text' as const,
          text: write
            ? `Strategy report exported to: ${target}`
            : `Strategy report file name: ${target}\n\n\`\`\`json\n${serializeStrategy(strategy)}\n\`\`\``,
        }],
      };
    }),
  );
}
