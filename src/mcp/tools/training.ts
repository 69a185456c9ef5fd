/**
 * MCP Training & Metrics Tools
 *
 * Both are stubs kept for the dashboard's advertised surface: training
 * waits and returns fixed results, metrics are fixed averages plus the
 * session's optimization count.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { formatPerformanceMetrics, formatTrainingResult } from '../../advisor/format.js';
import type { AdvisorSession } from '../../session/session.js';
import { withErrorTracking } from '../with-error-tracking.js';

export function registerTrainingTools(server: McpServer, session: AdvisorSession): void {
  server.tool(
    'train_model',
    'Run the simulated model training (fixed delay, fixed results). Updates the session training status.',
    {
      num_episodes: z.number().int().min(1).max(10_000).optional()
        .describe('Episodes to report (defaults to TRAINING_EPISODES, 500)'),
    },
    { readOnlyHint: false, destructiveHint: false, idempotentHint: true, openWorldHint: false },
    withErrorTracking('train_model', async ({ num_episodes }: { num_episodes?: number }) => {
      const result = await session.train(num_episodes);
      return { content: [{ type: 'text' as const, text: formatTrainingResult(result) }] };
    }),
  );

  server.tool(
    'performance_metrics',
    'Get advisor performance metrics and the session training status',
    {},
    { readOnlyHint: true, destructiveHint: false, idempotentHint: true, openWorldHint: false },
    withErrorTracking('performance_metrics', async () => {
      const text = [
        formatPerformanceMetrics(session.metrics()),
        '',
        `**Training Status:** ${session.trainingStatus}`,
      ].join('\n');
      return { content: [{ type: 'text' as const, text }] };
    }),
  );
}
