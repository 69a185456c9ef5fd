/**
 * MCP Resources - Read-only data exposed as resources
 *
 * Resources:
 * - session://history - Strategies generated this session (JSON)
 * - session://summary - Session aggregates and training status (JSON)
 * - config://advisor - The advisor's fixed parameters and risk thresholds
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AdvisorSession } from '../session/session.js';
import {
  FALLBACK_PARAMETERS,
  FIXED_ACTION_PARAMETERS,
  MAX_QUALITY_SCORE,
  MAX_WORKERS,
  MIN_BATCH_SIZE,
  MIN_SUCCESS_PROBABILITY,
  MIN_WORKERS,
  MITIGATION_STRATEGIES,
  MONITORING_POINTS,
  RISK_THRESHOLDS,
} from '../advisor/strategy.js';

function jsonContents(uri: URL, data: unknown) {
  return {
    contents: [{
      uri: uri.href,
      mimeType: 'application/json',
      text: JSON.stringify(data, null, 2),
    }],
  };
}

/**
 * Register all MCP resources on the server
 */
export function registerResources(server: McpServer, session: AdvisorSession): void {
  server.resource(
    'session://history',
    'session://history',
    {
      title: 'Session History',
      description: 'Ordered list of strategies generated in this session',
      mimeType: 'application/json',
    },
    async (uri) => jsonContents(uri, session.history.entries()),
  );

  server.resource(
    'session://summary',
    'session://summary',
    {
      title: 'Session Summary',
      description: 'Strategy count, average quality score, most common risk level and training status',
      mimeType: 'application/json',
    },
    async (uri) => jsonContents(uri, {
      ...session.history.summary(),
      training_status: session.trainingStatus,
      training_results: session.trainingResults,
    }),
  );

  server.resource(
    'config://advisor',
    'config://advisor',
    {
      title: 'Advisor Parameters',
      description: 'Fixed action parameters, fallback parameters, bounds and risk thresholds the advisor applies',
      mimeType: 'application/json',
    },
    async (uri) => jsonContents(uri, {
      bounds: {
        min_batch_size: MIN_BATCH_SIZE,
        min_workers: MIN_WORKERS,
        max_workers: MAX_WORKERS,
        max_quality_score: MAX_QUALITY_SCORE,
        min_success_probability: MIN_SUCCESS_PROBABILITY,
      },
      risk_thresholds: RISK_THRESHOLDS,
      fixed_action_parameters: FIXED_ACTION_PARAMETERS,
      fallback_parameters: FALLBACK_PARAMETERS,
      mitigation_strategies: MITIGATION_STRATEGIES,
      monitoring_points: MONITORING_POINTS,
    }),
  );
}
