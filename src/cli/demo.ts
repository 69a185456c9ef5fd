/**
 * Scripted demo: metrics, simulated training, one strategy, export name.
 */

import { AdvisorSession } from '../session/session.js';
import { formatPercent } from '../advisor/format.js';
import { exportStrategyReport } from '../export/report.js';
import type { MigrationRequest } from '../types/index.js';
import type { TrainingOptions } from '../advisor/training.js';

export const DEMO_REQUEST: MigrationRequest = {
  name: 'demo_table',
  size_mb: 1000,
  schema_complexity: 0.6,
  data_type: 'structured',
  source_system: 'postgresql',
  target_system: 'bigquery',
  priority: 3,
  current_quality: 0.85,
  resource_constraints: {
    cpu_utilization: 0.7,
    memory_utilization: 0.8,
    network_bandwidth: 0.9,
    disk_io: 0.6,
    concurrent_migrations: 2,
  },
};

/**
 * Run the demo and return its output lines.
 */
export async function runDemo(
  trainingOptions: TrainingOptions = {},
  at: Date = new Date(),
): Promise<string[]> {
  const session = new AdvisorSession(trainingOptions);
  const lines: string[] = ['Migration Advisor - Quick Demo', '='.repeat(50)];

  const metrics = session.metrics();
  lines.push(
    'Performance Metrics:',
    `   - Total Optimizations: ${metrics.total_optimizations}`,
    `   - Avg Quality Score: ${metrics.avg_quality_score.toFixed(3)}`,
    `   - Avg Processing Time: ${metrics.avg_processing_time.toFixed(1)} min`,
    `   - Success Probability: ${formatPercent(metrics.avg_success_probability)}`,
  );

  const training = (await session.train(100)).training_results;
  lines.push(
    '',
    'Training completed:',
    `   - Total Episodes: ${training.total_episodes}`,
    `   - Success Rate: ${formatPercent(training.success_rate)}`,
    `   - Avg Reward: ${training.avg_reward.toFixed(2)}`,
  );

  const { strategy } = session.optimize(DEMO_REQUEST, at);
  const perf = strategy.expected_performance;
  lines.push(
    '',
    'Strategy derived:',
    `   - Expected Quality: ${formatPercent(perf.quality_score)}`,
    `   - Processing Time: ${perf.processing_time_minutes.toFixed(1)} min`,
    `   - Success Probability: ${formatPercent(perf.success_probability)}`,
    `   - Risk Level: ${strategy.risk_assessment.risk_level}`,
    '',
    `Strategy exported to: ${exportStrategyReport(strategy, { at })}`,
  );

  return lines;
}
