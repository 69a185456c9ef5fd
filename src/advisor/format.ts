/**
 * Report formatting
 *
 * Renders strategies, history and training output as Markdown for the
 * MCP tools and the CLI. Pure string building; no I/O.
 */

import type {
  PerformanceMetrics,
  SessionEntry,
  SessionSummary,
  StrategyResult,
  TrainingResult,
} from '../types/index.js';

const RETRY_STRATEGY_LABELS = ['Immediate', 'Exponential Backoff', 'Adaptive'];
const ERROR_HANDLING_LABELS = ['Skip', 'Retry', 'Abort'];

/** Processing time that maps to a Speed of 0 on the performance profile */
const PROFILE_TIME_SCALE_MINUTES = 60;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Local wall-clock time as ISO-8601 without a zone designator:
 * `2026-10-19T08:05:03.123`. History entries and export file names both
 * use this clock.
 */
export function formatLocalTimestamp(at: Date): string {
  const date = `${at.getFullYear()}-${pad(at.getMonth() + 1)}-${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}:${pad(at.getMinutes())}:${pad(at.getSeconds())}`;
  return `${date}T${time}.${pad(at.getMilliseconds(), 3)}`;
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function labelFor(labels: string[], code: number): string {
  return labels[code] ?? `Unknown (${code})`;
}

export function retryStrategyLabel(code: number): string {
  return labelFor(RETRY_STRATEGY_LABELS, code);
}

export function errorHandlingLabel(code: number): string {
  return labelFor(ERROR_HANDLING_LABELS, code);
}

/** `data_quality` -> `Data Quality` */
export function metricLabel(metric: string): string {
  return metric
    .split('_')
    .filter(part => part.length > 0)
    .map(part => part[0].toUpperCase() + part.slice(1))
    .join(' ');
}

export interface ProfileAxis {
  axis: 'Quality' | 'Speed' | 'Efficiency' | 'Success Rate';
  value: number;
}

/**
 * The four normalized axes of a strategy's performance, each in [0,1].
 */
export function performanceProfile(strategy: StrategyResult): ProfileAxis[] {
  const perf = strategy.expected_performance;
  const unit = (v: number) => Math.min(1, Math.max(0, v));
  return [
    { axis: 'Quality', value: unit(perf.quality_score) },
    { axis: 'Speed', value: unit(1 - perf.processing_time_minutes / PROFILE_TIME_SCALE_MINUTES) },
    { axis: 'Efficiency', value: unit(perf.resource_usage) },
    { axis: 'Success Rate', value: unit(perf.success_probability) },
  ];
}

export function formatStrategyReport(strategy: StrategyResult): string {
  const perf = strategy.expected_performance;
  const params = strategy.action_parameters;
  const risk = strategy.risk_assessment;
  const recs = strategy.recommendations;
  const fallback = recs.fallback_strategy;

  const lines: string[] = [
    '# Migration Strategy',
    '',
    `**Risk Level:** ${risk.risk_level}`,
    `**Primary Strategy:** ${recs.primary_strategy}`,
    '',
    '## Expected Performance',
    '',
    '| Metric | Value |',
    '|--------|-------|',
    `| Quality Score | ${formatPercent(perf.quality_score)} |`,
    `| Processing Time | ${perf.processing_time_minutes.toFixed(1)} min |`,
    `| Resource Usage | ${formatPercent(perf.resource_usage)} |`,
    `| Success Probability | ${formatPercent(perf.success_probability)} |`,
    '',
    '**Performance profile:** ' + performanceProfile(strategy)
      .map(p => `${p.axis} ${p.value.toFixed(2)}`)
      .join(', '),
    '',
    '## Action Parameters',
    '',
    '| Parameter | Value | Description |',
    '|-----------|-------|-------------|',
    `| Batch Size | ${params.batch_size} | Records per batch |`,
    `| Parallel Workers | ${params.parallel_workers} | Number of parallel workers |`,
    `| Compression Level | ${params.compression_level} | Data compression level (0-9) |`,
    `| Validation Frequency | ${formatPercent(params.validation_frequency)} | How often to validate data |`,
    `| Retry Strategy | ${retryStrategyLabel(params.retry_strategy)} | Strategy for handling retries |`,
    `| Resource Allocation | ${formatPercent(params.resource_allocation)} | Resource allocation percentage |`,
    `| Checkpoint Frequency | ${formatPercent(params.checkpoint_frequency)} | How often to create checkpoints |`,
    `| Error Handling | ${errorHandlingLabel(params.error_handling)} | Strategy for handling errors |`,
    '',
    '## Risk Assessment',
    '',
    '**Risk Factors:**',
    ...risk.risk_factors.map(f => `- ${f}`),
    '',
    '**Mitigation Strategies:**',
    ...risk.mitigation_strategies.map(m => `- ${m}`),
    '',
    '## Recommendations',
    '',
    '**Fallback Strategy Parameters:**',
    `- Batch Size: ${fallback.batch_size.toLocaleString('en-US')}`,
    `- Parallel Workers: ${fallback.parallel_workers}`,
    `- Compression Level: ${fallback.compression_level}`,
    `- Validation Frequency: ${formatPercent(fallback.validation_frequency)}`,
    `- Resource Allocation: ${formatPercent(fallback.resource_allocation)}`,
    '',
    '**Monitoring Points:**',
    ...recs.monitoring_points.map(p => `- **${metricLabel(p.metric)}**: ${p.frequency} - ${p.threshold}`),
  ];

  return lines.join('\n');
}

export function formatHistoryTable(entries: SessionEntry[]): string {
  if (entries.length === 0) {
    return 'No strategies generated this session.';
  }

  const lines = [
    '| Timestamp | Table | Quality | Time (min) | Success Prob | Risk |',
    '|-----------|-------|---------|------------|--------------|------|',
  ];
  for (const entry of entries) {
    const perf = entry.strategy.expected_performance;
    lines.push(
      `| ${entry.timestamp.slice(0, 19)} | ${entry.table_name} | ${formatPercent(perf.quality_score)} | ` +
      `${perf.processing_time_minutes.toFixed(1)} | ${formatPercent(perf.success_probability)} | ` +
      `${entry.strategy.risk_assessment.risk_level} |`
    );
  }
  return lines.join('\n');
}

export function formatSessionSummary(summary: SessionSummary): string {
  return [
    `**Total Strategies Generated:** ${summary.total_strategies}`,
    `**Average Quality Score:** ${summary.average_quality_score === null ? 'N/A' : formatPercent(summary.average_quality_score)}`,
    `**Most Common Risk Level:** ${summary.most_common_risk_level ?? 'N/A'}`,
  ].join('\n');
}

export function formatTrainingResult(result: TrainingResult): string {
  const t = result.training_results;
  return [
    '# Model Training Results',
    '',
    `**Total Episodes:** ${t.total_episodes}`,
    `**Success Rate:** ${formatPercent(t.success_rate)}`,
    `**Avg Reward:** ${t.avg_reward.toFixed(2)}`,
    `**Avg Episode Length:** ${t.avg_episode_length.toFixed(1)}`,
  ].join('\n');
}

export function formatPerformanceMetrics(metrics: PerformanceMetrics): string {
  return [
    '# Performance Metrics',
    '',
    `**Total Optimizations:** ${metrics.total_optimizations}`,
    `**Avg Quality Score:** ${metrics.avg_quality_score.toFixed(3)}`,
    `**Avg Processing Time:** ${metrics.avg_processing_time.toFixed(1)} min`,
    `**Success Probability:** ${formatPercent(metrics.avg_success_probability)}`,
  ].join('\n');
}
