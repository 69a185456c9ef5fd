import { describe, it, expect } from 'vitest';
import {
  formatPercent,
  formatLocalTimestamp,
  retryStrategyLabel,
  errorHandlingLabel,
  metricLabel,
  performanceProfile,
  formatStrategyReport,
  formatHistoryTable,
  formatSessionSummary,
  formatTrainingResult,
  formatPerformanceMetrics,
} from './format.js';
import { deriveStrategy } from './strategy.js';
import type { MigrationRequest, SessionEntry } from '../types/index.js';

const request: MigrationRequest = {
  size_mb: 1000,
  schema_complexity: 0.6,
  data_type: 'structured',
  source_system: 'postgresql',
  target_system: 'bigquery',
  current_quality: 0.85,
  resource_constraints: { cpu_utilization: 0.7, memory_utilization: 0.8 },
};

const strategy = deriveStrategy(request);

describe('formatLocalTimestamp', () => {
  it('renders local wall-clock time without a zone designator', () => {
    expect(formatLocalTimestamp(new Date(2026, 0, 5, 7, 4, 9, 7))).toBe('2026-01-05T07:04:09.007');
    expect(formatLocalTimestamp(new Date(2026, 9, 19, 23, 59, 58, 123))).toBe('2026-10-19T23:59:58.123');
  });
});

describe('labels', () => {
  it('formats percentages with one decimal', () => {
    expect(formatPercent(0.9)).toBe('90.0%');
    expect(formatPercent(0.05)).toBe('5.0%');
    expect(formatPercent(0)).toBe('0.0%');
  });

  it('maps retry and error handling codes', () => {
    expect(retryStrategyLabel(0)).toBe('Immediate');
    expect(retryStrategyLabel(1)).toBe('Exponential Backoff');
    expect(retryStrategyLabel(2)).toBe('Adaptive');
    expect(retryStrategyLabel(7)).toBe('Unknown (7)');
    expect(errorHandlingLabel(1)).toBe('Retry');
    expect(errorHandlingLabel(-1)).toBe('Unknown (-1)');
  });

  it('title-cases metric names', () => {
    expect(metricLabel('data_quality')).toBe('Data Quality');
    expect(metricLabel('processing_speed')).toBe('Processing Speed');
  });
});

describe('performanceProfile', () => {
  it('normalizes the four axes', () => {
    const profile = performanceProfile(strategy);

    expect(profile.map(p => p.axis)).toEqual(['Quality', 'Speed', 'Efficiency', 'Success Rate']);
    expect(profile[0].value).toBeCloseTo(0.89, 10);
    expect(profile[1].value).toBeCloseTo(1 - 10 / 60, 10);
    expect(profile[2].value).toBe(0.9);
    expect(profile[3].value).toBeCloseTo(0.82, 10);
  });

  it('clamps speed to zero for long migrations', () => {
    const slow = deriveStrategy({ ...request, size_mb: 100_000 });
    expect(performanceProfile(slow)[1].value).toBe(0);
  });
});

describe('formatStrategyReport', () => {
  const lines = formatStrategyReport(strategy).split('\n');

  it('leads with the risk level and primary strategy', () => {
    expect(lines[0]).toBe('# Migration Strategy');
    expect(lines).toContain('**Risk Level:** HIGH');
    expect(lines).toContain('**Primary Strategy:** Batch processing with 1 workers');
  });

  it('renders expected performance', () => {
    expect(lines).toContain('| Quality Score | 89.0% |');
    expect(lines).toContain('| Processing Time | 10.0 min |');
    expect(lines).toContain('| Resource Usage | 90.0% |');
    expect(lines).toContain('| Success Probability | 82.0% |');
    expect(lines).toContain('**Performance profile:** Quality 0.89, Speed 0.83, Efficiency 0.90, Success Rate 0.82');
  });

  it('renders action parameters with their labels', () => {
    expect(lines).toContain('| Batch Size | 10000 | Records per batch |');
    expect(lines).toContain('| Validation Frequency | 10.0% | How often to validate data |');
    expect(lines).toContain('| Retry Strategy | Exponential Backoff | Strategy for handling retries |');
    expect(lines).toContain('| Checkpoint Frequency | 20.0% | How often to create checkpoints |');
    expect(lines).toContain('| Error Handling | Retry | Strategy for handling errors |');
  });

  it('renders risk factors and recommendations', () => {
    expect(lines).toContain('- System compatibility: postgresql → bigquery');
    expect(lines).toContain('- Implement rollback mechanisms');
    expect(lines).toContain('- Batch Size: 5,000');
    expect(lines).toContain('- Validation Frequency: 5.0%');
    expect(lines).toContain('- Resource Allocation: 60.0%');
    expect(lines).toContain('- **Data Quality**: every 1000 records - > 0.95');
    expect(lines[lines.length - 1]).toBe('- **Resource Usage**: continuous - < 0.9');
  });
});

describe('session formatting', () => {
  it('reports an empty history', () => {
    expect(formatHistoryTable([])).toBe('No strategies generated this session.');
  });

  it('renders one row per entry', () => {
    const entries: SessionEntry[] = [
      { timestamp: '2026-10-19T08:05:03.123', table_name: 'orders', strategy },
    ];

    const lines = formatHistoryTable(entries).split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('| 2026-10-19T08:05:03 | orders | 89.0% | 10.0 | 82.0% | HIGH |');
  });

  it('shows N/A for an empty summary', () => {
    expect(formatSessionSummary({
      total_strategies: 0,
      average_quality_score: null,
      most_common_risk_level: null,
    })).toBe([
      '**Total Strategies Generated:** 0',
      '**Average Quality Score:** N/A',
      '**Most Common Risk Level:** N/A',
    ].join('\n'));
  });

  it('formats a populated summary', () => {
    const text = formatSessionSummary({
      total_strategies: 2,
      average_quality_score: 0.925,
      most_common_risk_level: 'MEDIUM',
    });
    expect(text).toContain('**Average Quality Score:** 92.5%');
    expect(text).toContain('**Most Common Risk Level:** MEDIUM');
  });
});

describe('training and metrics formatting', () => {
  it('formats training results', () => {
    const text = formatTrainingResult({
      training_results: { total_episodes: 100, success_rate: 0.85, avg_reward: 0.72, avg_episode_length: 45.3 },
      plots: { plot_path: null },
    });

    expect(text.split('\n')).toEqual([
      '# Model Training Results',
      '',
      '**Total Episodes:** 100',
      '**Success Rate:** 85.0%',
      '**Avg Reward:** 0.72',
      '**Avg Episode Length:** 45.3',
    ]);
  });

  it('formats performance metrics', () => {
    const text = formatPerformanceMetrics({
      total_optimizations: 4,
      avg_quality_score: 0.87,
      avg_processing_time: 12.5,
      avg_success_probability: 0.89,
    });

    expect(text.split('\n')).toEqual([
      '# Performance Metrics',
      '',
      '**Total Optimizations:** 4',
      '**Avg Quality Score:** 0.870',
      '**Avg Processing Time:** 12.5 min',
      '**Success Probability:** 89.0%',
    ]);
  });
});
