/**
 * Strategy Advisor
 *
 * Maps a migration request to a strategy through closed-form arithmetic
 * and threshold rules. No randomness, no I/O, no state: the same request
 * always yields the same strategy.
 */

import type {
  ActionParameters,
  ExpectedPerformance,
  FallbackStrategy,
  MigrationRequest,
  MonitoringPoint,
  RiskLevel,
  StrategyResult,
} from '../types/index.js';
import { parseMigrationRequest } from './request.js';

/** Smallest batch the advisor recommends */
export const MIN_BATCH_SIZE = 1000;

/** Records per batch per MB of data */
const BATCH_RECORDS_PER_MB = 10;

/** MB of data per parallel worker */
const MB_PER_WORKER = 1000;

export const MIN_WORKERS = 1;
export const MAX_WORKERS = 8;

/** MB one worker processes per minute */
const MB_PER_WORKER_MINUTE = 100;

const MIN_PROCESSING_MINUTES = 5;

export const MAX_QUALITY_SCORE = 0.98;
export const MIN_SUCCESS_PROBABILITY = 0.7;
const MAX_RESOURCE_USAGE = 0.9;

/** Quality gained on a perfectly flat schema */
const FLAT_SCHEMA_QUALITY_GAIN = 0.1;

/** Success probability lost on a maximally complex schema */
const COMPLEX_SCHEMA_SUCCESS_PENALTY = 0.3;

/** Risk thresholds, checked in order: first match wins */
export const RISK_THRESHOLDS: ReadonlyArray<{
  level: Exclude<RiskLevel, 'HIGH'>;
  minSuccessProbability: number;
  minQualityScore: number;
}> = [
  { level: 'LOW', minSuccessProbability: 0.9, minQualityScore: 0.95 },
  { level: 'MEDIUM', minSuccessProbability: 0.8, minQualityScore: 0.9 },
];

export const FIXED_ACTION_PARAMETERS = {
  compression_level: 6,
  validation_frequency: 0.1,
  retry_strategy: 1,
  resource_allocation: 0.8,
  checkpoint_frequency: 0.2,
  error_handling: 1,
} as const;

export const FALLBACK_PARAMETERS = {
  compression_level: 3,
  validation_frequency: 0.05,
  resource_allocation: 0.6,
} as const;

export const MITIGATION_STRATEGIES: readonly string[] = [
  'Use incremental validation',
  'Implement rollback mechanisms',
  'Monitor resource usage closely',
];

export const MONITORING_POINTS: readonly MonitoringPoint[] = [
  { metric: 'data_quality', frequency: 'every 1000 records', threshold: '> 0.95' },
  { metric: 'processing_speed', frequency: 'every 5 minutes', threshold: '> 1000 records/min' },
  { metric: 'resource_usage', frequency: 'continuous', threshold: '< 0.9' },
];

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function batchSizeFor(sizeMb: number): number {
  return Math.max(MIN_BATCH_SIZE, Math.round(sizeMb * BATCH_RECORDS_PER_MB));
}

export function parallelWorkersFor(sizeMb: number): number {
  return clamp(Math.round(sizeMb / MB_PER_WORKER), MIN_WORKERS, MAX_WORKERS);
}

/**
 * Classify risk. LOW is the stricter test and is checked first.
 */
export function classifyRisk(successProbability: number, qualityScore: number): RiskLevel {
  for (const threshold of RISK_THRESHOLDS) {
    if (successProbability > threshold.minSuccessProbability && qualityScore > threshold.minQualityScore) {
      return threshold.level;
    }
  }
  return 'HIGH';
}

function expectedPerformance(request: MigrationRequest, parallelWorkers: number): ExpectedPerformance {
  const { cpu_utilization, memory_utilization } = request.resource_constraints;
  return {
    quality_score: Math.min(
      MAX_QUALITY_SCORE,
      request.current_quality + (1 - request.schema_complexity) * FLAT_SCHEMA_QUALITY_GAIN,
    ),
    // parallelWorkers >= 1, so the divisor is never zero
    processing_time_minutes: Math.max(
      MIN_PROCESSING_MINUTES,
      request.size_mb / (parallelWorkers * MB_PER_WORKER_MINUTE),
    ),
    resource_usage: Math.min(MAX_RESOURCE_USAGE, cpu_utilization + memory_utilization),
    success_probability: Math.max(
      MIN_SUCCESS_PROBABILITY,
      1 - request.schema_complexity * COMPLEX_SCHEMA_SUCCESS_PENALTY,
    ),
  };
}

export function fallbackFor(action: Pick<ActionParameters, 'batch_size' | 'parallel_workers'>): FallbackStrategy {
  return {
    batch_size: Math.floor(action.batch_size / 2),
    parallel_workers: Math.max(MIN_WORKERS, Math.floor(action.parallel_workers / 2)),
    ...FALLBACK_PARAMETERS,
  };
}

/**
 * Two decimal places, ties to even. A value sits exactly halfway between
 * two hundredths only when it is an odd multiple of 1/8 (0.125, 0.375, ...);
 * everything else already rounds to the nearer neighbour with toFixed.
 */
export function formatTwoDecimals(value: number): string {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    // value * 100 is exact here: 12.5 * an odd integer
    const lower = Math.floor(value * 100);
    const even = lower % 2 === 0 ? lower : lower + 1;
    return (even / 100).toFixed(2);
  }
  return value.toFixed(2);
}

export function riskFactorsFor(request: MigrationRequest): string[] {
  return [
    `Schema complexity: ${formatTwoDecimals(request.schema_complexity)}`,
    `Data type: ${request.data_type}`,
    `System compatibility: ${request.source_system} → ${request.target_system}`,
  ];
}

/**
 * Derive the migration strategy for a request.
 *
 * The request is type-checked (a malformed field raises
 * InvalidRequestError) but not range-checked: validating or clamping
 * ranges is the caller's job.
 */
export function deriveStrategy(request: MigrationRequest): StrategyResult {
  const checked = parseMigrationRequest(request);

  const batchSize = batchSizeFor(checked.size_mb);
  const parallelWorkers = parallelWorkersFor(checked.size_mb);
  const performance = expectedPerformance(checked, parallelWorkers);

  const actionParameters: ActionParameters = {
    batch_size: batchSize,
    parallel_workers: parallelWorkers,
    ...FIXED_ACTION_PARAMETERS,
  };

  return {
    expected_performance: performance,
    action_parameters: actionParameters,
    risk_assessment: {
      risk_level: classifyRisk(performance.success_probability, performance.quality_score),
      risk_factors: riskFactorsFor(checked),
      mitigation_strategies: [...MITIGATION_STRATEGIES],
    },
    recommendations: {
      primary_strategy: `Batch processing with ${parallelWorkers} workers`,
      fallback_strategy: fallbackFor(actionParameters),
      monitoring_points: MONITORING_POINTS.map(point => ({ ...point })),
    },
  };
}
