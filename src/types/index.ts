/**
 * Core types for the migration advisor
 *
 * Field names are snake_case on purpose: they are the JSON wire contract
 * of an exported strategy report and must round-trip unchanged.
 */

// ============================================
// Requests
// ============================================

export const DATA_TYPES = ['structured', 'semi-structured', 'unstructured', 'mixed'] as const;

export type DataType = typeof DATA_TYPES[number];

/**
 * Resource constraints for a migration. Only cpu/memory utilization feed
 * the strategy today; the rest are accepted and carried.
 */
export interface ResourceConstraints {
  cpu_utilization: number;
  memory_utilization: number;
  network_bandwidth?: number;
  disk_io?: number;
  concurrent_migrations?: number;
}

export interface MigrationRequest {
  /** Table, collection or dataset label (history only) */
  name?: string;
  size_mb: number;
  /** 0 = flat, 1 = highly nested/relational */
  schema_complexity: number;
  data_type: DataType;
  source_system: string;
  target_system: string;
  /** 1 = low, 5 = critical business need */
  priority?: number;
  current_quality: number;
  resource_constraints: ResourceConstraints;
}

// ============================================
// Strategy
// ============================================

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export interface ExpectedPerformance {
  quality_score: number;
  processing_time_minutes: number;
  resource_usage: number;
  success_probability: number;
}

export interface ActionParameters {
  batch_size: number;
  parallel_workers: number;
  compression_level: number;
  validation_frequency: number;
  /** 0 = immediate, 1 = exponential backoff, 2 = adaptive */
  retry_strategy: number;
  resource_allocation: number;
  checkpoint_frequency: number;
  /** 0 = skip, 1 = retry, 2 = abort */
  error_handling: number;
}

export interface RiskAssessment {
  risk_level: RiskLevel;
  risk_factors: string[];
  mitigation_strategies: string[];
}

export interface FallbackStrategy {
  batch_size: number;
  parallel_workers: number;
  compression_level: number;
  validation_frequency: number;
  resource_allocation: number;
}

export interface MonitoringPoint {
  metric: string;
  frequency: string;
  threshold: string;
}

export interface Recommendations {
  primary_strategy: string;
  fallback_strategy: FallbackStrategy;
  monitoring_points: MonitoringPoint[];
}

export interface StrategyResult {
  expected_performance: ExpectedPerformance;
  action_parameters: ActionParameters;
  risk_assessment: RiskAssessment;
  recommendations: Recommendations;
}

// ============================================
// Training & Metrics Stubs
// ============================================

export type TrainingStatus = 'not_started' | 'training' | 'completed' | 'failed';

export interface TrainingResult {
  training_results: {
    total_episodes: number;
    success_rate: number;
    avg_reward: number;
    avg_episode_length: number;
  };
  plots: {
    plot_path: string | null;
  };
}

export interface PerformanceMetrics {
  total_optimizations: number;
  avg_quality_score: number;
  avg_processing_time: number;
  avg_success_probability: number;
}

// ============================================
// Session
// ============================================

export interface SessionEntry {
  /** Local time, ISO-8601 without zone (e.g. 2026-10-19T08:05:03.123) */
  timestamp: string;
  table_name: string;
  strategy: StrategyResult;
}

export interface SessionSummary {
  total_strategies: number;
  average_quality_score: number | null;
  most_common_risk_level: RiskLevel | null;
}

// ============================================
// Logging
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}
