/**
 * Strategy report export
 *
 * File names carry a local-time stamp: migration_strategy_YYYYMMDD_HHMMSS.json.
 * The written JSON holds exactly the strategy field set, nothing more.
 */

import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { StrategyResult } from '../types/index.js';
import { formatLocalTimestamp } from '../advisor/format.js';
import { getConfig } from '../config/paths.js';
import { logger } from '../config/logger.js';

export function exportFilename(at: Date = new Date()): string {
  const stamp = formatLocalTimestamp(at);
  const date = stamp.slice(0, 10).replace(/-/g, '');
  const time = stamp.slice(11, 19).replace(/:/g, '');
  return `migration_strategy_${date}_${time}.json`;
}

/**
 * Rebuild the strategy field by field so that properties a caller tacked
 * onto the object never reach the exported file.
 */
export function toWireStrategy(strategy: StrategyResult): StrategyResult {
  const perf = strategy.expected_performance;
  const params = strategy.action_parameters;
  const risk = strategy.risk_assessment;
  const recs = strategy.recommendations;
  const fallback = recs.fallback_strategy;

  return {
    expected_performance: {
      quality_score: perf.quality_score,
      processing_time_minutes: perf.processing_time_minutes,
      resource_usage: perf.resource_usage,
      success_probability: perf.success_probability,
    },
    action_parameters: {
      batch_size: params.batch_size,
      parallel_workers: params.parallel_workers,
      compression_level: params.compression_level,
      validation_frequency: params.validation_frequency,
      retry_strategy: params.retry_strategy,
      resource_allocation: params.resource_allocation,
      checkpoint_frequency: params.checkpoint_frequency,
      error_handling: params.error_handling,
    },
    risk_assessment: {
      risk_level: risk.risk_level,
      risk_factors: [...risk.risk_factors],
      mitigation_strategies: [...risk.mitigation_strategies],
    },
    recommendations: {
      primary_strategy: recs.primary_strategy,
      fallback_strategy: {
        batch_size: fallback.batch_size,
        parallel_workers: fallback.parallel_workers,
        compression_level: fallback.compression_level,
        validation_frequency: fallback.validation_frequency,
        resource_allocation: fallback.resource_allocation,
      },
      monitoring_points: recs.monitoring_points.map(p => ({
        metric: p.metric,
        frequency: p.frequency,
        threshold: p.threshold,
      })),
    },
  };
}

export function serializeStrategy(strategy: StrategyResult): string {
  return JSON.stringify(toWireStrategy(strategy), null, 2);
}

export interface ExportOptions {
  /** Write the JSON file under the export directory (default: name only) */
  write?: boolean;
  at?: Date;
}

/**
 * Export a strategy report. Returns the file name, or the written path
 * when `write` is set.
 */
export function exportStrategyReport(strategy: StrategyResult, options: ExportOptions = {}): string {
  const filename = exportFilename(options.at);
  if (!options.write) {
    return filename;
  }

  const dir = getConfig().exportDir;
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  const path = join(dir, filename);
  writeFileSync(path, serializeStrategy(strategy) + '\n');

  logger.info('Strategy report exported', { path });
  return path;
}
