/**
 * Advisor session
 *
 * Per-surface state around the stateless advisor: strategy history, the
 * current strategy and the training stub's status.
 */

import type {
  MigrationRequest,
  SessionEntry,
  StrategyResult,
  TrainingResult,
  TrainingStatus,
} from '../types/index.js';
import { deriveStrategy } from '../advisor/strategy.js';
import { trainModel } from '../advisor/training.js';
import type { TrainingOptions } from '../advisor/training.js';
import { getPerformanceMetrics } from '../advisor/metrics.js';
import type { PerformanceMetrics } from '../types/index.js';
import { AdvisorError } from '../advisor/errors.js';
import { logger } from '../config/logger.js';
import { SessionHistory } from './history.js';

export const DEFAULT_TABLE_NAME = 'unnamed_table';

export class AdvisorSession {
  readonly history = new SessionHistory();
  private current: StrategyResult | null = null;
  private status: TrainingStatus = 'not_started';
  private lastTraining: TrainingResult | null = null;

  constructor(private readonly trainingOptions: TrainingOptions = {}) {}

  /** Derive a strategy and record it as the current one. */
  optimize(request: MigrationRequest, at: Date = new Date()): SessionEntry {
    const strategy = deriveStrategy(request);
    this.current = strategy;
    const entry = this.history.append(request.name ?? DEFAULT_TABLE_NAME, strategy, at);

    logger.info('Strategy generated', {
      table: entry.table_name,
      riskLevel: strategy.risk_assessment.risk_level,
      sessionSize: this.history.size,
    });

    return entry;
  }

  get currentStrategy(): StrategyResult | null {
    return this.current;
  }

  get trainingStatus(): TrainingStatus {
    return this.status;
  }

  get trainingResults(): TrainingResult | null {
    return this.lastTraining;
  }

  /**
   * Run the training stub. Rejects while a previous run is still in
   * progress, leaving that run's status untouched.
   */
  async train(numEpisodes?: number): Promise<TrainingResult> {
    if (this.status === 'training') {
      throw new AdvisorError('TRAINING_IN_PROGRESS', 'Training is already in progress; wait for it to finish');
    }
    this.status = 'training';
    try {
      const result = await trainModel(numEpisodes, this.trainingOptions);
      this.status = 'completed';
      this.lastTraining = result;
      return result;
    } catch (error) {
      this.status = 'failed';
      logger.error('Training failed', { error: error instanceof Error ? error.message : String(error) });
      throw error;
    }
  }

  metrics(): PerformanceMetrics {
    return getPerformanceMetrics(this.history.size);
  }
}
