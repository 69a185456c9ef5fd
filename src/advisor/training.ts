/**
 * Training stub
 *
 * There is no model to train. This waits for a configurable interval to
 * simulate training latency and returns fixed results, keeping the
 * advertised train_model surface of the dashboard.
 */

import type { TrainingResult } from '../types/index.js';
import { config } from '../config/index.js';
import { logger } from '../config/logger.js';

export interface TrainingOptions {
  /** Simulated latency; defaults to TRAINING_DELAY_MS */
  delayMs?: number;
  /** Injectable sleep function for testing */
  _sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const STUB_TRAINING_RESULTS = {
  success_rate: 0.85,
  avg_reward: 0.72,
  avg_episode_length: 45.3,
} as const;

export async function trainModel(
  numEpisodes: number = config.training.defaultEpisodes,
  options: TrainingOptions = {},
): Promise<TrainingResult> {
  if (!Number.isInteger(numEpisodes) || numEpisodes < 1) {
    throw new Error(`numEpisodes must be a positive integer, got: ${numEpisodes}`);
  }

  const delayMs = options.delayMs ?? config.training.delayMs;
  const sleep = options._sleep ?? defaultSleep;

  logger.info('Simulated training started', { numEpisodes, delayMs });
  await sleep(delayMs);
  logger.info('Simulated training complete', { numEpisodes });

  return {
    training_results: {
      total_episodes: numEpisodes,
      ...STUB_TRAINING_RESULTS,
    },
    plots: {
      plot_path: null,
    },
  };
}
