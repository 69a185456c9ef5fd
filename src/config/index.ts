/**
 * Configuration management for the migration advisor
 */

import { config as dotenvConfig } from 'dotenv';

// Load .env
dotenvConfig();

function optionalEnv(key: string, defaultValue: string = ''): string {
  return process.env[key] || defaultValue;
}

function numEnv(key: string, defaultValue: number = 0): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function loadConfig() {
  return {
    training: {
      /** Simulated training latency */
      delayMs: numEnv('TRAINING_DELAY_MS', 2000),
      defaultEpisodes: numEnv('TRAINING_EPISODES', 500),
    },

    app: {
      env: optionalEnv('NODE_ENV', 'development'),
      isDev: optionalEnv('NODE_ENV', 'development') === 'development',
      version: '1.0.0',
    },
  };
}

export const config = loadConfig();

export type Config = ReturnType<typeof loadConfig>;
