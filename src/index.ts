#!/usr/bin/env node
/**
 * Migration Advisor - Main Entry Point
 *
 * Usage:
 *   npm run cli    - Interactive CLI (default)
 *   npm run demo   - Scripted demo run
 *   npm run mcp    - MCP server over stdio (src/mcp/server.ts)
 */

import { config } from './config/index.js';
import { logger } from './config/logger.js';
import { startCli } from './cli/index.js';
import { runDemo } from './cli/demo.js';

type RunMode = 'cli' | 'demo';

function parseMode(raw: string | undefined): RunMode {
  if (raw === undefined || raw === 'cli') return 'cli';
  if (raw === 'demo') return 'demo';
  throw new Error(`Unknown mode "${raw}". Expected one of: cli, demo`);
}

async function main(): Promise<void> {
  const mode = parseMode(process.argv[2]);

  logger.info('Starting migration advisor', {
    mode,
    env: config.app.env,
    version: config.app.version,
  });

  switch (mode) {
    case 'demo': {
      const lines = await runDemo();
      console.log(lines.join('\n'));
      break;
    }

    case 'cli':
      await startCli();
      break;
  }
}

main().catch((error) => {
  logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
