/**
 * MCP Server Entry Point
 *
 * Exposes the migration advisor's tools, resources and prompts over
 * stdio (JSON-RPC over stdin/stdout). One AdvisorSession lives as long
 * as the server process.
 *
 * IMPORTANT: Set MIGRATION_ADVISOR_MODE before any imports that use the logger.
 */

process.env.MIGRATION_ADVISOR_MODE = 'mcp';

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config as dotenvConfig } from 'dotenv';

// Explicit path to .env — don't rely on CWD which may differ in an MCP subprocess
const __dirname = dirname(fileURLToPath(import.meta.url));
dotenvConfig({ path: resolve(__dirname, '../../.env') });

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AdvisorSession } from '../session/session.js';
import { registerStrategyTools } from './tools/strategy.js';
import { registerTrainingTools } from './tools/training.js';
import { registerResources } from './resources.js';
import { registerPrompts } from './prompts.js';
import { config } from '../config/index.js';
import { logger } from '../config/logger.js';

const server = new McpServer({
  name: 'migration-advisor',
  version: config.app.version,
});

const session = new AdvisorSession();

registerStrategyTools(server, session);
registerTrainingTools(server, session);
registerResources(server, session);
registerPrompts(server);

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info('migration-advisor MCP server started', {
    version: config.app.version,
    env: config.app.env,
  });
}

main().catch((error) => {
  logger.error('MCP server failed to start', { error: String(error) });
  process.exit(1);
});
