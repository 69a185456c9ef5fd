/**
 * CLI Interface - Interactive command-line interface for the migration advisor
 */

import * as readline from 'readline';
import { AdvisorSession } from '../session/session.js';
import {
  clampRequest,
  defaultMigrationFields,
  migrationFieldsShape,
  parseMigrationRequest,
} from '../advisor/request.js';
import { InvalidRequestError } from '../advisor/errors.js';
import {
  formatHistoryTable,
  formatPerformanceMetrics,
  formatSessionSummary,
  formatStrategyReport,
  formatTrainingResult,
} from '../advisor/format.js';
import { exportStrategyReport } from '../export/report.js';
import type { MigrationRequest } from '../types/index.js';

const WELCOME_MESSAGE = `
╔══════════════════════════════════════════════════════════════╗
║                     MIGRATION ADVISOR                        ║
║      Deterministic migration strategy recommendations        ║
╚══════════════════════════════════════════════════════════════╝

Commands:
  /help                 - Show this help message
  /optimize key=value   - Derive a strategy (unset keys use form defaults)
  /show                 - Show the current strategy
  /history              - List strategies generated this session
  /summary              - Show session aggregates
  /train [episodes]     - Run the simulated model training
  /metrics              - Show performance metrics
  /export [--write]     - Export the current strategy report
  /exit                 - Exit the CLI

Keys: ${Object.keys(migrationFieldsShape).join(', ')}
Example: /optimize name=orders size_mb=1000 schema_complexity=0.6 target_system=bigquery
`;

const NUMERIC_FIELDS = new Set([
  'size_mb', 'schema_complexity', 'priority', 'current_quality',
  'cpu_utilization', 'memory_utilization', 'network_bandwidth', 'disk_io',
  'concurrent_migrations',
]);

const KNOWN_FIELDS = new Set(Object.keys(migrationFieldsShape));

/**
 * Parse `key=value` tokens over the form defaults. Ranges are clamped,
 * not rejected; unknown keys and non-numeric numbers are rejected.
 */
export function parseOptimizeArgs(args: string[]): MigrationRequest {
  const values: Record<string, string | number> = { ...defaultMigrationFields() };

  for (const token of args) {
    const eq = token.indexOf('=');
    if (eq <= 0) {
      throw new InvalidRequestError(token, 'expected key=value');
    }
    const key = token.slice(0, eq);
    const raw = token.slice(eq + 1);

    if (!KNOWN_FIELDS.has(key)) {
      throw new InvalidRequestError(key, 'unknown field');
    }
    if (NUMERIC_FIELDS.has(key)) {
      const parsed = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(parsed)) {
        throw new InvalidRequestError(key, `expected a number, got "${raw}"`);
      }
      values[key] = parsed;
    } else {
      values[key] = raw;
    }
  }

  const request = parseMigrationRequest({
    name: values.name,
    size_mb: values.size_mb,
    schema_complexity: values.schema_complexity,
    data_type: values.data_type,
    source_system: values.source_system,
    target_system: values.target_system,
    priority: values.priority,
    current_quality: values.current_quality,
    resource_constraints: {
      cpu_utilization: values.cpu_utilization,
      memory_utilization: values.memory_utilization,
      network_bandwidth: values.network_bandwidth,
      disk_io: values.disk_io,
      concurrent_migrations: values.concurrent_migrations,
    },
  });

  return clampRequest(request);
}

/**
 * Handle CLI commands. Returns null for input that is not a command.
 */
export async function handleCommand(input: string, session: AdvisorSession): Promise<string | null> {
  const [cmd, ...args] = input.trim().split(/\s+/);

  try {
    switch (cmd.toLowerCase()) {
      case '/help':
        return WELCOME_MESSAGE;

      case '/optimize': {
        const entry = session.optimize(parseOptimizeArgs(args));
        return formatStrategyReport(entry.strategy);
      }

      case '/show': {
        const strategy = session.currentStrategy;
        return strategy ? formatStrategyReport(strategy) : 'No strategy yet. Use /optimize first.';
      }

      case '/history':
        return formatHistoryTable(session.history.entries());

      case '/summary':
        return formatSessionSummary(session.history.summary());

      case '/train': {
        const episodes = args[0] === undefined ? undefined : Number(args[0]);
        console.log('Training model...');
        const result = await session.train(episodes);
        return formatTrainingResult(result);
      }

      case '/metrics':
        return [
          formatPerformanceMetrics(session.metrics()),
          `**Training Status:** ${session.trainingStatus}`,
        ].join('\n');

      case '/export': {
        const strategy = session.currentStrategy;
        if (!strategy) {
          return 'No strategy to export. Use /optimize first.';
        }
        const target = exportStrategyReport(strategy, { write: args.includes('--write') });
        return `Strategy report exported to: ${target}`;
      }

      default:
        return null; // Not a command
    }
  } catch (error) {
    return `Error: ${error instanceof Error ? error.message : 'Unknown error'}`;
  }
}

/**
 * Start the CLI
 */
export async function startCli(session: AdvisorSession = new AdvisorSession()): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  console.log(WELCOME_MESSAGE);

  const prompt = () => {
    rl.question('\n> ', async (input) => {
      const trimmed = input.trim();

      if (!trimmed) {
        prompt();
        return;
      }

      if (trimmed === '/exit' || trimmed === '/quit') {
        rl.close();
        return;
      }

      const result = await handleCommand(trimmed, session);
      console.log(`\n${result ?? `Unknown command: ${trimmed.split(' ')[0]}. Type /help for commands.`}`);
      prompt();
    });
  };

  await new Promise<void>((resolve) => {
    rl.on('close', () => {
      console.log('\nGoodbye!\n');
      resolve();
    });
    prompt();
  });
}
