import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../config/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import { parseOptimizeArgs, handleCommand } from './index.js';
import { AdvisorSession } from '../session/session.js';
import { InvalidRequestError } from '../advisor/errors.js';

const ORDERS_ARGS = 'name=orders size_mb=1000 schema_complexity=0.6 target_system=bigquery ' +
  'current_quality=0.85 cpu_utilization=0.7 memory_utilization=0.8';

describe('parseOptimizeArgs', () => {
  it('starts from the form defaults', () => {
    expect(parseOptimizeArgs([])).toEqual({
      name: 'users_table',
      size_mb: 2500,
      schema_complexity: 0.7,
      data_type: 'structured',
      source_system: 'postgresql',
      target_system: 'spark',
      priority: 3,
      current_quality: 0.85,
      resource_constraints: {
        cpu_utilization: 0.6,
        memory_utilization: 0.7,
        network_bandwidth: 0.8,
        disk_io: 0.5,
        concurrent_migrations: 2,
      },
    });
  });

  it('overrides fields and clamps ranges', () => {
    const request = parseOptimizeArgs(['size_mb=1000', 'schema_complexity=1.4', 'data_type=mixed', 'priority=9']);

    expect(request.size_mb).toBe(1000);
    expect(request.schema_complexity).toBe(1);
    expect(request.data_type).toBe('mixed');
    expect(request.priority).toBe(5);
  });

  it('rejects tokens without a value', () => {
    expect(() => parseOptimizeArgs(['orders'])).toThrow('Invalid request field "orders": expected key=value');
  });

  it('rejects unknown keys', () => {
    try {
      parseOptimizeArgs(['color=blue']);
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidRequestError);
      if (error instanceof InvalidRequestError) {
        expect(error.field).toBe('color');
      }
    }
  });

  it('rejects non-numeric numbers', () => {
    expect(() => parseOptimizeArgs(['size_mb=abc']))
      .toThrow('Invalid request field "size_mb": expected a number, got "abc"');
    expect(() => parseOptimizeArgs(['size_mb=']))
      .toThrow('Invalid request field "size_mb": expected a number, got ""');
  });

  it('rejects an unknown data type', () => {
    expect(() => parseOptimizeArgs(['data_type=graph'])).toThrow('Invalid request field "data_type"');
  });
});

describe('handleCommand', () => {
  let session: AdvisorSession;

  beforeEach(() => {
    session = new AdvisorSession({ _sleep: async () => {} });
  });

  it('returns null for input that is not a command', async () => {
    expect(await handleCommand('/frobnicate', session)).toBeNull();
    expect(await handleCommand('hello', session)).toBeNull();
  });

  it('shows help', async () => {
    expect(await handleCommand('/help', session)).toContain('/optimize key=value');
  });

  it('derives and records a strategy', async () => {
    const output = await handleCommand(`/optimize ${ORDERS_ARGS}`, session);

    expect(output?.split('\n')).toContain('**Risk Level:** HIGH');
    expect(session.history.size).toBe(1);
    expect(session.history.latest()?.table_name).toBe('orders');
  });

  it('reports invalid arguments without recording anything', async () => {
    const output = await handleCommand('/optimize size_mb=abc', session);

    expect(output).toBe('Error: Invalid request field "size_mb": expected a number, got "abc"');
    expect(session.history.size).toBe(0);
  });

  it('needs a strategy before /show and /export', async () => {
    expect(await handleCommand('/show', session)).toBe('No strategy yet. Use /optimize first.');
    expect(await handleCommand('/export', session)).toBe('No strategy to export. Use /optimize first.');
  });

  it('shows the current strategy', async () => {
    await handleCommand(`/optimize ${ORDERS_ARGS}`, session);

    expect(await handleCommand('/show', session)).toContain('| Batch Size | 10000 | Records per batch |');
  });

  it('lists history and summary', async () => {
    await handleCommand(`/optimize ${ORDERS_ARGS}`, session);

    expect(await handleCommand('/history', session)).toContain('| orders | 89.0% | 10.0 | 82.0% | HIGH |');
    expect(await handleCommand('/summary', session)).toContain('**Total Strategies Generated:** 1');
  });

  it('names the export file', async () => {
    await handleCommand(`/optimize ${ORDERS_ARGS}`, session);

    expect(await handleCommand('/export', session))
      .toMatch(/^Strategy report exported to: migration_strategy_\d{8}_\d{6}\.json$/);
  });

  it('trains and updates the metrics status', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(await handleCommand('/train 50', session)).toContain('**Total Episodes:** 50');
    expect(await handleCommand('/metrics', session)).toContain('**Training Status:** completed');
  });

  it('reports a failed training run', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(await handleCommand('/train many', session))
      .toBe('Error: numEpisodes must be a positive integer, got: NaN');
    expect(session.trainingStatus).toBe('failed');
  });
});
