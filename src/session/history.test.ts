import { describe, it, expect } from 'vitest';
import { SessionHistory, mostCommonRiskLevel } from './history.js';
import { deriveStrategy } from '../advisor/strategy.js';
import { formatHistoryTable } from '../advisor/format.js';
import { exportFilename } from '../export/report.js';
import type { MigrationRequest, RiskLevel, SessionEntry, StrategyResult } from '../types/index.js';

const baseRequest: MigrationRequest = {
  size_mb: 1000,
  schema_complexity: 0.6,
  data_type: 'structured',
  source_system: 'postgresql',
  target_system: 'bigquery',
  current_quality: 0.85,
  resource_constraints: { cpu_utilization: 0.7, memory_utilization: 0.8 },
};

function strategyWithRisk(level: RiskLevel): StrategyResult {
  const strategy = deriveStrategy(baseRequest);
  return { ...strategy, risk_assessment: { ...strategy.risk_assessment, risk_level: level } };
}

function entriesWithRisks(levels: RiskLevel[]): SessionEntry[] {
  return levels.map((level, i) => ({
    timestamp: `2026-10-19T08:${String(i).padStart(2, '0')}:00.000`,
    table_name: `t${i}`,
    strategy: strategyWithRisk(level),
  }));
}

describe('SessionHistory', () => {
  it('starts empty', () => {
    const history = new SessionHistory();

    expect(history.size).toBe(0);
    expect(history.latest()).toBeNull();
    expect(history.entries()).toEqual([]);
    expect(history.summary()).toEqual({
      total_strategies: 0,
      average_quality_score: null,
      most_common_risk_level: null,
    });
  });

  it('appends entries in order with local-time timestamps', () => {
    const history = new SessionHistory();
    const strategy = deriveStrategy(baseRequest);

    history.append('orders', strategy, new Date(2026, 9, 19, 8, 0, 0));
    const second = history.append('customers', strategy, new Date(2026, 9, 19, 9, 30, 0));

    expect(history.size).toBe(2);
    expect(history.entries().map(e => e.table_name)).toEqual(['orders', 'customers']);
    expect(second.timestamp).toBe('2026-10-19T09:30:00.000');
    expect(history.latest()).toBe(second);
  });

  it('stamps history on the same clock as the export file name', () => {
    const history = new SessionHistory();
    const at = new Date(2026, 9, 19, 23, 59, 58);

    history.append('orders', deriveStrategy(baseRequest), at);

    expect(formatHistoryTable(history.entries()).split('\n')[2].startsWith('| 2026-10-19T23:59:58 | orders |')).toBe(true);
    expect(exportFilename(at)).toBe('migration_strategy_20261019_235958.json');
  });

  it('returns a copy of its entries', () => {
    const history = new SessionHistory();
    history.append('orders', deriveStrategy(baseRequest));

    history.entries().pop();

    expect(history.size).toBe(1);
  });

  it('averages quality scores', () => {
    const history = new SessionHistory();
    // quality 0.98 (capped) and 0.5 + 0.1 = 0.6
    history.append('flat', deriveStrategy({ ...baseRequest, schema_complexity: 0, current_quality: 0.9 }));
    history.append('dirty', deriveStrategy({ ...baseRequest, schema_complexity: 0, current_quality: 0.5 }));

    const summary = history.summary();
    expect(summary.total_strategies).toBe(2);
    expect(summary.average_quality_score).toBeCloseTo(0.79, 10);
    expect(summary.most_common_risk_level).toBe('LOW');
  });
});

describe('mostCommonRiskLevel', () => {
  it('returns null for no entries', () => {
    expect(mostCommonRiskLevel([])).toBeNull();
  });

  it('returns the most frequent level', () => {
    expect(mostCommonRiskLevel(entriesWithRisks(['MEDIUM', 'HIGH', 'HIGH']))).toBe('HIGH');
  });

  it('breaks ties by first appearance', () => {
    expect(mostCommonRiskLevel(entriesWithRisks(['HIGH', 'LOW', 'LOW', 'HIGH']))).toBe('HIGH');
    expect(mostCommonRiskLevel(entriesWithRisks(['LOW', 'MEDIUM']))).toBe('LOW');
  });
});
