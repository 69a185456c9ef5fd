/**
 * Session history
 *
 * Append-only, ordered record of the strategies produced in one session.
 * Owned by the caller (MCP server, CLI); the advisor never reads it.
 */

import type { RiskLevel, SessionEntry, SessionSummary, StrategyResult } from '../types/index.js';
import { formatLocalTimestamp } from '../advisor/format.js';

export class SessionHistory {
  private readonly items: SessionEntry[] = [];

  append(tableName: string, strategy: StrategyResult, at: Date = new Date()): SessionEntry {
    const entry: SessionEntry = {
      timestamp: formatLocalTimestamp(at),
      table_name: tableName,
      strategy,
    };
    this.items.push(entry);
    return entry;
  }

  /** Entries oldest first. Returns a copy. */
  entries(): SessionEntry[] {
    return [...this.items];
  }

  latest(): SessionEntry | null {
    return this.items.length > 0 ? this.items[this.items.length - 1] : null;
  }

  get size(): number {
    return this.items.length;
  }

  summary(): SessionSummary {
    if (this.items.length === 0) {
      return { total_strategies: 0, average_quality_score: null, most_common_risk_level: null };
    }

    const totalQuality = this.items.reduce(
      (sum, e) => sum + e.strategy.expected_performance.quality_score,
      0,
    );

    return {
      total_strategies: this.items.length,
      average_quality_score: totalQuality / this.items.length,
      most_common_risk_level: mostCommonRiskLevel(this.items),
    };
  }
}

/**
 * Mode of the risk levels. On a tie, the level that appeared first in the
 * history wins.
 */
export function mostCommonRiskLevel(entries: SessionEntry[]): RiskLevel | null {
  const counts = new Map<RiskLevel, number>();
  for (const entry of entries) {
    const level = entry.strategy.risk_assessment.risk_level;
    counts.set(level, (counts.get(level) ?? 0) + 1);
  }

  let best: RiskLevel | null = null;
  let bestCount = 0;
  // Map iterates in first-insertion order
  for (const [level, count] of counts) {
    if (count > bestCount) {
      best = level;
      bestCount = count;
    }
  }
  return best;
}
