import type { PerformanceMetrics } from '../types/index.js';

/**
 * Fixed averages advertised by the dashboard. Only the optimization count
 * is live, and the caller supplies it from its own session history.
 */
export function getPerformanceMetrics(totalOptimizations: number): PerformanceMetrics {
  return {
    total_optimizations: totalOptimizations,
    avg_quality_score: 0.87,
    avg_processing_time: 12.5,
    avg_success_probability: 0.89,
  };
}
