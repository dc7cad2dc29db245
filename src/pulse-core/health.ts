import { DEFAULT_THRESHOLDS, SCORE_WINDOW } from '@shared/constants';
import type {
  AlertLevel,
  AnomalyRecord,
  HealthReport,
  HealthState,
  RunRecord,
  Thresholds,
} from '@shared/types';
import { analyzePerformanceTrends } from './analyzer';
import { healthScore, successRate } from './scoring';
import { chronological } from './trends';

const ANOMALY_WINDOW = 5;
const SEVERE = new Set(['high', 'critical']);

/**
 * Grades the last ten runs and the five newest anomalies. `anomalies` is
 * expected newest first, as every store lists them.
 */
export function overallHealth(
  runs: readonly RunRecord[],
  anomalies: readonly AnomalyRecord[],
): HealthState {
  if (runs.length === 0) return 'unknown';

  const recentRuns = chronological(runs).slice(-SCORE_WINDOW);
  // Newest first; the sort is stable, so tied timestamps keep the caller's order
  const recentAnomalies = [...anomalies]
    .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp))
    .slice(0, ANOMALY_WINDOW);

  const failureRate = 1 - successRate(recentRuns);
  const severe = recentAnomalies.filter((a) => SEVERE.has(a.severity)).length;

  if (failureRate > 0.3 || severe > 2) return 'critical';
  if (failureRate > 0.1 || severe > 0) return 'warning';
  return 'healthy';
}

export function alertLevel(health: HealthState): AlertLevel {
  switch (health) {
    case 'critical':
      return 'high';
    case 'warning':
      return 'medium';
    default:
      return 'low';
  }
}

export function checkPipelineHealth(
  runs: readonly RunRecord[],
  anomalies: readonly AnomalyRecord[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
  now: Date = new Date(),
): HealthReport {
  const health = overallHealth(runs, anomalies);
  return {
    overallHealth: health,
    healthScore: healthScore(runs),
    alertLevel: alertLevel(health),
    performanceAnalysis: analyzePerformanceTrends(runs, thresholds),
    lastUpdated: now.toISOString(),
  };
}
