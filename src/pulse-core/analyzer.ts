import { DEFAULT_THRESHOLDS, PREDICTION_WINDOW, SCORE_WINDOW } from '@shared/constants';
import type { PerformanceAnalysis, Prediction, RunRecord, Thresholds } from '@shared/types';
import { performanceScore, successRate } from './scoring';
import { mean, round1, sampleStdev } from './statistics';
import { chronological, classifyTrend, rollingSuccessRates } from './trends';

export const RECOMMENDATIONS = {
  noData: 'No data available for analysis',
  failureCritical:
    '🚨 Critical: High failure rate detected. Review recent changes and test coverage.',
  failureWarning: '⚠️ Warning: Increased failure rate. Monitor test stability.',
  durationCritical:
    '🚨 Critical: Build times are very slow. Consider optimizing build process.',
  durationWarning: '⚠️ Warning: Build times are increasing. Review build efficiency.',
  inconsistent: '📊 Build times are inconsistent. Investigate resource allocation.',
  allGood: '✅ Pipeline performance looks good! Keep up the excellent work.',
} as const;

const INCONSISTENT_STDEV = 60;
const MIN_PREDICTION_RUNS = 3;

export function analyzePerformanceTrends(
  runs: readonly RunRecord[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): PerformanceAnalysis | null {
  if (runs.length === 0) return null;

  const ordered = chronological(runs);

  return {
    durationTrend: classifyTrend(ordered.map((r) => r.duration)),
    successRateTrend: classifyTrend(rollingSuccessRates(ordered)),
    performanceScore: performanceScore(ordered),
    recommendations: generateRecommendations(ordered, thresholds),
    prediction: predictNextRun(ordered),
  };
}

export function generateRecommendations(
  runs: readonly RunRecord[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): string[] {
  if (runs.length === 0) return [RECOMMENDATIONS.noData];

  const recent = chronological(runs).slice(-SCORE_WINDOW);
  const recommendations: string[] = [];

  const failureRate = 1 - successRate(recent);
  if (failureRate > thresholds.failureRateCritical) {
    recommendations.push(RECOMMENDATIONS.failureCritical);
  } else if (failureRate > thresholds.failureRateWarning) {
    recommendations.push(RECOMMENDATIONS.failureWarning);
  }

  const durations = recent.map((r) => r.duration);
  const avgDuration = mean(durations);
  if (avgDuration > thresholds.durationCritical) {
    recommendations.push(RECOMMENDATIONS.durationCritical);
  } else if (avgDuration > thresholds.durationWarning) {
    recommendations.push(RECOMMENDATIONS.durationWarning);
  }

  if (durations.length > 1 && sampleStdev(durations) > INCONSISTENT_STDEV) {
    recommendations.push(RECOMMENDATIONS.inconsistent);
  }

  if (recommendations.length === 0) {
    recommendations.push(RECOMMENDATIONS.allGood);
  }

  return recommendations;
}

/**
 * Projects the next run from the last five: the mean duration nudged ten
 * percent in the direction of the duration trend, and the recent success
 * percentage.
 */
export function predictNextRun(runs: readonly RunRecord[]): Prediction {
  if (runs.length < MIN_PREDICTION_RUNS) {
    return { available: false, reason: 'Insufficient data for prediction' };
  }

  const recent = chronological(runs).slice(-PREDICTION_WINDOW);
  const durations = recent.map((r) => r.duration);
  const trend = classifyTrend(durations);

  let predictedDuration = mean(durations);
  let confidence: 'medium' | 'high' = 'medium';
  if (trend === 'improving') {
    predictedDuration *= 0.9;
    confidence = 'high';
  } else if (trend === 'degrading') {
    predictedDuration *= 1.1;
    confidence = 'high';
  }

  return {
    available: true,
    predictedDuration: round1(predictedDuration),
    successProbability: round1(successRate(recent) * 100),
    confidence,
    trend,
  };
}
