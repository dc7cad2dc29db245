import { describe, it, expect } from 'vitest';
import {
  RECOMMENDATIONS,
  analyzePerformanceTrends,
  generateRecommendations,
  predictNextRun,
} from '@core/analyzer';
import { F, S, makeRuns } from '../fixtures/runs';

const repeat = <T>(value: T, n: number): T[] => Array.from({ length: n }, () => value);

describe('generateRecommendations', () => {
  it('reports missing data', () => {
    expect(generateRecommendations([])).toEqual([RECOMMENDATIONS.noData]);
  });

  it('praises a fast, green pipeline', () => {
    expect(generateRecommendations(makeRuns(repeat(S, 5)))).toEqual([RECOMMENDATIONS.allGood]);
  });

  it('flags a critical failure rate above 20%', () => {
    const runs = makeRuns([...repeat(F, 3), ...repeat(S, 7)]);
    expect(generateRecommendations(runs)).toEqual([RECOMMENDATIONS.failureCritical]);
  });

  it('warns when the failure rate is above 10% but not above 20%', () => {
    const runs = makeRuns([...repeat(F, 2), ...repeat(S, 8)]);
    expect(generateRecommendations(runs)).toEqual([RECOMMENDATIONS.failureWarning]);
  });

  it('flags slow builds', () => {
    expect(generateRecommendations(makeRuns(repeat(S, 4), repeat(400, 4)))).toEqual([
      RECOMMENDATIONS.durationCritical,
    ]);
    expect(generateRecommendations(makeRuns(repeat(S, 4), repeat(150, 4)))).toEqual([
      RECOMMENDATIONS.durationWarning,
    ]);
  });

  it('flags inconsistent build times', () => {
    const runs = makeRuns(repeat(S, 4), [50, 250, 50, 250]);
    expect(generateRecommendations(runs)).toEqual([
      RECOMMENDATIONS.durationWarning,
      RECOMMENDATIONS.inconsistent,
    ]);
  });

  it('uses the configured thresholds', () => {
    const thresholds = {
      durationWarning: 60,
      durationCritical: 90,
      failureRateWarning: 0.5,
      failureRateCritical: 0.9,
    };
    const runs = makeRuns([F, S, S, S]);
    expect(generateRecommendations(runs, thresholds)).toEqual([RECOMMENDATIONS.durationCritical]);
  });
});

describe('predictNextRun', () => {
  it('needs at least three runs', () => {
    expect(predictNextRun(makeRuns([S, S]))).toEqual({
      available: false,
      reason: 'Insufficient data for prediction',
    });
  });

  it('uses the mean for a stable trend', () => {
    expect(predictNextRun(makeRuns([S, S, F, S, S]))).toEqual({
      available: true,
      predictedDuration: 100,
      successProbability: 80,
      confidence: 'medium',
      trend: 'stable',
    });
  });

  it('takes ten percent off for an improving trend', () => {
    const prediction = predictNextRun(makeRuns(repeat(S, 5), [100, 110, 120, 130, 140]));
    expect(prediction).toEqual({
      available: true,
      predictedDuration: 108,
      successProbability: 100,
      confidence: 'high',
      trend: 'improving',
    });
  });

  it('adds ten percent for a degrading trend', () => {
    const prediction = predictNextRun(makeRuns(repeat(S, 5), [140, 130, 120, 110, 100]));
    expect(prediction).toMatchObject({ predictedDuration: 132, trend: 'degrading' });
  });

  it('only considers the last five runs', () => {
    const runs = makeRuns([F, F, S, S, S, S, S], [1000, 1000, 100, 100, 100, 100, 100]);
    expect(predictNextRun(runs)).toMatchObject({ predictedDuration: 100, successProbability: 100 });
  });
});

describe('analyzePerformanceTrends', () => {
  it('returns null without runs', () => {
    expect(analyzePerformanceTrends([])).toBeNull();
  });

  it('orders runs chronologically before analysing', () => {
    const runs = makeRuns(repeat(S, 5), [100, 110, 120, 130, 140]);
    const forward = analyzePerformanceTrends(runs);
    const backward = analyzePerformanceTrends([...runs].reverse());

    expect(forward).toEqual(backward);
    expect(forward?.durationTrend).toBe('improving');
    expect(forward?.successRateTrend).toBe('stable');
    expect(forward?.recommendations).toEqual([RECOMMENDATIONS.allGood]);
  });

  it('detects a degrading success rate', () => {
    const analysis = analyzePerformanceTrends(makeRuns([S, S, S, S, F, F, F, F]));
    expect(analysis?.successRateTrend).toBe('degrading');
  });
});
