import { describe, it, expect } from 'vitest';
import { RECOMMENDATIONS } from '@core/analyzer';
import {
  generateInsights,
  isFlaky,
  statusFlipRate,
  trailingFailureStreak,
} from '@core/insights';
import { F, S, makeRun, makeRuns } from '../fixtures/runs';

describe('pattern helpers', () => {
  it('counts the trailing failure streak', () => {
    expect(trailingFailureStreak(makeRuns([S, F, S, F, F]))).toBe(2);
    expect(trailingFailureStreak(makeRuns([F, F, S]))).toBe(0);
    expect(trailingFailureStreak([])).toBe(0);
  });

  it('measures how often status flips', () => {
    expect(statusFlipRate(makeRuns([S, F, S, F, S]))).toBe(1);
    expect(statusFlipRate(makeRuns([S, S, F, F, F]))).toBe(0.25);
    expect(statusFlipRate(makeRuns([S]))).toBe(0);
  });

  it('needs four runs before calling a pipeline flaky', () => {
    expect(isFlaky(makeRuns([S, F, S]))).toBe(false);
    expect(isFlaky(makeRuns([S, F, S, F]))).toBe(true);
  });
});

describe('generateInsights', () => {
  it('is empty without runs', () => {
    expect(generateInsights([])).toEqual({
      patterns: [],
      optimizations: [],
      predictions: [],
      recommendations: [RECOMMENDATIONS.noData],
    });
  });

  it('reports a failure streak and a failing branch', () => {
    const insights = generateInsights(makeRuns([S, S, F, F, F]));
    expect(insights.patterns).toEqual([
      '3 consecutive failures in the most recent runs',
      'Branch "main" fails in 60% of its runs',
    ]);
    expect(insights.optimizations).toEqual([]);
    expect(insights.recommendations).toEqual([RECOMMENDATIONS.failureCritical]);
    expect(insights.predictions).toEqual([
      { metric: 'next_run_duration', value: 100, unit: 'seconds', confidence: 'medium' },
      { metric: 'next_run_success_probability', value: 40, unit: 'percent', confidence: 'medium' },
    ]);
  });

  it('orders the input before looking for patterns', () => {
    const runs = makeRuns([S, S, F, F, F]);
    expect(generateInsights([...runs].reverse())).toEqual(generateInsights(runs));
  });

  it('flags a flaky pipeline', () => {
    const runs = [S, F, S, F, S, F].map((status, i) =>
      makeRun(i, { status, branch: status === 'success' ? 'main' : 'feature/login' }),
    );
    const insights = generateInsights(runs);
    expect(insights.patterns).toContain(
      'Status flips between success and failure in 100% of consecutive runs',
    );
    expect(insights.patterns).toContain('Branch "feature/login" fails in 100% of its runs');
    expect(insights.optimizations.map((o) => o.title)).toEqual(['Stabilize flaky tests']);
  });

  it('notices durations trending upward', () => {
    const insights = generateInsights(makeRuns([S, S, S, S, S], [100, 110, 120, 130, 140]));
    expect(insights.patterns).toContain('Build durations are trending upward');
    expect(insights.predictions[0]).toEqual({
      metric: 'next_run_duration',
      value: 108,
      unit: 'seconds',
      confidence: 'high',
    });
  });

  it('reports the hour most runs start in', () => {
    const runs = [9, 33, 57, 10, 11].map((hour) => makeRun(hour));
    expect(generateInsights(runs).patterns).toEqual([
      'Most runs start around 09:00 UTC (3 of 5)',
    ]);
  });

  it('reports no peak hour without a clear winner', () => {
    const spread = [0, 1, 2, 3, 4].map((hour) => makeRun(hour));
    const tied = [9, 33, 10, 34, 11].map((hour) => makeRun(hour));
    expect(generateInsights(spread).patterns).toEqual([]);
    expect(generateInsights(tied).patterns).toEqual([]);
  });

  it('suggests caching when builds are slow', () => {
    const warning = generateInsights(makeRuns([S, S, S, S], [200, 200, 200, 200]));
    expect(warning.optimizations).toEqual([
      {
        title: 'Cache dependencies',
        description:
          'Average build takes 200s. Caching package installs and build outputs between runs usually removes the largest fixed cost.',
        impact: 'medium',
      },
    ]);

    const critical = generateInsights(makeRuns([S, S, S, S], [350, 350, 350, 350]));
    expect(critical.optimizations.map((o) => [o.title, o.impact])).toEqual([
      ['Cache dependencies', 'high'],
      ['Parallelize jobs', 'high'],
    ]);
  });

  it('suggests reviewing runners when durations vary widely', () => {
    const insights = generateInsights(makeRuns([S, S, S, S], [50, 250, 50, 250]));
    const review = insights.optimizations.find((o) => o.title === 'Review runner allocation');
    expect(review?.description).toBe(
      'Durations vary by 115.5s. Pin runner sizes or check for queueing on shared runners.',
    );
    expect(review?.impact).toBe('low');
  });

  it('respects configured thresholds', () => {
    const runs = makeRuns([S, S, S, S], [90, 90, 90, 90]);
    const thresholds = {
      durationWarning: 60,
      durationCritical: 80,
      failureRateWarning: 0.1,
      failureRateCritical: 0.2,
    };
    expect(generateInsights(runs, thresholds).optimizations.map((o) => o.title)).toEqual([
      'Cache dependencies',
      'Parallelize jobs',
    ]);
  });
});
