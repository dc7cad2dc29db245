import { DEFAULT_THRESHOLDS } from '@shared/constants';
import type {
  InsightPrediction,
  Insights,
  Optimization,
  RunRecord,
  Thresholds,
} from '@shared/types';
import { generateRecommendations, predictNextRun } from './analyzer';
import { mean, round1, sampleStdev } from './statistics';
import { chronological, classifyTrend } from './trends';

const STREAK_LENGTH = 3;
const FLAKY_FLIP_RATE = 0.3;
const FLAKY_MIN_RUNS = 4;
const BRANCH_FAILURE_RATE = 0.5;
const BRANCH_MIN_RUNS = 2;
const PEAK_HOUR_MIN_RUNS = 5;
const PEAK_HOUR_MIN_COUNT = 2;
const INCONSISTENT_STDEV = 60;

// ---------------------------------------------------------------------------
// Pattern detectors
// ---------------------------------------------------------------------------

export function trailingFailureStreak(ordered: readonly RunRecord[]): number {
  let streak = 0;
  for (let i = ordered.length - 1; i >= 0 && ordered[i].status === 'failure'; i--) {
    streak++;
  }
  return streak;
}

/** Share of consecutive pairs whose status differs. */
export function statusFlipRate(ordered: readonly RunRecord[]): number {
  if (ordered.length < 2) return 0;
  let flips = 0;
  for (let i = 1; i < ordered.length; i++) {
    if (ordered[i].status !== ordered[i - 1].status) flips++;
  }
  return flips / (ordered.length - 1);
}

export function isFlaky(ordered: readonly RunRecord[]): boolean {
  return ordered.length >= FLAKY_MIN_RUNS && statusFlipRate(ordered) > FLAKY_FLIP_RATE;
}

function failingBranches(runs: readonly RunRecord[]): { branch: string; rate: number }[] {
  const totals = new Map<string, { runs: number; failures: number }>();
  for (const run of runs) {
    if (!run.branch) continue;
    const entry = totals.get(run.branch) ?? { runs: 0, failures: 0 };
    entry.runs++;
    if (run.status === 'failure') entry.failures++;
    totals.set(run.branch, entry);
  }

  const result: { branch: string; rate: number }[] = [];
  for (const [branch, t] of totals) {
    const rate = t.failures / t.runs;
    if (t.runs >= BRANCH_MIN_RUNS && rate >= BRANCH_FAILURE_RATE) {
      result.push({ branch, rate });
    }
  }
  return result.sort((a, b) => b.rate - a.rate || a.branch.localeCompare(b.branch));
}

function peakHour(runs: readonly RunRecord[]): { hour: number; count: number } | null {
  if (runs.length < PEAK_HOUR_MIN_RUNS) return null;
  const counts = new Array<number>(24).fill(0);
  for (const run of runs) {
    const time = Date.parse(run.timestamp);
    if (Number.isNaN(time)) continue;
    counts[new Date(time).getUTCHours()]++;
  }
  let hour = 0;
  for (let h = 1; h < 24; h++) {
    if (counts[h] > counts[hour]) hour = h;
  }
  const count = counts[hour];
  const runnerUp = Math.max(...counts.filter((_, h) => h !== hour));
  // Only a single busiest hour with repeat starts counts as a peak
  return count >= PEAK_HOUR_MIN_COUNT && count > runnerUp ? { hour, count } : null;
}

function detectPatterns(ordered: readonly RunRecord[]): string[] {
  const patterns: string[] = [];

  const streak = trailingFailureStreak(ordered);
  if (streak >= STREAK_LENGTH) {
    patterns.push(`${streak} consecutive failures in the most recent runs`);
  }

  if (isFlaky(ordered)) {
    const pct = Math.round(statusFlipRate(ordered) * 100);
    patterns.push(`Status flips between success and failure in ${pct}% of consecutive runs`);
  }

  for (const { branch, rate } of failingBranches(ordered)) {
    patterns.push(`Branch "${branch}" fails in ${Math.round(rate * 100)}% of its runs`);
  }

  const peak = peakHour(ordered);
  if (peak) {
    const hh = String(peak.hour).padStart(2, '0');
    patterns.push(`Most runs start around ${hh}:00 UTC (${peak.count} of ${ordered.length})`);
  }

  const durationTrend = classifyTrend(ordered.map((r) => r.duration));
  if (durationTrend === 'improving') {
    patterns.push('Build durations are trending upward');
  } else if (durationTrend === 'degrading') {
    patterns.push('Build durations are trending downward');
  }

  return patterns;
}

// ---------------------------------------------------------------------------
// Optimizations
// ---------------------------------------------------------------------------

function suggestOptimizations(
  ordered: readonly RunRecord[],
  thresholds: Thresholds,
): Optimization[] {
  if (ordered.length === 0) return [];

  const durations = ordered.map((r) => r.duration);
  const avg = mean(durations);
  const optimizations: Optimization[] = [];

  if (avg > thresholds.durationWarning) {
    optimizations.push({
      title: 'Cache dependencies',
      description: `Average build takes ${round1(avg)}s. Caching package installs and build outputs between runs usually removes the largest fixed cost.`,
      impact: avg > thresholds.durationCritical ? 'high' : 'medium',
    });
  }

  if (avg > thresholds.durationCritical) {
    optimizations.push({
      title: 'Parallelize jobs',
      description: 'Split the test suite into parallel jobs or a matrix to bring wall-clock time under the critical threshold.',
      impact: 'high',
    });
  }

  if (isFlaky(ordered)) {
    optimizations.push({
      title: 'Stabilize flaky tests',
      description: 'Quarantine tests that pass and fail without code changes, and rerun them in isolation to find order or timing dependencies.',
      impact: 'medium',
    });
  }

  const stdev = sampleStdev(durations);
  if (stdev > INCONSISTENT_STDEV) {
    optimizations.push({
      title: 'Review runner allocation',
      description: `Durations vary by ${round1(stdev)}s. Pin runner sizes or check for queueing on shared runners.`,
      impact: 'low',
    });
  }

  return optimizations;
}

// ---------------------------------------------------------------------------
// Public
// ---------------------------------------------------------------------------

export function generateInsights(
  runs: readonly RunRecord[],
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): Insights {
  const ordered = chronological(runs);
  const prediction = predictNextRun(ordered);

  const predictions: InsightPrediction[] = prediction.available
    ? [
        {
          metric: 'next_run_duration',
          value: prediction.predictedDuration,
          unit: 'seconds',
          confidence: prediction.confidence,
        },
        {
          metric: 'next_run_success_probability',
          value: prediction.successProbability,
          unit: 'percent',
          confidence: prediction.confidence,
        },
      ]
    : [];

  return {
    patterns: detectPatterns(ordered),
    optimizations: suggestOptimizations(ordered, thresholds),
    predictions,
    recommendations: generateRecommendations(ordered, thresholds),
  };
}
