import { NEUTRAL_SCORE, SCORE_WINDOW } from '@shared/constants';
import type { RunRecord } from '@shared/types';
import { clamp, mean, round1, sampleStdev } from './statistics';
import { chronological } from './trends';

// ---------------------------------------------------------------------------
// Performance score
// ---------------------------------------------------------------------------

const SUCCESS_WEIGHT = 40;
const DURATION_WEIGHT = 30;
const CONSISTENCY_WEIGHT = 30;
const DURATION_CEILING = 180;
const STDEV_CEILING = 60;

export function successRate(runs: readonly RunRecord[]): number {
  if (runs.length === 0) return 0;
  return runs.filter((r) => r.status === 'success').length / runs.length;
}

/** Duration component of the performance score, 0 to 30 points. */
export function durationScore(meanDuration: number): number {
  return Math.max(0, (DURATION_CEILING - meanDuration) / DURATION_CEILING) * DURATION_WEIGHT;
}

export function consistencyScore(stdevDuration: number): number {
  return Math.max(0, (STDEV_CEILING - stdevDuration) / STDEV_CEILING) * CONSISTENCY_WEIGHT;
}

/**
 * 0-100 score over the last ten runs: success rate, mean duration and
 * duration spread. Zero runs score {@link NEUTRAL_SCORE}.
 */
export function performanceScore(runs: readonly RunRecord[]): number {
  if (runs.length === 0) return NEUTRAL_SCORE;

  const recent = chronological(runs).slice(-SCORE_WINDOW);
  const durations = recent.map((r) => r.duration);

  const total =
    successRate(recent) * SUCCESS_WEIGHT +
    durationScore(mean(durations)) +
    consistencyScore(sampleStdev(durations));

  return Math.trunc(clamp(total, 0, 100));
}

// ---------------------------------------------------------------------------
// Health score
// ---------------------------------------------------------------------------

const HEALTH_SUCCESS_WEIGHT = 60;
const HEALTH_DURATION_WEIGHT = 20;
const HEALTH_FREQUENCY_WEIGHT = 20;
const EXPECTED_DAILY_RUNS = 24;

export function durationFavorability(avgDuration: number): number {
  return Math.max(0, 1 - (avgDuration - 60) / 120);
}

export function frequencyFavorability(runCount: number): number {
  return Math.min(1, runCount / EXPECTED_DAILY_RUNS);
}

export function healthScore(runs: readonly RunRecord[]): number {
  if (runs.length === 0) return NEUTRAL_SCORE;

  const avgDuration = mean(runs.map((r) => r.duration));
  const total =
    successRate(runs) * HEALTH_SUCCESS_WEIGHT +
    durationFavorability(avgDuration) * HEALTH_DURATION_WEIGHT +
    frequencyFavorability(runs.length) * HEALTH_FREQUENCY_WEIGHT;

  return round1(clamp(total, 0, 100));
}
