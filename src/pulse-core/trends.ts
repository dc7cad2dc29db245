import { ROLLING_WINDOW } from '@shared/constants';
import type { RunRecord, Trend } from '@shared/types';
import { olsSlope } from './statistics';

const TREND_SLOPE = 0.1;

export function byTimestamp(a: RunRecord, b: RunRecord): number {
  return Date.parse(a.timestamp) - Date.parse(b.timestamp);
}

/** Returns a chronologically ordered copy, oldest first. */
export function chronological(runs: readonly RunRecord[]): RunRecord[] {
  return [...runs].sort(byTimestamp);
}

/**
 * Fraction of successes in the trailing window ending at each position.
 * The result is aligned with `runs`.
 */
export function rollingSuccessRates(
  runs: readonly RunRecord[],
  windowSize: number = ROLLING_WINDOW,
): number[] {
  const w = Math.max(1, Math.floor(windowSize));
  const rates: number[] = [];
  let successes = 0;

  for (let i = 0; i < runs.length; i++) {
    if (runs[i].status === 'success') successes++;
    if (i >= w && runs[i - w].status === 'success') successes--;
    const size = Math.min(i + 1, w);
    rates.push(successes / size);
  }

  return rates;
}

export function classifyTrend(values: readonly number[]): Trend {
  if (values.length < 2) return 'stable';
  const slope = olsSlope(values);
  if (slope > TREND_SLOPE) return 'improving';
  if (slope < -TREND_SLOPE) return 'degrading';
  return 'stable';
}
