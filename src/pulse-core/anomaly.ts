import type { NewAnomaly, RunRecord } from '@shared/types';
import { mean } from './statistics';

export const ANOMALY_RULES = {
  longBuild: { issue: 'Long build time', fix: 'Optimize resources' },
  failure: { issue: 'Test failure', fix: 'Check test logs' },
} as const;

const LONG_BUILD_FACTOR = 2;
const SEVERE_BUILD_FACTOR = 3;

/**
 * Flags a run whose duration exceeds twice the mean of `recentDurations`, or
 * that failed outright. The duration rule is checked first. Without history
 * there is no baseline and only the failure rule applies.
 */
export function detectAnomaly(
  run: RunRecord,
  recentDurations: readonly number[],
  now: Date = new Date(),
): NewAnomaly | null {
  const timestamp = now.toISOString();

  if (recentDurations.length > 0) {
    const baseline = mean(recentDurations);
    if (run.duration > LONG_BUILD_FACTOR * baseline) {
      return {
        ...ANOMALY_RULES.longBuild,
        runId: run.id,
        severity: run.duration > SEVERE_BUILD_FACTOR * baseline ? 'high' : 'medium',
        timestamp,
      };
    }
  }

  if (run.status === 'failure') {
    return { ...ANOMALY_RULES.failure, runId: run.id, severity: 'high', timestamp };
  }

  return null;
}
