import type { RunRecord, RunStats } from '@shared/types';
import { mean, round1 } from './statistics';
import { chronological } from './trends';

export function computeRunStats(runs: readonly RunRecord[]): RunStats {
  const totalRuns = runs.length;
  if (totalRuns === 0) {
    return {
      totalRuns: 0,
      successfulRuns: 0,
      totalFailures: 0,
      successRate: 0,
      avgDuration: 0,
      lastRunAt: null,
    };
  }

  const successfulRuns = runs.filter((r) => r.status === 'success').length;
  const ordered = chronological(runs);

  return {
    totalRuns,
    successfulRuns,
    totalFailures: totalRuns - successfulRuns,
    successRate: round1((successfulRuns / totalRuns) * 100),
    avgDuration: round1(mean(runs.map((r) => r.duration))),
    lastRunAt: ordered[ordered.length - 1].timestamp,
  };
}
