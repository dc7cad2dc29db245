import { generateSampleData } from '@core/sample-data';
import type { PipelineStore } from '@db/store';
import { errorMessage } from '@shared/errors';
import type { PipelineSnapshot } from '@shared/types';

export interface SnapshotLimits {
  runs: number;
  anomalies: number;
}

/**
 * Reads recent runs and anomalies from the store. When the store cannot be
 * reached the snapshot is generated sample data, tagged `source: 'sample'`
 * and carrying the error message.
 */
export async function loadSnapshot(
  store: PipelineStore,
  limits: SnapshotLimits,
  now: Date = new Date(),
): Promise<PipelineSnapshot> {
  try {
    const [runs, anomalies] = await Promise.all([
      store.listRecentRuns(limits.runs),
      store.listRecentAnomalies(limits.anomalies),
    ]);
    return { runs, anomalies, source: 'store' };
  } catch (err) {
    const error = errorMessage(err);
    console.error('[DATA] Store unavailable, serving sample data:', error);
    const sample = generateSampleData({ count: limits.runs, now });
    return {
      runs: sample.runs,
      anomalies: sample.anomalies.slice(0, limits.anomalies),
      source: 'sample',
      error,
    };
  }
}
