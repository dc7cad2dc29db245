import { detectAnomaly } from '@core/anomaly';
import { toRunRecord } from '@core/workflow-runs';
import type { PipelineStore } from '@db/store';
import { errorMessage } from '@shared/errors';
import type { IngestSummary } from '@shared/types';
import type { WorkflowRunSource } from './github-client';

export interface IngestDeps {
  github: WorkflowRunSource;
  store: PipelineStore;
  anomalyWindow: number;
  now?: () => Date;
}

/**
 * One polling pass: pull the latest workflow runs, persist the ones not seen
 * before and record an anomaly for each that trips a rule.
 *
 * Runs are processed oldest first so every duration baseline only contains
 * runs that started earlier. A store failure on one run is recorded and the
 * pass moves on; a failure fetching from GitHub rejects.
 */
export async function ingestRuns(deps: IngestDeps): Promise<IngestSummary> {
  const { github, store, anomalyWindow } = deps;
  const now = deps.now ?? (() => new Date());

  const workflowRuns = await github.listWorkflowRuns();
  const summary: IngestSummary = {
    fetched: workflowRuns.length,
    stored: 0,
    duplicates: 0,
    skipped: 0,
    anomalies: [],
    errors: [],
  };

  for (const workflowRun of [...workflowRuns].reverse()) {
    const run = toRunRecord(workflowRun);
    if (!run) {
      summary.skipped++;
      continue;
    }

    try {
      const baseline = await store.recentDurations(anomalyWindow);
      const inserted = await store.saveRun(run);
      if (!inserted) {
        summary.duplicates++;
        continue;
      }
      summary.stored++;

      const anomaly = detectAnomaly(run, baseline, now());
      if (anomaly) {
        summary.anomalies.push(await store.saveAnomaly(anomaly));
      }
    } catch (err) {
      console.error(`[POLL] Failed to store run ${run.id}:`, errorMessage(err));
      summary.errors.push({ runId: run.id, error: errorMessage(err) });
    }
  }

  console.warn(
    `[POLL] Processed ${summary.fetched} runs: ${summary.stored} new, ${summary.duplicates} known, ${summary.skipped} skipped, ${summary.anomalies.length} anomalies`,
  );
  return summary;
}
