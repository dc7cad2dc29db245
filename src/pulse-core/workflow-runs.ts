import { z } from 'zod';
import type { RunRecord, RunStatus } from '@shared/types';

export const workflowRunSchema = z.object({
  id: z.number(),
  name: z.string().nullish(),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
  created_at: z.string(),
  updated_at: z.string(),
  run_started_at: z.string().nullish(),
  head_branch: z.string().nullish(),
  head_sha: z.string().nullish(),
  html_url: z.string().nullish(),
  actor: z.object({ login: z.string() }).nullish(),
});

export const workflowRunsResponseSchema = z.object({
  total_count: z.number(),
  workflow_runs: z.array(workflowRunSchema),
});

export type WorkflowRun = z.infer<typeof workflowRunSchema>;

const CONCLUSIONS: Record<string, RunStatus> = {
  success: 'success',
  failure: 'failure',
  timed_out: 'failure',
  startup_failure: 'failure',
};

export function conclusionToStatus(conclusion: string | null | undefined): RunStatus | null {
  if (!conclusion) return null;
  return CONCLUSIONS[conclusion] ?? null;
}

/**
 * Maps a GitHub workflow run to a run record. Runs still in progress, or
 * that concluded without a pass/fail outcome (cancelled, skipped...), map to
 * `null`.
 */
export function toRunRecord(run: WorkflowRun): RunRecord | null {
  const status = conclusionToStatus(run.conclusion);
  if (!status) return null;

  const startedAt = run.run_started_at ?? run.created_at;
  const start = Date.parse(startedAt);
  const end = Date.parse(run.updated_at);
  if (Number.isNaN(start) || Number.isNaN(end)) return null;

  return {
    id: String(run.id),
    status,
    duration: Math.max(0, Math.round((end - start) / 1000)),
    timestamp: new Date(start).toISOString(),
    branch: run.head_branch ?? null,
    commit: run.head_sha ?? null,
    author: run.actor?.login ?? null,
    workflow: run.name ?? null,
    url: run.html_url ?? null,
  };
}
