import { describe, it, expect } from 'vitest';
import {
  conclusionToStatus,
  toRunRecord,
  workflowRunsResponseSchema,
} from '@core/workflow-runs';
import { workflowRun } from '../fixtures/github';

describe('conclusionToStatus', () => {
  it('maps pass and fail outcomes', () => {
    expect(conclusionToStatus('success')).toBe('success');
    expect(conclusionToStatus('failure')).toBe('failure');
    expect(conclusionToStatus('timed_out')).toBe('failure');
    expect(conclusionToStatus('startup_failure')).toBe('failure');
  });

  it('ignores other outcomes', () => {
    expect(conclusionToStatus('cancelled')).toBeNull();
    expect(conclusionToStatus('skipped')).toBeNull();
    expect(conclusionToStatus(null)).toBeNull();
    expect(conclusionToStatus(undefined)).toBeNull();
  });
});

describe('toRunRecord', () => {
  it('maps a completed run', () => {
    const run = workflowRun({
      id: 42,
      conclusion: 'failure',
      startedAt: '2026-04-01T10:00:00Z',
      durationSeconds: 125,
      branch: 'develop',
    });
    expect(toRunRecord(run)).toEqual({
      id: '42',
      status: 'failure',
      duration: 125,
      timestamp: '2026-04-01T10:00:00.000Z',
      branch: 'develop',
      commit: 'abc1234',
      author: 'avery',
      workflow: 'CI',
      url: 'https://github.com/octo/widgets/actions/runs/42',
    });
  });

  it('falls back to created_at when the start time is missing', () => {
    const run = {
      ...workflowRun({ id: 1, conclusion: 'success', startedAt: '2026-04-01T10:00:00Z', durationSeconds: 60 }),
      run_started_at: null,
      created_at: '2026-04-01T09:59:00Z',
    };
    expect(toRunRecord(run)?.duration).toBe(120);
    expect(toRunRecord(run)?.timestamp).toBe('2026-04-01T09:59:00.000Z');
  });

  it('skips runs without a pass/fail outcome', () => {
    const inProgress = workflowRun({ id: 1, conclusion: null, startedAt: '2026-04-01T10:00:00Z', durationSeconds: 5 });
    const cancelled = workflowRun({ id: 2, conclusion: 'cancelled', startedAt: '2026-04-01T10:00:00Z', durationSeconds: 5 });
    expect(toRunRecord(inProgress)).toBeNull();
    expect(toRunRecord(cancelled)).toBeNull();
  });

  it('skips runs with unreadable timestamps', () => {
    const run = {
      ...workflowRun({ id: 1, conclusion: 'success', startedAt: '2026-04-01T10:00:00Z', durationSeconds: 5 }),
      updated_at: 'not a date',
    };
    expect(toRunRecord(run)).toBeNull();
  });

  it('leaves optional fields null', () => {
    const run = {
      ...workflowRun({ id: 3, conclusion: 'success', startedAt: '2026-04-01T10:00:00Z', durationSeconds: 30 }),
      name: null,
      head_branch: null,
      head_sha: null,
      html_url: null,
      actor: null,
    };
    expect(toRunRecord(run)).toMatchObject({
      branch: null,
      commit: null,
      author: null,
      workflow: null,
      url: null,
    });
  });
});

describe('workflowRunsResponseSchema', () => {
  it('parses a listing and drops unknown fields', () => {
    const payload = {
      total_count: 1,
      workflow_runs: [
        {
          id: 9,
          name: 'CI',
          status: 'completed',
          conclusion: 'success',
          created_at: '2026-04-01T10:00:00Z',
          updated_at: '2026-04-01T10:01:00Z',
          run_attempt: 1,
        },
      ],
    };
    const parsed = workflowRunsResponseSchema.parse(payload);
    expect(parsed.workflow_runs[0]).toEqual({
      id: 9,
      name: 'CI',
      status: 'completed',
      conclusion: 'success',
      created_at: '2026-04-01T10:00:00Z',
      updated_at: '2026-04-01T10:01:00Z',
    });
  });

  it('rejects a listing without runs', () => {
    expect(workflowRunsResponseSchema.safeParse({ total_count: 0 }).success).toBe(false);
  });
});
