import { describe, it, expect } from 'vitest';
import { ingestRuns } from '@worker/ingest';
import { FakeRunSource, workflowRun } from '../fixtures/github';
import { MemoryStore } from '../helpers/memory-store';

const now = () => new Date('2026-04-01T12:00:00Z');

// Newest first, as GitHub lists them
function githubRuns() {
  return [
    workflowRun({ id: 4, conclusion: 'success', startedAt: '2026-04-01T10:30:00Z', durationSeconds: 500 }),
    workflowRun({ id: 3, conclusion: 'cancelled', startedAt: '2026-04-01T10:20:00Z', durationSeconds: 10 }),
    workflowRun({ id: 2, conclusion: 'failure', startedAt: '2026-04-01T10:10:00Z', durationSeconds: 100 }),
    workflowRun({ id: 1, conclusion: 'success', startedAt: '2026-04-01T10:00:00Z', durationSeconds: 100 }),
  ];
}

describe('ingestRuns', () => {
  it('stores new runs and records anomalies against earlier runs', async () => {
    const store = new MemoryStore();
    const summary = await ingestRuns({
      github: new FakeRunSource(githubRuns()),
      store,
      anomalyWindow: 10,
      now,
    });

    expect(summary).toMatchObject({ fetched: 4, stored: 3, duplicates: 0, skipped: 1, errors: [] });
    expect(summary.anomalies).toEqual([
      {
        id: 'anomaly-1',
        runId: '2',
        issue: 'Test failure',
        fix: 'Check test logs',
        severity: 'high',
        timestamp: '2026-04-01T12:00:00.000Z',
      },
      {
        id: 'anomaly-2',
        runId: '4',
        issue: 'Long build time',
        fix: 'Optimize resources',
        severity: 'high',
        timestamp: '2026-04-01T12:00:00.000Z',
      },
    ]);
    expect(store.runs.map((r) => r.id)).toEqual(['1', '2', '4']);
  });

  it('counts runs it has already stored as duplicates', async () => {
    const store = new MemoryStore();
    const deps = { github: new FakeRunSource(githubRuns()), store, anomalyWindow: 10, now };
    await ingestRuns(deps);
    const second = await ingestRuns(deps);

    expect(second).toMatchObject({ stored: 0, duplicates: 3, skipped: 1, anomalies: [] });
    expect(store.anomalies).toHaveLength(2);
  });

  it('keeps going when a single run fails to save', async () => {
    const store = new MemoryStore();
    store.failingRunIds.add('2');
    const summary = await ingestRuns({
      github: new FakeRunSource(githubRuns()),
      store,
      anomalyWindow: 10,
      now,
    });

    expect(summary.stored).toBe(2);
    expect(summary.errors).toEqual([{ runId: '2', error: 'disk full' }]);
    expect(summary.anomalies.map((a) => [a.runId, a.severity])).toEqual([['4', 'high']]);
  });

  it('limits the baseline to the anomaly window', async () => {
    const store = new MemoryStore();
    const runs = [
      workflowRun({ id: 3, conclusion: 'success', startedAt: '2026-04-01T10:20:00Z', durationSeconds: 150 }),
      workflowRun({ id: 2, conclusion: 'success', startedAt: '2026-04-01T10:10:00Z', durationSeconds: 100 }),
      workflowRun({ id: 1, conclusion: 'success', startedAt: '2026-04-01T10:00:00Z', durationSeconds: 10 }),
    ];
    const summary = await ingestRuns({ github: new FakeRunSource(runs), store, anomalyWindow: 1, now });

    // Run 2 is measured against run 1 only; run 3 against run 2 only
    expect(summary.anomalies.map((a) => [a.runId, a.severity])).toEqual([['2', 'high']]);
  });

  it('rejects when GitHub cannot be reached', async () => {
    const source = new FakeRunSource([]);
    source.error = new Error('connect ECONNREFUSED');
    await expect(
      ingestRuns({ github: source, store: new MemoryStore(), anomalyWindow: 10, now }),
    ).rejects.toThrow('connect ECONNREFUSED');
  });
});
