import { afterEach, describe, it, expect, vi } from 'vitest';
import { createApp } from '@api/app';
import { buildServices } from '../../helpers/api';
import { startServer, type TestServer } from '../../helpers/http';
import { MemoryStore } from '../../helpers/memory-store';
import { FakeRunSource, workflowRun } from '../../fixtures/github';

let server: TestServer | null = null;

afterEach(async () => {
  await server?.close();
  server = null;
  vi.restoreAllMocks();
});

async function refresh(runSource: FakeRunSource | null, store = new MemoryStore()) {
  server = await startServer(createApp(buildServices({ store, runSource })));
  const res = await fetch(`${server.url}/api/refresh`);
  const body: unknown = await res.json();
  return { status: res.status, body };
}

describe('GET /api/refresh', () => {
  it('ingests from GitHub and returns fresh dashboard data', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const source = new FakeRunSource([
      workflowRun({ id: 2, conclusion: 'failure', startedAt: '2026-01-01T10:10:00Z', durationSeconds: 90 }),
      workflowRun({ id: 1, conclusion: 'success', startedAt: '2026-01-01T10:00:00Z', durationSeconds: 80 }),
    ]);
    const { status, body } = await refresh(source);

    expect(status).toBe(200);
    expect(source.calls).toBe(1);
    expect(body).toMatchObject({
      success: true,
      data: {
        source: 'store',
        ingest: { fetched: 2, stored: 2, duplicates: 0, skipped: 0 },
        stats: { totalRuns: 2, successfulRuns: 1, avgDuration: 85 },
        runs: [{ id: '2' }, { id: '1' }],
        anomalies: [{ runId: '2', issue: 'Test failure', timestamp: '2026-01-02T00:00:00.000Z' }],
      },
    });
  });

  it('still returns data when GitHub is not configured', async () => {
    const { status, body } = await refresh(null);
    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: { ingest: null, ingestError: 'GitHub is not configured', runs: [] },
    });
  });

  it('reports a GitHub failure without failing the request', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const source = new FakeRunSource([]);
    source.error = new Error('GitHub API responded 502: bad gateway');
    const { status, body } = await refresh(source);

    expect(status).toBe(200);
    expect(body).toMatchObject({
      success: true,
      data: { ingest: null, ingestError: 'GitHub API responded 502: bad gateway' },
    });
  });
});
