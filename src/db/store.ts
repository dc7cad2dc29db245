import { desc } from 'drizzle-orm';
import type { AnomalyRecord, NewAnomaly, RunRecord } from '@shared/types';
import type { Database } from './connection';
import { anomalies } from './schema/anomalies';
import { runs } from './schema/runs';

/** Persistence for run and anomaly records. Newest first on every list. */
export interface PipelineStore {
  listRecentRuns(limit: number): Promise<RunRecord[]>;
  listRecentAnomalies(limit: number): Promise<AnomalyRecord[]>;
  recentDurations(limit: number): Promise<number[]>;
  /** Resolves `false` when a run with the same id is already stored. */
  saveRun(run: RunRecord): Promise<boolean>;
  saveAnomaly(anomaly: NewAnomaly): Promise<AnomalyRecord>;
}

type RunRow = typeof runs.$inferSelect;
type AnomalyRow = typeof anomalies.$inferSelect;

export function rowToRun(row: RunRow): RunRecord {
  return {
    id: row.id,
    status: row.status,
    duration: row.duration,
    timestamp: row.startedAt.toISOString(),
    branch: row.branch,
    commit: row.commitSha,
    author: row.author,
    workflow: row.workflow,
    url: row.url,
  };
}

export function rowToAnomaly(row: AnomalyRow): AnomalyRecord {
  return {
    id: row.id,
    runId: row.runId,
    issue: row.issue,
    fix: row.fix,
    severity: row.severity,
    timestamp: row.detectedAt.toISOString(),
  };
}

export class DrizzleStore implements PipelineStore {
  constructor(private readonly db: Database) {}

  async listRecentRuns(limit: number): Promise<RunRecord[]> {
    const rows = await this.db
      .select()
      .from(runs)
      .orderBy(desc(runs.startedAt))
      .limit(limit);
    return rows.map(rowToRun);
  }

  async listRecentAnomalies(limit: number): Promise<AnomalyRecord[]> {
    const rows = await this.db
      .select()
      .from(anomalies)
      .orderBy(desc(anomalies.detectedAt), desc(anomalies.seq))
      .limit(limit);
    return rows.map(rowToAnomaly);
  }

  async recentDurations(limit: number): Promise<number[]> {
    const rows = await this.db
      .select({ duration: runs.duration })
      .from(runs)
      .orderBy(desc(runs.startedAt))
      .limit(limit);
    return rows.map((r) => r.duration);
  }

  async saveRun(run: RunRecord): Promise<boolean> {
    const inserted = await this.db
      .insert(runs)
      .values({
        id: run.id,
        status: run.status,
        duration: run.duration,
        startedAt: new Date(run.timestamp),
        branch: run.branch,
        commitSha: run.commit,
        author: run.author,
        workflow: run.workflow,
        url: run.url,
      })
      .onConflictDoNothing({ target: runs.id })
      .returning({ id: runs.id });
    return inserted.length > 0;
  }

  async saveAnomaly(anomaly: NewAnomaly): Promise<AnomalyRecord> {
    const [row] = await this.db
      .insert(anomalies)
      .values({
        runId: anomaly.runId,
        issue: anomaly.issue,
        fix: anomaly.fix,
        severity: anomaly.severity,
        detectedAt: new Date(anomaly.timestamp),
      })
      .returning();
    return rowToAnomaly(row);
  }
}
