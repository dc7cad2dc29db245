import { generateRecommendations } from '@core/analyzer';
import { checkPipelineHealth } from '@core/health';
import { computeRunStats } from '@core/stats';
import type { PipelineStore } from '@db/store';
import { errorMessage } from '@shared/errors';
import type { HealthReport, IngestSummary, Thresholds } from '@shared/types';
import type { WorkflowRunSource } from './github-client';
import { ingestRuns } from './ingest';
import type { NotificationManager } from './notifications/notification-manager';

const HOUR_MS = 60 * 60 * 1000;

export interface PollerDeps {
  github: WorkflowRunSource;
  store: PipelineStore;
  notifications: NotificationManager;
  thresholds: Thresholds;
  anomalyWindow: number;
  historyLimit: number;
  summaryIntervalHours: number;
  now?: () => Date;
}

export interface PollOutcome {
  ingest: IngestSummary;
  health: HealthReport;
  alerted: boolean;
  summarySent: boolean;
}

/**
 * Periodic ingestion. Each pass stores new runs, re-evaluates pipeline
 * health and emails a failure alert when the alert level is high. An alert
 * goes out once per newest run, not on every pass.
 */
export class Poller {
  private timer: NodeJS.Timeout | null = null;
  private inFlight = false;
  private lastAlertedRunId: string | null = null;
  private lastSummaryAt: number;
  private readonly now: () => Date;

  constructor(private readonly deps: PollerDeps) {
    this.now = deps.now ?? (() => new Date());
    this.lastSummaryAt = this.now().getTime();
  }

  async runOnce(): Promise<PollOutcome> {
    const { store, notifications, thresholds, historyLimit } = this.deps;

    const ingest = await ingestRuns({
      github: this.deps.github,
      store,
      anomalyWindow: this.deps.anomalyWindow,
      now: this.now,
    });

    const [runs, anomalies] = await Promise.all([
      store.listRecentRuns(historyLimit),
      store.listRecentAnomalies(historyLimit),
    ]);
    const health = checkPipelineHealth(runs, anomalies, thresholds, this.now());

    let alerted = false;
    const latestRun = runs[0];
    if (health.alertLevel === 'high' && latestRun && latestRun.id !== this.lastAlertedRunId) {
      const results = await notifications.sendFailureAlert(latestRun, anomalies[0] ?? null);
      alerted = results.some((r) => r.success);
      this.lastAlertedRunId = latestRun.id;
      console.warn(`[POLL] Alert generated: high priority - ${health.overallHealth} health`);
    }

    let summarySent = false;
    const nowMs = this.now().getTime();
    if (nowMs - this.lastSummaryAt >= this.deps.summaryIntervalHours * HOUR_MS) {
      const recommendations =
        health.performanceAnalysis?.recommendations ?? generateRecommendations(runs, thresholds);
      const results = await notifications.sendPerformanceSummary(
        computeRunStats(runs),
        recommendations,
      );
      summarySent = results.some((r) => r.success);
      this.lastSummaryAt = nowMs;
    }

    return { ingest, health, alerted, summarySent };
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    void this.tick();
    this.timer = setInterval(() => void this.tick(), intervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      console.warn('[POLL] Previous pass still running, skipping tick');
      return;
    }
    this.inFlight = true;
    try {
      await this.runOnce();
    } catch (err) {
      console.error('[POLL] Pass failed:', errorMessage(err));
    } finally {
      this.inFlight = false;
    }
  }
}
