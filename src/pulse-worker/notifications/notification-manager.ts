import { errorMessage } from '@shared/errors';
import type { AnomalyRecord, RunRecord, RunStats } from '@shared/types';
import type { BaseNotifier } from './notifiers/base-notifier';
import { formatFailureAlert, formatPerformanceSummary } from './templates';
import type { NotificationMessage, NotificationResult } from './types';

export class NotificationManager {
  constructor(
    private readonly notifiers: BaseNotifier[],
    private readonly dashboardUrl: string,
  ) {}

  get hasConfiguredChannel(): boolean {
    return this.notifiers.some((n) => n.isConfigured());
  }

  sendFailureAlert(run: RunRecord, anomaly: AnomalyRecord | null): Promise<NotificationResult[]> {
    return this.dispatch(formatFailureAlert(run, anomaly, this.dashboardUrl));
  }

  sendPerformanceSummary(
    stats: RunStats,
    recommendations: readonly string[],
  ): Promise<NotificationResult[]> {
    return this.dispatch(formatPerformanceSummary(stats, recommendations, this.dashboardUrl));
  }

  sendTestAlert(): Promise<NotificationResult[]> {
    const message = formatFailureAlert(
      { id: 'test-123', status: 'failure', duration: 85 },
      { issue: 'Test notification', fix: 'This is a test', severity: 'low' },
      this.dashboardUrl,
    );
    return this.dispatch(message);
  }

  /**
   * Send to every configured channel in parallel. A channel that throws is
   * reported as a failed result.
   */
  private async dispatch(message: NotificationMessage): Promise<NotificationResult[]> {
    const configured = this.notifiers.filter((n) => n.isConfigured());
    if (configured.length === 0) {
      console.warn('[NOTIFY] No notification channel configured. Skipping notification.');
      return [];
    }

    return Promise.all(
      configured.map((notifier) =>
        notifier.send(message).catch((err: unknown): NotificationResult => {
          console.error(`[NOTIFY] ${notifier.channel} failed:`, errorMessage(err));
          return { success: false, channel: notifier.channel, error: errorMessage(err) };
        }),
      ),
    );
  }
}
