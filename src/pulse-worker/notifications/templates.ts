import type { AnomalyRecord, RunRecord, RunStats } from '@shared/types';
import type { NotificationMessage } from './types';

type AlertRun = Pick<RunRecord, 'id' | 'status' | 'duration'> & Partial<RunRecord>;
type AlertAnomaly = Partial<Pick<AnomalyRecord, 'issue' | 'fix' | 'severity'>>;

export function formatFailureAlert(
  run: AlertRun,
  anomaly: AlertAnomaly | null,
  dashboardUrl: string,
): NotificationMessage {
  const lines = [
    'Pipeline Failure Detected!',
    '',
    'Run Details:',
    `- Run ID: ${run.id}`,
    `- Status: ${run.status}`,
    `- Duration: ${run.duration} seconds`,
    `- Branch: ${run.branch ?? 'Unknown'}`,
    `- Timestamp: ${run.timestamp ?? 'Unknown'}`,
    '',
    'Anomaly Details:',
    `- Issue: ${anomaly?.issue ?? 'Unknown'}`,
    `- Suggested Fix: ${anomaly?.fix ?? 'No suggestion available'}`,
    `- Severity: ${anomaly?.severity ?? 'Unknown'}`,
    '',
    'Please investigate and resolve the issue promptly.',
    '',
    `View Dashboard: ${dashboardUrl}`,
  ];

  return {
    subject: `🚨 Pipeline Failure Alert - Run #${run.id}`,
    body: lines.join('\n'),
  };
}

export function formatPerformanceSummary(
  stats: RunStats,
  recommendations: readonly string[],
  dashboardUrl: string,
): NotificationMessage {
  const lines = [
    'Daily Pipeline Performance Summary',
    '',
    'Statistics:',
    `- Total Runs: ${stats.totalRuns}`,
    `- Success Rate: ${stats.successRate}%`,
    `- Average Duration: ${stats.avgDuration} seconds`,
    `- Total Failures: ${stats.totalFailures}`,
    '',
    'Recommendations:',
    ...recommendations.map((rec) => `- ${rec}`),
    '',
    `View Dashboard: ${dashboardUrl}`,
  ];

  return {
    subject: '📊 Daily Pipeline Performance Summary',
    body: lines.join('\n'),
  };
}
