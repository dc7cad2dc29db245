import type { AlertLevel, HealthState, Severity, Trend } from '@shared/types';

export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${Math.round(seconds)}s`;
  const minutes = Math.floor(seconds / 60);
  const secs = Math.round(seconds % 60);
  return secs === 0 ? `${minutes}m` : `${minutes}m ${secs}s`;
}

export function formatPercent(value: number, digits = 1): string {
  return `${value.toFixed(digits)}%`;
}

export function formatTimestamp(iso: string | null): string {
  if (!iso) return '—';
  const d = new Date(iso);
  return Number.isNaN(d.getTime()) ? iso : d.toLocaleString();
}

export function healthColor(health: HealthState): string {
  switch (health) {
    case 'healthy':
      return 'text-green-400';
    case 'warning':
      return 'text-yellow-400';
    case 'critical':
      return 'text-red-400';
    default:
      return 'text-gray-400';
  }
}

export function severityBadge(severity: Severity | AlertLevel): string {
  switch (severity) {
    case 'critical':
    case 'high':
      return 'bg-red-900/50 text-red-300 border-red-700';
    case 'medium':
      return 'bg-yellow-900/50 text-yellow-300 border-yellow-700';
    default:
      return 'bg-gray-800 text-gray-300 border-gray-600';
  }
}

export function trendArrow(trend: Trend): string {
  if (trend === 'improving') return '↑';
  if (trend === 'degrading') return '↓';
  return '→';
}
