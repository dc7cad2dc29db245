import type { RunStats } from '@shared/types';
import { formatDuration, formatPercent } from '@ui/lib/format';

interface Props {
  stats: RunStats;
  performanceScore: number | null;
  healthScore: number | null;
}

export function StatCards({ stats, performanceScore, healthScore }: Props) {
  const cards = [
    { label: 'Total Runs', value: String(stats.totalRuns), tone: 'text-white' },
    {
      label: 'Success Rate',
      value: formatPercent(stats.successRate),
      tone: stats.successRate >= 90 ? 'text-green-400' : stats.successRate >= 70 ? 'text-yellow-400' : 'text-red-400',
    },
    { label: 'Avg Duration', value: formatDuration(stats.avgDuration), tone: 'text-blue-400' },
    { label: 'Failures', value: String(stats.totalFailures), tone: 'text-red-400' },
    { label: 'Performance', value: performanceScore === null ? '—' : `${performanceScore}/100`, tone: 'text-purple-400' },
    { label: 'Health Score', value: healthScore === null ? '—' : `${healthScore}/100`, tone: 'text-teal-400' },
  ];

  return (
    <div className="grid grid-cols-2 md:grid-cols-3 lg:grid-cols-6 gap-4 mb-6">
      {cards.map((card) => (
        <div key={card.label} className="bg-gray-900 border border-gray-700 rounded-lg p-4">
          <div className={`text-2xl font-bold ${card.tone}`}>{card.value}</div>
          <div className="text-xs text-gray-500">{card.label}</div>
        </div>
      ))}
    </div>
  );
}
