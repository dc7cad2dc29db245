import type { AnomalyRecord } from '@shared/types';
import { formatTimestamp, severityBadge } from '@ui/lib/format';

interface Props {
  anomalies: AnomalyRecord[];
}

export function AnomalyList({ anomalies }: Props) {
  if (anomalies.length === 0) {
    return <p className="text-sm text-gray-500">No anomalies detected.</p>;
  }

  return (
    <ul className="space-y-2">
      {anomalies.map((a) => (
        <li key={a.id} className="border border-gray-700 rounded p-3 text-sm">
          <div className="flex items-center justify-between mb-1">
            <span className="font-medium text-gray-200">{a.issue}</span>
            <span className={`text-xs px-2 py-0.5 rounded border ${severityBadge(a.severity)}`}>
              {a.severity}
            </span>
          </div>
          <div className="text-gray-400">Fix: {a.fix}</div>
          <div className="text-xs text-gray-500 mt-1">
            Run #{a.runId} · {formatTimestamp(a.timestamp)}
          </div>
        </li>
      ))}
    </ul>
  );
}
