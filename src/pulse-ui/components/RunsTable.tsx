import type { RunRecord } from '@shared/types';
import { formatDuration, formatTimestamp } from '@ui/lib/format';

interface Props {
  runs: RunRecord[];
}

export function RunsTable({ runs }: Props) {
  if (runs.length === 0) {
    return <p className="text-sm text-gray-500">No runs recorded yet.</p>;
  }

  return (
    <table className="w-full text-sm">
      <thead>
        <tr className="text-left text-gray-500 border-b border-gray-700">
          <th className="py-2 pr-3">Run</th>
          <th className="py-2 pr-3">Status</th>
          <th className="py-2 pr-3">Duration</th>
          <th className="py-2 pr-3">Branch</th>
          <th className="py-2 pr-3">Author</th>
          <th className="py-2">Started</th>
        </tr>
      </thead>
      <tbody>
        {runs.map((run) => (
          <tr key={run.id} className="border-b border-gray-800">
            <td className="py-2 pr-3 font-mono text-gray-300">
              {run.url ? (
                <a href={run.url} target="_blank" rel="noreferrer" className="hover:underline">
                  #{run.id}
                </a>
              ) : (
                `#${run.id}`
              )}
            </td>
            <td className="py-2 pr-3">
              <span className={run.status === 'success' ? 'text-green-400' : 'text-red-400'}>
                {run.status}
              </span>
            </td>
            <td className="py-2 pr-3 text-gray-300">{formatDuration(run.duration)}</td>
            <td className="py-2 pr-3 text-gray-400">{run.branch ?? '—'}</td>
            <td className="py-2 pr-3 text-gray-400">{run.author ?? '—'}</td>
            <td className="py-2 text-gray-500">{formatTimestamp(run.timestamp)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
