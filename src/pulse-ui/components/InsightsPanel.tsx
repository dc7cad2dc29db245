import type { Insights } from '@shared/types';

interface Props {
  insights: Insights;
}

export function InsightsPanel({ insights }: Props) {
  return (
    <div className="bg-gray-900 border border-gray-700 rounded-lg p-4 space-y-4">
      <h3 className="text-sm font-medium text-gray-300">Insights</h3>

      {insights.patterns.length > 0 && (
        <section>
          <h4 className="text-xs uppercase text-gray-500 mb-1">Patterns</h4>
          <ul className="list-disc list-inside text-sm text-gray-300">
            {insights.patterns.map((p) => (
              <li key={p}>{p}</li>
            ))}
          </ul>
        </section>
      )}

      {insights.optimizations.length > 0 && (
        <section>
          <h4 className="text-xs uppercase text-gray-500 mb-1">Optimizations</h4>
          <ul className="space-y-1 text-sm">
            {insights.optimizations.map((o) => (
              <li key={o.title}>
                <span className="text-gray-200 font-medium">{o.title}</span>{' '}
                <span className="text-xs text-gray-500">({o.impact} impact)</span>
                <div className="text-gray-400">{o.description}</div>
              </li>
            ))}
          </ul>
        </section>
      )}

      <section>
        <h4 className="text-xs uppercase text-gray-500 mb-1">Recommendations</h4>
        <ul className="text-sm text-gray-300 space-y-1">
          {insights.recommendations.map((r) => (
            <li key={r}>{r}</li>
          ))}
        </ul>
      </section>
    </div>
  );
}
