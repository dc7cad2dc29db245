import type { HealthReport } from '@shared/types';
import { healthColor, severityBadge, trendArrow } from '@ui/lib/format';

interface Props {
  report: HealthReport;
}

export function HealthPanel({ report }: Props) {
  const analysis = report.performanceAnalysis;
  const prediction = analysis?.prediction;

  return (
    <div className="bg-gray-900 border border-gray-700 rounded-lg p-4">
      <div className="flex items-center justify-between mb-3">
        <h3 className="text-sm font-medium text-gray-300">Pipeline Health</h3>
        <span className={`text-xs px-2 py-0.5 rounded border ${severityBadge(report.alertLevel)}`}>
          alert: {report.alertLevel}
        </span>
      </div>
      <div className={`text-2xl font-bold capitalize ${healthColor(report.overallHealth)}`}>
        {report.overallHealth}
      </div>
      {analysis && (
        <div className="grid grid-cols-2 gap-2 text-sm mt-3">
          <div>
            <span className="text-gray-500">Duration trend:</span>{' '}
            <span className="text-gray-300">
              {trendArrow(analysis.durationTrend)} {analysis.durationTrend}
            </span>
          </div>
          <div>
            <span className="text-gray-500">Success trend:</span>{' '}
            <span className="text-gray-300">
              {trendArrow(analysis.successRateTrend)} {analysis.successRateTrend}
            </span>
          </div>
        </div>
      )}
      {prediction && (
        <div className="text-sm mt-3 text-gray-400">
          {prediction.available
            ? `Next run: ~${prediction.predictedDuration}s, ${prediction.successProbability}% likely to pass (${prediction.confidence} confidence)`
            : prediction.reason}
        </div>
      )}
    </div>
  );
}
