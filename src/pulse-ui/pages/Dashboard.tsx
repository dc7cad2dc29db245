import { useCallback, useEffect, useState } from 'react';
import { api } from '@ui/lib/api';
import type { DashboardData, HealthReport, Insights, StatsData } from '@shared/types';
import { StatCards } from '@ui/components/StatCards';
import { RunsTable } from '@ui/components/RunsTable';
import { AnomalyList } from '@ui/components/AnomalyList';
import { HealthPanel } from '@ui/components/HealthPanel';
import { InsightsPanel } from '@ui/components/InsightsPanel';

const DEFAULT_REFRESH_SECONDS = 30;

export function Dashboard() {
  const [dashboard, setDashboard] = useState<DashboardData | null>(null);
  const [stats, setStats] = useState<StatsData | null>(null);
  const [health, setHealth] = useState<HealthReport | null>(null);
  const [insights, setInsights] = useState<Insights | null>(null);
  const [notice, setNotice] = useState<string | null>(null);
  const [refreshing, setRefreshing] = useState(false);

  const load = useCallback(async () => {
    const [d, s, h, i] = await Promise.all([
      api.getDashboard(),
      api.getStats(),
      api.getHealthCheck(),
      api.getInsights(),
    ]);
    if (d.success && d.data) setDashboard(d.data);
    if (s.success && s.data) setStats(s.data);
    if (h.success && h.data) setHealth(h.data);
    if (i.success && i.data) setInsights(i.data);
  }, []);

  useEffect(() => {
    load().catch((err: unknown) => setNotice(String(err)));
  }, [load]);

  const intervalSeconds = dashboard?.refreshIntervalSeconds ?? DEFAULT_REFRESH_SECONDS;
  useEffect(() => {
    const id = setInterval(() => {
      load().catch((err: unknown) => setNotice(String(err)));
    }, intervalSeconds * 1000);
    return () => clearInterval(id);
  }, [load, intervalSeconds]);

  const refresh = async () => {
    setRefreshing(true);
    try {
      const res = await api.refresh();
      if (res.success && res.data) {
        setDashboard(res.data);
        setNotice(res.data.ingestError ? `Refresh: ${res.data.ingestError}` : null);
      }
      await load();
    } catch (err) {
      setNotice(String(err));
    } finally {
      setRefreshing(false);
    }
  };

  const sendTest = async () => {
    try {
      const res = await api.sendTestNotification();
      if (res.success && res.data) setNotice(res.data.message);
    } catch (err) {
      setNotice(String(err));
    }
  };

  return (
    <div className="min-h-screen bg-gray-950 text-gray-100 p-6">
      <header className="flex items-center justify-between mb-6">
        <div>
          <h1 className="text-xl font-semibold">Pipeline Pulse</h1>
          <p className="text-xs text-gray-500">
            GitHub Actions monitoring · auto-refresh every {intervalSeconds}s
          </p>
        </div>
        <div className="flex gap-2">
          <button
            onClick={() => void sendTest()}
            className="px-3 py-1.5 text-sm rounded border border-gray-600 hover:bg-gray-800"
          >
            Test alert
          </button>
          <button
            onClick={() => void refresh()}
            disabled={refreshing}
            className="px-3 py-1.5 text-sm rounded bg-blue-600 hover:bg-blue-500 disabled:opacity-50"
          >
            {refreshing ? 'Refreshing…' : 'Refresh'}
          </button>
        </div>
      </header>

      {dashboard?.source === 'sample' && (
        <div className="mb-4 p-3 rounded border border-yellow-700 bg-yellow-900/30 text-sm text-yellow-200">
          Showing sample data: {dashboard.error ?? 'store unavailable'}
        </div>
      )}
      {notice && (
        <div className="mb-4 p-3 rounded border border-gray-700 bg-gray-900 text-sm text-gray-300">
          {notice}
        </div>
      )}

      {dashboard && (
        <StatCards
          stats={dashboard.stats}
          performanceScore={stats?.performanceScore ?? null}
          healthScore={stats?.healthScore ?? null}
        />
      )}

      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
        <div className="lg:col-span-2 bg-gray-900 border border-gray-700 rounded-lg p-4">
          <h3 className="text-sm font-medium text-gray-300 mb-3">Recent Runs</h3>
          <RunsTable runs={dashboard?.runs ?? []} />
        </div>
        <div className="space-y-6">
          {health && <HealthPanel report={health} />}
          <div className="bg-gray-900 border border-gray-700 rounded-lg p-4">
            <h3 className="text-sm font-medium text-gray-300 mb-3">Anomalies</h3>
            <AnomalyList anomalies={dashboard?.anomalies ?? []} />
          </div>
          {insights && <InsightsPanel insights={insights} />}
        </div>
      </div>
    </div>
  );
}
