import { API_PREFIX } from '@shared/constants';
import type {
  ApiResponse,
  DashboardData,
  HealthReport,
  Insights,
  StatsData,
} from '@shared/types';

const BASE = API_PREFIX;

async function request<T>(path: string, options?: RequestInit): Promise<ApiResponse<T>> {
  const res = await fetch(`${BASE}${path}`, {
    headers: { 'Content-Type': 'application/json' },
    ...options,
  });
  return res.json();
}

export const api = {
  getDashboard: () => request<DashboardData>('/dashboard'),
  getStats: () => request<StatsData>('/stats'),
  getHealthCheck: () => request<HealthReport>('/health-check'),
  getInsights: () => request<Insights>('/insights'),
  refresh: () => request<DashboardData & { ingestError?: string }>('/refresh'),
  sendTestNotification: () =>
    request<{ sent: boolean; message: string }>('/notifications/test'),
};
