import { Router } from 'express';
import { computeRunStats } from '@core/stats';
import type { DashboardData } from '@shared/types';
import { asyncHandler } from '../middleware/index';
import { currentTime, type ApiServices } from '../services/index';
import { loadSnapshot } from '../services/pipeline-data';
import { parseLimit } from './query';

export function createDashboardRouter(services: ApiServices): Router {
  const router = Router();
  const { dashboard } = services.config;

  // GET /dashboard -- everything the dashboard page renders
  router.get(
    '/dashboard',
    asyncHandler(async (_req, res) => {
      const snapshot = await loadSnapshot(
        services.store,
        { runs: dashboard.maxRuns, anomalies: dashboard.maxAnomalies },
        currentTime(services),
      );
      const data: DashboardData = {
        ...snapshot,
        stats: computeRunStats(snapshot.runs),
        refreshIntervalSeconds: dashboard.refreshIntervalSeconds,
      };
      res.json({ success: true, data });
    }),
  );

  // GET /runs?limit=
  router.get(
    '/runs',
    asyncHandler(async (req, res) => {
      const parsed = parseLimit(req.query, dashboard.maxRuns);
      if (!parsed.ok) {
        return res.status(400).json({ success: false, error: parsed.error });
      }
      const { runs, source, error } = await loadSnapshot(
        services.store,
        { runs: parsed.limit, anomalies: dashboard.maxAnomalies },
        currentTime(services),
      );
      res.json({ success: true, data: { runs, source, error } });
    }),
  );

  // GET /anomalies?limit=
  router.get(
    '/anomalies',
    asyncHandler(async (req, res) => {
      const parsed = parseLimit(req.query, dashboard.maxAnomalies);
      if (!parsed.ok) {
        return res.status(400).json({ success: false, error: parsed.error });
      }
      const { anomalies, source, error } = await loadSnapshot(
        services.store,
        { runs: dashboard.maxRuns, anomalies: parsed.limit },
        currentTime(services),
      );
      res.json({ success: true, data: { anomalies, source, error } });
    }),
  );

  return router;
}
