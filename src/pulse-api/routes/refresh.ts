import { Router } from 'express';
import { computeRunStats } from '@core/stats';
import { errorMessage } from '@shared/errors';
import type { DashboardData, IngestSummary } from '@shared/types';
import { ingestRuns } from '@worker/ingest';
import { asyncHandler } from '../middleware/index';
import { currentTime, type ApiServices } from '../services/index';
import { loadSnapshot } from '../services/pipeline-data';

export interface RefreshData extends DashboardData {
  ingest: IngestSummary | null;
  ingestError?: string;
}

export function createRefreshRouter(services: ApiServices): Router {
  const router = Router();
  const { dashboard, worker } = services.config;

  // GET /refresh -- poll GitHub now, then return fresh dashboard data
  router.get(
    '/refresh',
    asyncHandler(async (_req, res) => {
      let ingest: IngestSummary | null = null;
      let ingestError: string | undefined;

      if (!services.runSource) {
        ingestError = 'GitHub is not configured';
      } else {
        try {
          ingest = await ingestRuns({
            github: services.runSource,
            store: services.store,
            anomalyWindow: worker.anomalyWindow,
            now: () => currentTime(services),
          });
        } catch (err) {
          ingestError = errorMessage(err);
          console.error('[GITHUB] Refresh failed:', ingestError);
        }
      }

      const snapshot = await loadSnapshot(
        services.store,
        { runs: dashboard.maxRuns, anomalies: dashboard.maxAnomalies },
        currentTime(services),
      );
      const data: RefreshData = {
        ...snapshot,
        stats: computeRunStats(snapshot.runs),
        refreshIntervalSeconds: dashboard.refreshIntervalSeconds,
        ingest,
        ingestError,
      };
      res.json({ success: true, data });
    }),
  );

  return router;
}
