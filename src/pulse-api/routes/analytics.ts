import { Router } from 'express';
import { analyzePerformanceTrends } from '@core/analyzer';
import { checkPipelineHealth } from '@core/health';
import { generateInsights } from '@core/insights';
import { healthScore, performanceScore } from '@core/scoring';
import { computeRunStats } from '@core/stats';
import { chronological, rollingSuccessRates } from '@core/trends';
import type { StatsData } from '@shared/types';
import { asyncHandler } from '../middleware/index';
import { currentTime, type ApiServices } from '../services/index';
import { loadSnapshot } from '../services/pipeline-data';

export function createAnalyticsRouter(services: ApiServices): Router {
  const router = Router();
  const { dashboard, thresholds } = services.config;

  const snapshot = () =>
    loadSnapshot(
      services.store,
      { runs: dashboard.maxRuns, anomalies: dashboard.maxAnomalies },
      currentTime(services),
    );

  // GET /stats -- headline numbers and scores
  router.get(
    '/stats',
    asyncHandler(async (_req, res) => {
      const { runs, source, error } = await snapshot();
      const data: StatsData = {
        stats: computeRunStats(runs),
        performanceScore: performanceScore(runs),
        healthScore: healthScore(runs),
        rollingSuccessRates: rollingSuccessRates(chronological(runs)),
        source,
        error,
      };
      res.json({ success: true, data });
    }),
  );

  // GET /analysis -- trends, recommendations, prediction
  router.get(
    '/analysis',
    asyncHandler(async (_req, res) => {
      const { runs, source, error } = await snapshot();
      const analysis = analyzePerformanceTrends(runs, thresholds);
      res.json({ success: true, data: { analysis, source, error } });
    }),
  );

  // GET /health-check -- overall health and alert level
  router.get(
    '/health-check',
    asyncHandler(async (_req, res) => {
      const { runs, anomalies, source, error } = await snapshot();
      const report = checkPipelineHealth(runs, anomalies, thresholds, currentTime(services));
      res.json({ success: true, data: { ...report, source, error } });
    }),
  );

  // GET /insights
  router.get(
    '/insights',
    asyncHandler(async (_req, res) => {
      const { runs, source, error } = await snapshot();
      res.json({ success: true, data: { ...generateInsights(runs, thresholds), source, error } });
    }),
  );

  return router;
}
