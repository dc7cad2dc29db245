import { Router } from 'express';
import type { ApiServices } from '../services/index';
import { notFoundHandler } from '../middleware/index';
import healthRouter from './health';
import { createAnalyticsRouter } from './analytics';
import { createDashboardRouter } from './dashboard';
import { createNotificationsRouter } from './notifications';
import { createRefreshRouter } from './refresh';

export function createApiRouter(services: ApiServices): Router {
  const router = Router();
  router.use(healthRouter);
  router.use(createDashboardRouter(services));
  router.use(createAnalyticsRouter(services));
  router.use(createRefreshRouter(services));
  router.use('/notifications', createNotificationsRouter(services));
  router.use(notFoundHandler);
  return router;
}
