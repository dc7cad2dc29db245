import { Router } from 'express';
import { asyncHandler } from '../middleware/index';
import type { ApiServices } from '../services/index';

function testAlertMessage(sent: boolean, configured: boolean): string {
  if (sent) return 'Test notification sent successfully';
  if (!configured) return 'Test notification not sent; configure SMTP settings in .env';
  return 'Test notification failed on every configured channel';
}

export function createNotificationsRouter(services: ApiServices): Router {
  const router = Router();

  // GET /notifications/test -- send a sample failure alert
  router.get(
    '/test',
    asyncHandler(async (_req, res) => {
      const { notifications } = services;
      const results = await notifications.sendTestAlert();
      const sent = results.some((r) => r.success);
      res.json({
        success: true,
        data: { sent, results, message: testAlertMessage(sent, notifications.hasConfiguredChannel) },
      });
    }),
  );

  return router;
}
