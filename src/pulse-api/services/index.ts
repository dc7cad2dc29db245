import type { PipelineStore } from '@db/store';
import type { WorkflowRunSource } from '@worker/github-client';
import type { NotificationManager } from '@worker/notifications/notification-manager';
import type { AppConfig } from '../config';

export interface ApiServices {
  config: AppConfig;
  store: PipelineStore;
  notifications: NotificationManager;
  /** `null` when GitHub credentials are not configured. */
  runSource: WorkflowRunSource | null;
  now?: () => Date;
}

export function currentTime(services: ApiServices): Date {
  return services.now ? services.now() : new Date();
}
