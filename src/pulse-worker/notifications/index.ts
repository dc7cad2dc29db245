import type { AppConfig } from '@api/config';
import { NotificationManager } from './notification-manager';
import { EmailNotifier } from './notifiers/email-notifier';

export { NotificationManager } from './notification-manager';
export { BaseNotifier } from './notifiers/base-notifier';
export { EmailNotifier } from './notifiers/email-notifier';
export type { NotificationMessage, NotificationResult } from './types';

export function createNotificationManager(cfg: AppConfig): NotificationManager {
  return new NotificationManager([new EmailNotifier(cfg.email)], cfg.dashboard.url);
}
