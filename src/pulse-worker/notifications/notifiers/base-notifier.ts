import type { NotificationMessage, NotificationResult } from '../types';

export abstract class BaseNotifier {
  abstract readonly channel: string;

  /**
   * Deliver a message on this channel
   */
  abstract send(message: NotificationMessage): Promise<NotificationResult>;

  /**
   * Whether the channel has the settings it needs to send
   */
  abstract isConfigured(): boolean;
}
