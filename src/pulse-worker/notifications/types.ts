export interface NotificationMessage {
  subject: string;
  body: string;
}

export interface NotificationResult {
  success: boolean;
  channel: string;
  error?: string;
}
