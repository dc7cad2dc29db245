import nodemailer from 'nodemailer';
import type { Transporter } from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport';
import type { NotificationMessage, NotificationResult } from '../types';
import { BaseNotifier } from './base-notifier';

export interface EmailSettings {
  host: string;
  port: number;
  username: string;
  password: string;
  from: string;
  to: string;
}

export type TransportFactory = (settings: EmailSettings) => Pick<Transporter, 'sendMail'>;

const IMPLICIT_TLS_PORT = 465;

export function smtpOptions(settings: EmailSettings): SMTPTransport.Options {
  // 465 is implicit TLS; anything else upgrades with STARTTLS
  const implicitTls = settings.port === IMPLICIT_TLS_PORT;
  return {
    host: settings.host,
    port: settings.port,
    secure: implicitTls,
    requireTLS: !implicitTls,
    auth: { user: settings.username, pass: settings.password },
  };
}

export const smtpTransport: TransportFactory = (settings) =>
  nodemailer.createTransport(smtpOptions(settings));

export class EmailNotifier extends BaseNotifier {
  readonly channel = 'email';
  private transport: Pick<Transporter, 'sendMail'> | null = null;

  constructor(
    private readonly settings: EmailSettings,
    private readonly createTransport: TransportFactory = smtpTransport,
  ) {
    super();
  }

  isConfigured(): boolean {
    return Boolean(this.settings.username);
  }

  async send(message: NotificationMessage): Promise<NotificationResult> {
    if (!this.isConfigured()) {
      return { success: false, channel: this.channel, error: 'Email configuration not found' };
    }

    this.transport ??= this.createTransport(this.settings);
    await this.transport.sendMail({
      from: this.settings.from,
      to: this.settings.to,
      subject: message.subject,
      text: message.body,
    });

    console.warn(`[NOTIFY] Email notification sent: ${message.subject}`);
    return { success: true, channel: this.channel };
  }
}
