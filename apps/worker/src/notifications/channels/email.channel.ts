import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createTransport, type Transporter } from 'nodemailer';
import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';
import {
  formatDecisionEmail,
  formatMarketAlertEmail,
  formatTestEmail,
  type EmailContent,
} from '../formatting/decision-email.formatter';
import type { NotificationChannel } from '../notification-channel';

@Injectable()
export class EmailChannel implements NotificationChannel {
  readonly name = 'email';
  private readonly logger = new Logger(EmailChannel.name);
  private readonly transporter: Transporter | null;
  private readonly from: string;
  private readonly to: string;

  constructor(configService: ConfigService) {
    const enabled = configService.get<boolean>('EMAIL_ENABLED', false);
    const host = configService.get<string>('SMTP_HOST');
    const user = configService.get<string>('SMTP_USER', '');
    const pass = configService.get<string>('SMTP_PASS', '');

    this.to = configService.get<string>('SMTP_TO', '');
    this.from = configService.get<string>('SMTP_FROM') || user;
    this.transporter =
      enabled && host && this.to
        ? createTransport({
            host,
            port: configService.get<number>('SMTP_PORT', 587),
            secure: configService.get<boolean>('SMTP_SECURE', false),
            auth: user ? { user, pass } : undefined,
          })
        : null;
  }

  isEnabled(): boolean {
    return this.transporter !== null;
  }

  async send(notification: DecisionNotification): Promise<void> {
    await this.deliver(formatDecisionEmail(notification));
  }

  async sendAlert(notification: MarketAlertNotification): Promise<void> {
    await this.deliver(formatMarketAlertEmail(notification));
  }

  async sendTest(pair: string): Promise<void> {
    await this.deliver(formatTestEmail(pair));
  }

  private async deliver(content: EmailContent): Promise<void> {
    if (!this.transporter) {
      throw new Error('SMTP transport is not configured');
    }
    await this.transporter.sendMail({
      from: this.from,
      to: this.to,
      subject: content.subject,
      text: content.text,
      html: content.html,
    });
    this.logger.debug(`Email sent to ${this.to}: ${content.subject}`);
  }
}
