import { createHmac } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { type AxiosInstance } from 'axios';
import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';
import type { NotificationChannel } from '../notification-channel';

export const SIGNATURE_HEADER = 'X-Signature';

export const signPayload = (body: string, secret: string): string =>
  `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;

export const buildDecisionPayload = ({ decision, ticker }: DecisionNotification) => ({
  type: 'decision' as const,
  decision,
  ticker: ticker ?? null,
});

export const buildMarketAlertPayload = ({ pair, alert, ticker }: MarketAlertNotification) => ({
  type: 'market_alert' as const,
  pair,
  alert,
  ticker: ticker ?? null,
});

@Injectable()
export class WebhookChannel implements NotificationChannel {
  readonly name = 'webhook';
  private readonly enabled: boolean;
  private readonly url: string;
  private readonly secret: string;
  private readonly http: AxiosInstance;

  constructor(configService: ConfigService) {
    this.url = configService.get<string>('WEBHOOK_URL', '');
    this.secret = configService.get<string>('WEBHOOK_SECRET', '');
    this.enabled = configService.get<boolean>('WEBHOOK_ENABLED', false) && this.url.length > 0;
    this.http = axios.create({
      timeout: configService.get<number>('WEBHOOK_TIMEOUT_MS', 10000),
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async send(notification: DecisionNotification): Promise<void> {
    await this.post(buildDecisionPayload(notification));
  }

  async sendAlert(notification: MarketAlertNotification): Promise<void> {
    await this.post(buildMarketAlertPayload(notification));
  }

  async sendTest(pair: string): Promise<void> {
    await this.post({ type: 'test', pair, timestamp: Date.now() });
  }

  private async post(payload: object): Promise<void> {
    const body = JSON.stringify(payload);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.secret) {
      headers[SIGNATURE_HEADER] = signPayload(body, this.secret);
    }
    await this.http.post(this.url, body, { headers });
  }
}
