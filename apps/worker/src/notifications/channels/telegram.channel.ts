import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';
import { formatTestMessage, TelegramService } from '@libs/telegram';
import type { NotificationChannel } from '../notification-channel';

@Injectable()
export class TelegramChannel implements NotificationChannel {
  readonly name = 'telegram';
  private readonly enabled: boolean;

  constructor(
    configService: ConfigService,
    private readonly telegramService: TelegramService,
  ) {
    this.enabled = configService.get<boolean>('TELEGRAM_ENABLED', false);
  }

  isEnabled(): boolean {
    return this.enabled && this.telegramService.isConfigured();
  }

  async send(notification: DecisionNotification): Promise<void> {
    await this.telegramService.sendDecision(notification);
  }

  async sendAlert(notification: MarketAlertNotification): Promise<void> {
    await this.telegramService.sendMarketAlert(notification);
  }

  async sendTest(pair: string): Promise<void> {
    await this.telegramService.sendMessageToDestinations(formatTestMessage(pair));
  }
}
