import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';
import { formatDecisionMessage, formatMarketAlertMessage } from './telegram.formatter';

@Injectable()
export class TelegramService {
  private readonly logger = new Logger(TelegramService.name);
  private readonly bot: Telegraf | null;
  private readonly channelId: string;
  private readonly groupId: string;
  private readonly disableWebPreview: boolean;

  constructor(configService: ConfigService) {
    const token = configService.get<string>('TELEGRAM_BOT_TOKEN');
    this.bot = token ? new Telegraf(token) : null;

    this.channelId = configService.get<string>('TELEGRAM_SIGNAL_CHANNEL_ID', '');
    this.groupId = configService.get<string>('TELEGRAM_SIGNAL_GROUP_ID', '');
    this.disableWebPreview = configService.get<boolean>('TELEGRAM_DISABLE_WEB_PAGE_PREVIEW', true);
  }

  isConfigured(): boolean {
    return this.bot !== null && this.getDestinations().length > 0;
  }

  getDestinations(): string[] {
    const destinations: string[] = [];
    if (this.channelId) destinations.push(this.channelId);
    if (this.groupId) destinations.push(this.groupId);
    return destinations;
  }

  async sendDecision(notification: DecisionNotification): Promise<number[]> {
    return this.sendMessageToDestinations(formatDecisionMessage(notification));
  }

  async sendMarketAlert(notification: MarketAlertNotification): Promise<number[]> {
    return this.sendMessageToDestinations(formatMarketAlertMessage(notification));
  }

  /** Messages are always HTML; the formatters escape everything they interpolate. */
  async sendMessageToDestinations(message: string): Promise<number[]> {
    const destinations = this.getDestinations();
    if (destinations.length === 0) {
      this.logger.warn('No Telegram destination configured.');
      return [];
    }

    return Promise.all(destinations.map((chatId) => this.sendMessage(chatId, message)));
  }

  async sendMessage(chatId: string, message: string): Promise<number> {
    if (!this.bot) {
      throw new Error('TELEGRAM_BOT_TOKEN is required');
    }
    const response = await this.bot.telegram.sendMessage(chatId, message, {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: this.disableWebPreview },
    });
    return response.message_id;
  }
}
