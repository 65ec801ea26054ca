import { Inject, Injectable, Logger } from '@nestjs/common';
import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';
import { NOTIFICATION_CHANNELS, type NotificationChannel } from './notification-channel';

export interface ChannelFailure {
  channel: string;
  error: string;
}

export interface DispatchSummary {
  delivered: string[];
  failed: ChannelFailure[];
}

/**
 * Fans a notification out to every enabled channel. A failing channel is
 * logged and reported in the summary; it never stops the others.
 */
@Injectable()
export class NotificationDispatchService {
  private readonly logger = new Logger(NotificationDispatchService.name);

  constructor(
    @Inject(NOTIFICATION_CHANNELS)
    private readonly channels: NotificationChannel[],
  ) {}

  getEnabledChannels(): string[] {
    return this.channels.filter((channel) => channel.isEnabled()).map((channel) => channel.name);
  }

  async dispatch(notification: DecisionNotification): Promise<DispatchSummary> {
    const { decision } = notification;
    return this.fanOut(`${decision.pair} ${decision.timeframe} ${decision.tier}`, (channel) =>
      channel.send(notification),
    );
  }

  async dispatchAlert(notification: MarketAlertNotification): Promise<DispatchSummary> {
    const { pair, alert } = notification;
    return this.fanOut(`${pair} ${alert.timeframe} ${alert.kind} ${alert.direction}`, (channel) =>
      channel.sendAlert(notification),
    );
  }

  async sendTest(pair: string): Promise<DispatchSummary> {
    return this.fanOut(`test ${pair}`, (channel) => channel.sendTest(pair));
  }

  private async fanOut(
    label: string,
    deliver: (channel: NotificationChannel) => Promise<void>,
  ): Promise<DispatchSummary> {
    const enabled = this.channels.filter((channel) => channel.isEnabled());
    if (enabled.length === 0) {
      this.logger.warn(`No notification channel enabled; dropping ${label}.`);
      return { delivered: [], failed: [] };
    }

    const results = await Promise.allSettled(enabled.map((channel) => deliver(channel)));
    const summary: DispatchSummary = { delivered: [], failed: [] };

    results.forEach((result, index) => {
      const channel = enabled[index].name;
      if (result.status === 'fulfilled') {
        summary.delivered.push(channel);
        return;
      }
      const error = result.reason instanceof Error ? result.reason.message : String(result.reason);
      summary.failed.push({ channel, error });
      this.logger.error(JSON.stringify({ event: 'notification_failed', channel, label, error }));
    });

    this.logger.log(
      `Dispatched ${label}: delivered=[${summary.delivered.join(', ')}] failed=[${summary.failed
        .map((failure) => failure.channel)
        .join(', ')}]`,
    );
    return summary;
  }
}
