import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { TelegramModule } from '@libs/telegram';
import { EmailChannel } from './channels/email.channel';
import { TelegramChannel } from './channels/telegram.channel';
import { WebhookChannel } from './channels/webhook.channel';
import { NOTIFICATION_CHANNELS, type NotificationChannel } from './notification-channel';
import { NotificationDispatchService } from './notification-dispatch.service';

@Module({
  imports: [CoreModule, TelegramModule],
  providers: [
    TelegramChannel,
    EmailChannel,
    WebhookChannel,
    {
      provide: NOTIFICATION_CHANNELS,
      inject: [TelegramChannel, EmailChannel, WebhookChannel],
      useFactory: (...channels: NotificationChannel[]): NotificationChannel[] => channels,
    },
    NotificationDispatchService,
  ],
  exports: [NotificationDispatchService],
})
export class NotificationsModule {}
