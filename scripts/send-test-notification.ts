import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { NotificationsModule } from '../apps/worker/src/notifications/notifications.module';
import { NotificationDispatchService } from '../apps/worker/src/notifications/notification-dispatch.service';

const main = async (): Promise<void> => {
  const app = await NestFactory.createApplicationContext(NotificationsModule, {
    logger: ['fatal', 'error', 'warn', 'log'],
  });

  try {
    const pair = app.get(ConfigService).get<string>('TRADING_PAIR', 'ETHUSDT');
    const dispatcher = app.get(NotificationDispatchService);
    const enabled = dispatcher.getEnabledChannels();
    if (enabled.length === 0) {
      console.warn('No notification channel enabled. Set TELEGRAM_ENABLED, EMAIL_ENABLED or WEBHOOK_ENABLED.');
      process.exitCode = 1;
      return;
    }

    const summary = await dispatcher.sendTest(pair);
    for (const channel of summary.delivered) {
      console.info(`✅ ${channel}`);
    }
    for (const failure of summary.failed) {
      console.error(`❌ ${failure.channel}: ${failure.error}`);
    }
    if (summary.failed.length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
};

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
