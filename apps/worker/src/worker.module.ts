import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { HealthController } from './health.controller';
import { NotificationsModule } from './notifications/notifications.module';
import { SignalsEngineModule } from './signals-engine/signals-engine.module';

@Module({
  imports: [CoreModule, NotificationsModule, SignalsEngineModule],
  controllers: [HealthController],
})
export class WorkerModule {}
