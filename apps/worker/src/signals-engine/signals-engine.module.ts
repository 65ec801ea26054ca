import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { BinanceModule } from '@libs/binance';
import { SignalsModule } from '@libs/signals';
import { NotificationsModule } from '../notifications/notifications.module';
import { SignalsEngineService } from './signals-engine.service';

@Module({
  imports: [CoreModule, BinanceModule, SignalsModule, NotificationsModule],
  providers: [SignalsEngineService],
  exports: [SignalsEngineService],
})
export class SignalsEngineModule {}
