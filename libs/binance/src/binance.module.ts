import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { BinanceClient } from './binance.client';

@Module({
  imports: [CoreModule],
  providers: [BinanceClient],
  exports: [BinanceClient],
})
export class BinanceModule {}
