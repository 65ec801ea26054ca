import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CoreModule, type Env } from '@libs/core';
import { SIGNAL_ENGINE_CONFIG, SNAPSHOT_PARAMS } from './signals.constants';
import {
  type SignalEngineConfig,
  signalEngineConfigFromEnv,
  snapshotParamsFromEnv,
} from './signal-engine.config';
import { SignalOrchestrator } from './signal-orchestrator';
import { SignalThrottle } from './signal-throttle';

@Module({
  imports: [CoreModule],
  providers: [
    {
      provide: SIGNAL_ENGINE_CONFIG,
      inject: [ConfigService],
      // throws ConfigurationError, which aborts bootstrap before any cycle runs
      useFactory: (configService: ConfigService<Env, true>): SignalEngineConfig =>
        signalEngineConfigFromEnv({
          SIGNAL_WEIGHT_TREND: configService.get('SIGNAL_WEIGHT_TREND', { infer: true }),
          SIGNAL_WEIGHT_MOMENTUM: configService.get('SIGNAL_WEIGHT_MOMENTUM', { infer: true }),
          SIGNAL_WEIGHT_VOLATILITY: configService.get('SIGNAL_WEIGHT_VOLATILITY', { infer: true }),
          SIGNAL_WEIGHT_VOLUME: configService.get('SIGNAL_WEIGHT_VOLUME', { infer: true }),
          SIGNAL_WEIGHT_SUPPORT_RESISTANCE: configService.get('SIGNAL_WEIGHT_SUPPORT_RESISTANCE', {
            infer: true,
          }),
          SIGNAL_THRESHOLD: configService.get('SIGNAL_THRESHOLD', { infer: true }),
          ATR_STOP_MULTIPLIER: configService.get('ATR_STOP_MULTIPLIER', { infer: true }),
          ATR_PROFIT_MULTIPLIER: configService.get('ATR_PROFIT_MULTIPLIER', { infer: true }),
          MIN_SIGNAL_INTERVAL_MINUTES: configService.get('MIN_SIGNAL_INTERVAL_MINUTES', { infer: true }),
          MIN_SIGNAL_INTERVAL_OVERRIDES: configService.get('MIN_SIGNAL_INTERVAL_OVERRIDES', { infer: true }),
        }),
    },
    {
      provide: SNAPSHOT_PARAMS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<Env, true>) =>
        snapshotParamsFromEnv({
          MIN_CANDLES: configService.get('MIN_CANDLES', { infer: true }),
          MA_PERIODS: configService.get('MA_PERIODS', { infer: true }),
          EMA_PERIODS: configService.get('EMA_PERIODS', { infer: true }),
          RSI_PERIOD: configService.get('RSI_PERIOD', { infer: true }),
          MACD_FAST_PERIOD: configService.get('MACD_FAST_PERIOD', { infer: true }),
          MACD_SLOW_PERIOD: configService.get('MACD_SLOW_PERIOD', { infer: true }),
          MACD_SIGNAL_PERIOD: configService.get('MACD_SIGNAL_PERIOD', { infer: true }),
          ADX_PERIOD: configService.get('ADX_PERIOD', { infer: true }),
          STOCH_K_PERIOD: configService.get('STOCH_K_PERIOD', { infer: true }),
          STOCH_D_PERIOD: configService.get('STOCH_D_PERIOD', { infer: true }),
          BB_PERIOD: configService.get('BB_PERIOD', { infer: true }),
          BB_STD: configService.get('BB_STD', { infer: true }),
          ATR_PERIOD: configService.get('ATR_PERIOD', { infer: true }),
        }),
    },
    // owned by the module instance; its state is the only thing outliving a cycle
    { provide: SignalThrottle, useFactory: () => new SignalThrottle() },
    {
      provide: SignalOrchestrator,
      inject: [SIGNAL_ENGINE_CONFIG, SignalThrottle],
      useFactory: (config: SignalEngineConfig, throttle: SignalThrottle) =>
        new SignalOrchestrator(config, throttle),
    },
  ],
  exports: [SIGNAL_ENGINE_CONFIG, SNAPSHOT_PARAMS, SignalThrottle, SignalOrchestrator],
})
export class SignalsModule {}
