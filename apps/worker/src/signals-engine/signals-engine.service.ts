import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BinanceClient, dropOpenCandle } from '@libs/binance';
import {
  type Candle,
  type Decision,
  InsufficientHistoryError,
  type MarketAlert,
  InvalidRiskInputError,
  InvalidSnapshotError,
  type MarketTicker,
  SNAPSHOT_PARAMS,
  SignalOrchestrator,
  SignalThrottle,
  type SnapshotParams,
  buildIndicatorSnapshot,
  detectMarketAlerts,
} from '@libs/signals';
import { NotificationDispatchService } from '../notifications/notification-dispatch.service';

export type SkipReason =
  | 'FETCH_FAILED'
  | 'INSUFFICIENT_DATA'
  | 'NO_NEW_CANDLE'
  | 'INVALID_SNAPSHOT'
  | 'INVALID_RISK_INPUT'
  | 'HOLD'
  | 'COOLDOWN'
  | 'ERROR';

export interface TimeframeResult {
  timeframe: string;
  status: 'emitted' | 'skipped';
  reason?: SkipReason;
  decision?: Decision;
  /** Market alerts delivered for this bar, when any. */
  alertsSent?: number;
}

export interface EngineRunSummary {
  startedAt: number;
  finishedAt: number;
  processed: number;
  emitted: number;
  alerts: number;
  skipped: Partial<Record<SkipReason, number>>;
}

interface SentAlert {
  barTime: number;
  sentAt: number;
}

const classifyFailure = (error: unknown): SkipReason => {
  if (error instanceof InsufficientHistoryError) return 'INSUFFICIENT_DATA';
  if (error instanceof InvalidSnapshotError) return 'INVALID_SNAPSHOT';
  if (error instanceof InvalidRiskInputError) return 'INVALID_RISK_INPUT';
  return 'ERROR';
};

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

@Injectable()
export class SignalsEngineService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SignalsEngineService.name);
  private readonly lastProcessedBar = new Map<string, number>();
  private readonly sentAlerts = new Map<string, SentAlert>();
  private intervalHandle?: NodeJS.Timeout;
  private isRunning = false;
  private lastRunSummary: EngineRunSummary | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly binanceClient: BinanceClient,
    private readonly orchestrator: SignalOrchestrator,
    private readonly throttle: SignalThrottle,
    @Inject(SNAPSHOT_PARAMS)
    private readonly snapshotParams: SnapshotParams,
    private readonly dispatcher: NotificationDispatchService,
  ) {}

  onModuleInit(): void {
    const enabled = this.configService.get<boolean>('SIGNAL_ENGINE_ENABLED', true);
    if (!enabled) {
      this.logger.log('Signals engine disabled (SIGNAL_ENGINE_ENABLED=false).');
      return;
    }

    const intervalSeconds = this.configService.get<number>('SIGNAL_ENGINE_INTERVAL_SECONDS', 60);
    this.intervalHandle = setInterval(() => {
      void this.runEngine();
    }, intervalSeconds * 1000);

    void this.runEngine();
  }

  onModuleDestroy(): void {
    if (this.intervalHandle) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = undefined;
    }
  }

  getLastRunSummary(): EngineRunSummary | null {
    return this.lastRunSummary;
  }

  getThrottleSize(): number {
    return this.throttle.size;
  }

  /** Returns null when a previous run is still active. */
  async runEngine(): Promise<EngineRunSummary | null> {
    if (this.isRunning) {
      this.logger.warn('Signals engine run skipped because a previous run is still active.');
      return null;
    }

    this.isRunning = true;
    const summary: EngineRunSummary = {
      startedAt: Date.now(),
      finishedAt: 0,
      processed: 0,
      emitted: 0,
      alerts: 0,
      skipped: {},
    };

    try {
      const pair = this.configService.get<string>('TRADING_PAIR', 'ETHUSDT');
      const timeframes = this.configService.get<string[]>('SIGNAL_TIMEFRAMES', ['15m', '1h', '4h']);

      for (const timeframe of timeframes) {
        const result = await this.processTimeframe(pair, timeframe);
        summary.processed += 1;
        summary.alerts += result.alertsSent ?? 0;
        if (result.status === 'emitted') {
          summary.emitted += 1;
        } else if (result.reason) {
          summary.skipped[result.reason] = (summary.skipped[result.reason] ?? 0) + 1;
        }
      }
    } catch (error) {
      this.logger.error(`Signals engine run failed: ${errorMessage(error)}`);
    } finally {
      summary.finishedAt = Date.now();
      const skippedSummary = Object.entries(summary.skipped)
        .map(([reason, count]) => `${reason}=${count}`)
        .join(', ');

      this.logger.log(
        `Signals engine run complete: processed=${summary.processed} emitted=${summary.emitted} alerts=${summary.alerts} skipped={${skippedSummary}}`,
      );
      this.lastRunSummary = summary;
      this.isRunning = false;
    }

    return summary;
  }

  async processTimeframe(pair: string, timeframe: string, now: number = Date.now()): Promise<TimeframeResult> {
    let candles: Candle[];
    try {
      candles = dropOpenCandle(await this.binanceClient.getKlines(pair, timeframe), now);
    } catch (error) {
      this.logger.warn(`Failed to fetch ${pair} ${timeframe} klines: ${errorMessage(error)}`);
      return { timeframe, status: 'skipped', reason: 'FETCH_FAILED' };
    }

    if (candles.length === 0) {
      return { timeframe, status: 'skipped', reason: 'INSUFFICIENT_DATA' };
    }

    const key = `${pair}|${timeframe}`;
    const barTime = candles[candles.length - 1].closeTime;
    if (this.lastProcessedBar.get(key) === barTime) {
      return { timeframe, status: 'skipped', reason: 'NO_NEW_CANDLE' };
    }

    let tickerRequest: Promise<MarketTicker | undefined> | null = null;
    const ticker = (): Promise<MarketTicker | undefined> => {
      if (!tickerRequest) tickerRequest = this.fetchTicker(pair);
      return tickerRequest;
    };

    const alertsSent = await this.sendMarketAlerts(pair, timeframe, candles, now, ticker);
    const withAlerts = (result: TimeframeResult): TimeframeResult =>
      alertsSent > 0 ? { ...result, alertsSent } : result;

    let decision: Decision;
    try {
      const snapshot = buildIndicatorSnapshot(candles, this.snapshotParams);
      decision = this.orchestrator.evaluate(snapshot, pair, timeframe, now);
    } catch (error) {
      const reason = classifyFailure(error);
      this.logger.warn(`Evaluation of ${pair} ${timeframe} failed (${reason}): ${errorMessage(error)}`);
      return withAlerts({ timeframe, status: 'skipped', reason });
    }

    this.lastProcessedBar.set(key, barTime);
    this.logger.debug(
      `${pair} ${timeframe}: tier=${decision.tier} score=${decision.score} emitted=${decision.emitted}`,
    );

    if (!decision.emitted) {
      return withAlerts({ timeframe, status: 'skipped', reason: decision.suppressedBy ?? 'ERROR', decision });
    }

    await this.dispatcher.dispatch({ decision, ticker: await ticker() });
    return withAlerts({ timeframe, status: 'emitted', decision });
  }

  /**
   * Detects market alerts on the closed bars and dispatches the ones not
   * already sent for this bar or inside the alert cooldown.
   */
  private async sendMarketAlerts(
    pair: string,
    timeframe: string,
    candles: Candle[],
    now: number,
    ticker: () => Promise<MarketTicker | undefined>,
  ): Promise<number> {
    if (!this.configService.get<boolean>('MARKET_ALERTS_ENABLED', true)) return 0;
    const timeframes = this.configService.get<string[]>('MARKET_ALERT_TIMEFRAMES', ['15m', '1h']);
    if (!timeframes.includes(timeframe)) return 0;

    const cooldownMs = this.configService.get<number>('MARKET_ALERT_COOLDOWN_MINUTES', 5) * 60_000;
    const fresh = detectMarketAlerts(candles, timeframe).filter((alert) => {
      const previous = this.sentAlerts.get(this.alertKey(pair, alert));
      return !previous || (previous.barTime !== alert.barTime && now - previous.sentAt >= cooldownMs);
    });

    for (const alert of fresh) {
      this.logger.warn(`${pair} ${timeframe} market alert: ${alert.title}`);
      await this.dispatcher.dispatchAlert({ pair, alert, ticker: await ticker() });
      this.sentAlerts.set(this.alertKey(pair, alert), { barTime: alert.barTime, sentAt: now });
    }
    return fresh.length;
  }

  private alertKey(pair: string, alert: MarketAlert): string {
    return `${alert.kind}|${alert.direction}|${pair}|${alert.timeframe}`;
  }

  private async fetchTicker(pair: string): Promise<MarketTicker | undefined> {
    try {
      return await this.binanceClient.get24hTicker(pair);
    } catch (error) {
      this.logger.warn(`24h ticker unavailable for ${pair}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
