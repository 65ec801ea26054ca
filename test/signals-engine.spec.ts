import { ConfigService } from '@nestjs/config';
import { describe, expect, it, vi } from 'vitest';
import { BinanceClient } from '@libs/binance';
import {
  DEFAULT_SNAPSHOT_PARAMS,
  InvalidRiskInputError,
  SignalOrchestrator,
  SignalThrottle,
  createSignalEngineConfig,
  detectMarketAlerts,
  type MarketTicker,
} from '@libs/signals';
import { NotificationDispatchService } from '../apps/worker/src/notifications/notification-dispatch.service';
import { SignalsEngineService } from '../apps/worker/src/signals-engine/signals-engine.service';
import { buildCandles, buildCandlesFromCloses, buildWaterfallCandles } from './fixtures/candles';
import { buildDecision } from './fixtures/decisions';

const ticker: MarketTicker = {
  symbol: 'ETHUSDT',
  lastPrice: 2000,
  priceChangePercent: 1.5,
  highPrice: 2050,
  lowPrice: 1950,
  volume: 1000,
  quoteVolume: 2000000,
};

const setup = (timeframes: string[] = ['1h'], config: Record<string, unknown> = { MARKET_ALERTS_ENABLED: false }) => {
  const binanceClient = new BinanceClient(new ConfigService({}));
  const throttle = new SignalThrottle();
  const orchestrator = new SignalOrchestrator(createSignalEngineConfig(), throttle);
  const dispatcher = new NotificationDispatchService([]);
  const service = new SignalsEngineService(
    new ConfigService({ TRADING_PAIR: 'ETHUSDT', SIGNAL_TIMEFRAMES: timeframes, ...config }),
    binanceClient,
    orchestrator,
    throttle,
    DEFAULT_SNAPSHOT_PARAMS,
    dispatcher,
  );

  const getKlines = vi.spyOn(binanceClient, 'getKlines');
  const get24hTicker = vi.spyOn(binanceClient, 'get24hTicker').mockResolvedValue(ticker);
  const evaluate = vi
    .spyOn(orchestrator, 'evaluate')
    .mockImplementation((snapshot, pair, timeframe, now) =>
      buildDecision({ pair, timeframe, barTime: snapshot.timestamp, timestamp: now }),
    );
  const dispatch = vi.spyOn(dispatcher, 'dispatch').mockResolvedValue({ delivered: ['telegram'], failed: [] });
  const dispatchAlert = vi
    .spyOn(dispatcher, 'dispatchAlert')
    .mockResolvedValue({ delivered: ['telegram'], failed: [] });

  return { service, getKlines, get24hTicker, evaluate, dispatch, dispatchAlert };
};

describe('SignalsEngineService', () => {
  it('evaluates the latest closed bar and dispatches an emitted decision', async () => {
    const { service, getKlines, evaluate, dispatch } = setup();
    const candles = buildCandles(261);
    const now = candles[259].closeTime + 1;
    getKlines.mockResolvedValue(candles);

    const result = await service.processTimeframe('ETHUSDT', '1h', now);

    expect(getKlines).toHaveBeenCalledWith('ETHUSDT', '1h');
    expect(evaluate).toHaveBeenCalledTimes(1);
    expect(evaluate.mock.calls[0][0].timestamp).toBe(candles[259].closeTime);
    expect(result.status).toBe('emitted');
    expect(result.decision?.barTime).toBe(candles[259].closeTime);
    expect(dispatch).toHaveBeenCalledWith({ decision: result.decision, ticker });
  });

  it('skips a bar that was already evaluated', async () => {
    const { service, getKlines, evaluate } = setup();
    const candles = buildCandles(260);
    const now = candles[259].closeTime + 1;
    getKlines.mockResolvedValue(candles);

    await service.processTimeframe('ETHUSDT', '1h', now);
    const repeat = await service.processTimeframe('ETHUSDT', '1h', now + 1000);

    expect(repeat).toEqual({ timeframe: '1h', status: 'skipped', reason: 'NO_NEW_CANDLE' });
    expect(evaluate).toHaveBeenCalledTimes(1);
  });

  it('reports fetch failures', async () => {
    const { service, getKlines, evaluate } = setup();
    getKlines.mockRejectedValue(new Error('socket hang up'));

    await expect(service.processTimeframe('ETHUSDT', '1h')).resolves.toEqual({
      timeframe: '1h',
      status: 'skipped',
      reason: 'FETCH_FAILED',
    });
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('reports insufficient data for short or empty histories', async () => {
    const { service, getKlines, evaluate } = setup();

    getKlines.mockResolvedValue(buildCandles(50));
    await expect(service.processTimeframe('ETHUSDT', '1h')).resolves.toMatchObject({
      reason: 'INSUFFICIENT_DATA',
    });

    getKlines.mockResolvedValue([]);
    await expect(service.processTimeframe('ETHUSDT', '4h')).resolves.toMatchObject({
      reason: 'INSUFFICIENT_DATA',
    });
    expect(evaluate).not.toHaveBeenCalled();
  });

  it('classifies evaluation failures and retries the bar next cycle', async () => {
    const { service, getKlines, evaluate, dispatch } = setup();
    const candles = buildCandles(260);
    getKlines.mockResolvedValue(candles);
    evaluate.mockImplementationOnce(() => {
      throw new InvalidRiskInputError('atr must be a positive number (got 0)');
    });

    await expect(service.processTimeframe('ETHUSDT', '1h')).resolves.toEqual({
      timeframe: '1h',
      status: 'skipped',
      reason: 'INVALID_RISK_INPUT',
    });
    await expect(service.processTimeframe('ETHUSDT', '1h')).resolves.toMatchObject({ status: 'emitted' });
    expect(evaluate).toHaveBeenCalledTimes(2);
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it('does not dispatch suppressed decisions', async () => {
    const { service, getKlines, evaluate, dispatch } = setup();
    getKlines.mockResolvedValue(buildCandles(260));
    evaluate.mockImplementation((snapshot, pair, timeframe, now) =>
      buildDecision({
        pair,
        timeframe,
        tier: 'HOLD',
        score: 3,
        riskLevels: null,
        emitted: false,
        suppressedBy: 'HOLD',
        barTime: snapshot.timestamp,
        timestamp: now,
      }),
    );

    const result = await service.processTimeframe('ETHUSDT', '1h');

    expect(result.status).toBe('skipped');
    expect(result.reason).toBe('HOLD');
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('dispatches without a ticker when the ticker request fails', async () => {
    const { service, getKlines, get24hTicker, dispatch } = setup();
    getKlines.mockResolvedValue(buildCandles(260));
    get24hTicker.mockRejectedValue(new Error('timeout'));

    const result = await service.processTimeframe('ETHUSDT', '1h');

    expect(result.status).toBe('emitted');
    expect(dispatch).toHaveBeenCalledWith({ decision: result.decision, ticker: undefined });
  });

  it('summarises a run across timeframes', async () => {
    const { service, getKlines } = setup(['15m', '1h']);
    getKlines.mockImplementation(async (_symbol, interval) => {
      if (interval === '15m') throw new Error('503');
      return buildCandles(260);
    });

    const summary = await service.runEngine();

    expect(summary).toMatchObject({ processed: 2, emitted: 1, alerts: 0, skipped: { FETCH_FAILED: 1 } });
    expect(service.getLastRunSummary()).toBe(summary);
  });
});

describe('SignalsEngineService market alerts', () => {
  it('dispatches alerts found on the closed bars', async () => {
    const { service, getKlines, dispatchAlert } = setup(['1h'], {});
    const candles = buildWaterfallCandles();
    getKlines.mockResolvedValue(candles);

    const result = await service.processTimeframe('ETHUSDT', '1h', candles[24].closeTime + 1);

    expect(result).toEqual({ timeframe: '1h', status: 'skipped', reason: 'INSUFFICIENT_DATA', alertsSent: 1 });
    expect(dispatchAlert).toHaveBeenCalledWith({
      pair: 'ETHUSDT',
      alert: detectMarketAlerts(candles, '1h')[0],
      ticker,
    });
  });

  it('sends each alert once per bar', async () => {
    const { service, getKlines, dispatchAlert } = setup(['1h'], {});
    const candles = buildWaterfallCandles();
    const now = candles[24].closeTime + 1;
    getKlines.mockResolvedValue(candles);

    await service.processTimeframe('ETHUSDT', '1h', now);
    const retry = await service.processTimeframe('ETHUSDT', '1h', now + 10 * 60_000);

    expect(retry).toEqual({ timeframe: '1h', status: 'skipped', reason: 'INSUFFICIENT_DATA' });
    expect(dispatchAlert).toHaveBeenCalledTimes(1);
  });

  const twoDrops = () =>
    buildCandlesFromCloses(
      [...Array<number>(21).fill(100), 99, 98, 97, 95, 93],
      [...Array<number>(24).fill(1000), 3000, 3000],
    );

  it('holds back a repeat alert on the next bar inside the cooldown', async () => {
    const { service, getKlines, dispatchAlert } = setup(['1h'], { MARKET_ALERT_COOLDOWN_MINUTES: 120 });
    const candles = twoDrops();

    getKlines.mockResolvedValue(candles.slice(0, 25));
    await service.processTimeframe('ETHUSDT', '1h', candles[24].closeTime + 1);
    getKlines.mockResolvedValue(candles);
    const next = await service.processTimeframe('ETHUSDT', '1h', candles[25].closeTime + 1);

    expect(next.alertsSent).toBeUndefined();
    expect(dispatchAlert).toHaveBeenCalledTimes(1);
  });

  it('alerts again on the next bar once the cooldown has passed', async () => {
    const { service, getKlines, dispatchAlert } = setup(['1h'], {});
    const candles = twoDrops();

    getKlines.mockResolvedValue(candles.slice(0, 25));
    await service.processTimeframe('ETHUSDT', '1h', candles[24].closeTime + 1);
    getKlines.mockResolvedValue(candles);
    const next = await service.processTimeframe('ETHUSDT', '1h', candles[25].closeTime + 1);

    expect(next.alertsSent).toBe(1);
    expect(dispatchAlert).toHaveBeenCalledTimes(2);
    expect(dispatchAlert.mock.calls[1][0].alert.details).toEqual({
      '5-bar change': '-6.06%',
      'Volume ratio': '2.5x',
    });
  });

  it('skips timeframes outside the alert list', async () => {
    const { service, getKlines, dispatchAlert } = setup(['4h'], {});
    const candles = buildWaterfallCandles();
    getKlines.mockResolvedValue(candles);

    await service.processTimeframe('ETHUSDT', '4h', candles[24].closeTime + 1);

    expect(dispatchAlert).not.toHaveBeenCalled();
  });
});
