import { ConfigService } from '@nestjs/config';
import axios, { type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it, vi } from 'vitest';
import { ZodError } from 'zod';
import { BinanceClient, dropOpenCandle, parseKlines, parseTicker, retry } from '@libs/binance';

const klineRow = (openTime: number, close: string): unknown[] => [
  openTime,
  '100.00',
  '110.50',
  '95.25',
  close,
  '1234.5',
  openTime + 59_999,
  '123456.7',
  42,
  '600.1',
  '60010.0',
  '0',
];

describe('parseKlines', () => {
  it('maps exchange rows to candles', () => {
    expect(parseKlines([klineRow(1_700_000_000_000, '105.75')])).toEqual([
      {
        openTime: 1_700_000_000_000,
        open: 100,
        high: 110.5,
        low: 95.25,
        close: 105.75,
        volume: 1234.5,
        closeTime: 1_700_000_059_999,
      },
    ]);
  });

  it('rejects rows with non-numeric prices', () => {
    expect(() => parseKlines([klineRow(1_700_000_000_000, 'n/a')])).toThrow(ZodError);
    expect(() => parseKlines([[1, '2']])).toThrow(ZodError);
    expect(() => parseKlines({ code: -1121, msg: 'Invalid symbol.' })).toThrow(ZodError);
  });
});

describe('parseTicker', () => {
  it('coerces the numeric fields of a 24h ticker', () => {
    const ticker = parseTicker({
      symbol: 'ETHUSDT',
      lastPrice: '2000.50',
      priceChangePercent: '-1.25',
      highPrice: '2100.00',
      lowPrice: '1950.00',
      volume: '350000.1',
      quoteVolume: '700000000.5',
      count: 1000,
    });

    expect(ticker).toEqual({
      symbol: 'ETHUSDT',
      lastPrice: 2000.5,
      priceChangePercent: -1.25,
      highPrice: 2100,
      lowPrice: 1950,
      volume: 350000.1,
      quoteVolume: 700000000.5,
    });
  });
});

describe('dropOpenCandle', () => {
  it('keeps only bars that closed before now', () => {
    const candles = parseKlines([klineRow(0, '101'), klineRow(60_000, '102')]);

    expect(dropOpenCandle(candles, 119_999).map((candle) => candle.close)).toEqual([101]);
    expect(dropOpenCandle(candles, 120_000).map((candle) => candle.close)).toEqual([101, 102]);
  });
});

describe('retry', () => {
  it('retries until the call succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(retry(fn, { attempts: 3, baseDelayMs: 0, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledWith(new Error('boom'), 1, 0);
  });

  it('gives up after the last attempt', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('down'));

    await expect(retry(fn, { attempts: 2, baseDelayMs: 0 })).rejects.toThrow('down');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at once when the error is not retryable', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(retry(fn, { attempts: 5, baseDelayMs: 0, shouldRetry: () => false })).rejects.toThrow(
      'bad request',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('caps the backoff delay', async () => {
    vi.useFakeTimers();
    try {
      const delays: number[] = [];
      const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('slow'));
      const pending = retry(fn, {
        attempts: 4,
        baseDelayMs: 100,
        maxDelayMs: 250,
        onRetry: (_error, _attempt, delayMs) => delays.push(delayMs),
      });
      const assertion = expect(pending).rejects.toThrow('slow');

      await vi.runAllTimersAsync();
      await assertion;
      expect(delays).toEqual([100, 200, 250]);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('BinanceClient', () => {
  it('requests klines by symbol, interval and limit only', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const adapter: AxiosAdapter = async (config) => {
      requests.push(config);
      return { data: [klineRow(1_700_000_000_000, '105.75')], status: 200, statusText: 'OK', headers: {}, config };
    };
    const create = axios.create.bind(axios);
    const createSpy = vi.spyOn(axios, 'create').mockImplementation((config) => create({ ...config, adapter }));
    const client = new BinanceClient(new ConfigService({ BINANCE_KLINES_LIMIT: 250 }));
    createSpy.mockRestore();

    await expect(client.getKlines('ETHUSDT', '1h')).resolves.toHaveLength(1);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('/api/v3/klines');
    expect(requests[0].params).toEqual({ symbol: 'ETHUSDT', interval: '1h', limit: 250 });
  });
});
