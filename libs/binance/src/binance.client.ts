import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Candle, MarketTicker } from '@libs/signals';
import { retry, type RetryOptions } from './retry.util';

const numeric = z.union([z.string(), z.number()]).pipe(z.coerce.number().finite());

// [openTime, open, high, low, close, volume, closeTime, quoteVolume, trades, ...]
const klineRowSchema = z
  .tuple([numeric, numeric, numeric, numeric, numeric, numeric, numeric])
  .rest(z.unknown());

const klinesSchema = z.array(klineRowSchema);

const tickerSchema = z.object({
  symbol: z.string(),
  lastPrice: numeric,
  priceChangePercent: numeric,
  highPrice: numeric,
  lowPrice: numeric,
  volume: numeric,
  quoteVolume: numeric,
});

export const parseKlines = (payload: unknown): Candle[] =>
  klinesSchema.parse(payload).map(([openTime, open, high, low, close, volume, closeTime]) => ({
    openTime,
    open,
    high,
    low,
    close,
    volume,
    closeTime,
  }));

export const parseTicker = (payload: unknown): MarketTicker => tickerSchema.parse(payload);

/** The exchange returns the forming bar last; only bars closed by `now` are kept. */
export const dropOpenCandle = (klines: Candle[], now: number): Candle[] =>
  klines.filter((kline) => kline.closeTime < now);

const isRetryable = (error: unknown): boolean => {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === undefined || status === 429 || status >= 500;
};

@Injectable()
export class BinanceClient {
  private readonly logger = new Logger(BinanceClient.name);
  private readonly http: AxiosInstance;
  private readonly defaultLimit: number;
  private readonly retryOptions: RetryOptions;

  constructor(configService: ConfigService) {
    const baseURL = configService.get<string>('BINANCE_BASE_URL', 'https://data-api.binance.vision');
    const timeout = configService.get<number>('BINANCE_REQUEST_TIMEOUT_MS', 10000);
    this.http = axios.create({
      baseURL,
      timeout,
    });
    this.defaultLimit = configService.get<number>('BINANCE_KLINES_LIMIT', 300);
    this.retryOptions = {
      attempts: configService.get<number>('BINANCE_RETRY_ATTEMPTS', 3),
      baseDelayMs: 1000,
      shouldRetry: isRetryable,
      onRetry: (error, attempt, delayMs) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Binance request failed (attempt ${attempt}), retrying in ${delayMs}ms: ${message}`);
      },
    };
  }

  async getKlines(symbol: string, interval: string, limit = this.defaultLimit): Promise<Candle[]> {
    const response = await retry(
      () =>
        this.http.get<unknown>('/api/v3/klines', {
          params: {
            symbol,
            interval,
            limit,
          },
        }),
      this.retryOptions,
    );

    return parseKlines(response.data);
  }

  async get24hTicker(symbol: string): Promise<MarketTicker> {
    const response = await retry(
      () => this.http.get<unknown>('/api/v3/ticker/24hr', { params: { symbol } }),
      this.retryOptions,
    );
    return parseTicker(response.data);
  }
}
