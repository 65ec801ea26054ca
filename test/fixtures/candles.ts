import type { Candle } from '@libs/signals';

export const HOUR_MS = 60 * 60 * 1000;
export const START_TIME = Date.UTC(2024, 0, 1);

/** Hourly bars along a rising sine wave; every bar has a non-zero range. */
export const buildCandles = (count: number, start = START_TIME): Candle[] => {
  const candles: Candle[] = [];
  let previousClose = 100;
  for (let i = 0; i < count; i += 1) {
    const close = 100 + 10 * Math.sin(i / 8) + 0.1 * i;
    const open = previousClose;
    candles.push({
      openTime: start + i * HOUR_MS,
      open,
      high: Math.max(open, close) + 1,
      low: Math.min(open, close) - 1,
      close,
      volume: 1000 + (i % 10) * 50,
      closeTime: start + (i + 1) * HOUR_MS - 1,
    });
    previousClose = close;
  }
  return candles;
};

/** Hourly bars that open at the previous close, with a 0.1 wick on each side. */
export const buildCandlesFromCloses = (closes: number[], volumes: number[] = [], start = START_TIME): Candle[] =>
  closes.map((close, i) => {
    const open = i === 0 ? close : closes[i - 1];
    return {
      openTime: start + i * HOUR_MS,
      open,
      high: Math.max(open, close) + 0.1,
      low: Math.min(open, close) - 0.1,
      close,
      volume: volumes[i] ?? 1000,
      closeTime: start + (i + 1) * HOUR_MS - 1,
    };
  });

/** 21 flat bars at 100 followed by a four-bar drop to 95 on triple volume. */
export const buildWaterfallCandles = (): Candle[] => {
  const closes = [...Array<number>(21).fill(100), 99, 98, 97, 95];
  const volumes = closes.map((_, i) => (i === closes.length - 1 ? 3000 : 1000));
  return buildCandlesFromCloses(closes, volumes);
};
