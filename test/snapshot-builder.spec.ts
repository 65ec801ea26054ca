import { describe, expect, it } from 'vitest';
import {
  DEFAULT_SNAPSHOT_PARAMS,
  DEFAULT_WEIGHTS,
  InsufficientHistoryError,
  InvalidSnapshotError,
  buildIndicatorSnapshot,
  requiredHistory,
  scoreSnapshot,
  type Candle,
} from '@libs/signals';
import { buildCandles } from './fixtures/candles';

const mean = (values: number[]): number => values.reduce((sum, value) => sum + value, 0) / values.length;

describe('buildIndicatorSnapshot', () => {
  it('needs enough history for the longest lookback', () => {
    expect(requiredHistory(DEFAULT_SNAPSHOT_PARAMS)).toBe(200);
    expect(requiredHistory({ ...DEFAULT_SNAPSHOT_PARAMS, minCandles: 50, maPeriods: [20, 100] })).toBe(100);

    try {
      buildIndicatorSnapshot(buildCandles(150));
      expect.fail('expected InsufficientHistoryError');
    } catch (error) {
      expect(error).toBeInstanceOf(InsufficientHistoryError);
      if (error instanceof InsufficientHistoryError) {
        expect(error.message).toBe('Need at least 200 closed bars, got 150');
        expect(error.required).toBe(200);
        expect(error.received).toBe(150);
      }
    }
  });

  it('counts every indicator lookback toward the required history', () => {
    expect(requiredHistory({ ...DEFAULT_SNAPSHOT_PARAMS, stochKPeriod: 200 })).toBe(202);
    expect(requiredHistory({ ...DEFAULT_SNAPSHOT_PARAMS, keltnerAtrPeriod: 230 })).toBe(230);
    expect(requiredHistory({ ...DEFAULT_SNAPSHOT_PARAMS, vwapPeriod: 210 })).toBe(210);

    const params = { ...DEFAULT_SNAPSHOT_PARAMS, rsiPeriod: 250 };
    expect(() => buildIndicatorSnapshot(buildCandles(220), params)).toThrow(InsufficientHistoryError);
    expect(() => buildIndicatorSnapshot(buildCandles(220), params)).toThrow(
      'Need at least 251 closed bars, got 220',
    );
  });

  it('reads the latest closed bar', () => {
    const candles = buildCandles(260);
    const latest = candles[259];
    const snapshot = buildIndicatorSnapshot(candles);

    expect(snapshot.price).toBe(latest.close);
    expect(snapshot.timestamp).toBe(latest.closeTime);
    expect(snapshot.trend.movingAverages.map((reading) => reading.name)).toEqual([
      'ma_20',
      'ma_50',
      'ma_200',
      'ema_9',
      'ema_21',
    ]);
    expect(snapshot.trend.movingAverages[0].value).toBeCloseTo(
      mean(candles.slice(-20).map((candle) => candle.close)),
      9,
    );
  });

  it('derives pivots from the previous bar and fibonacci levels from the lookback', () => {
    const candles = buildCandles(260);
    const previous = candles[258];
    const recent = candles.slice(-50);
    const { supportResistance } = buildIndicatorSnapshot(candles);

    expect(supportResistance.pivot).toBeCloseTo((previous.high + previous.low + previous.close) / 3, 9);
    expect(supportResistance.fibLevels.fib_0).toBe(Math.min(...recent.map((candle) => candle.low)));
    expect(supportResistance.fibLevels.fib_100).toBeCloseTo(Math.max(...recent.map((candle) => candle.high)), 9);
  });

  it('keeps nearest levels on the correct side of the price', () => {
    const snapshot = buildIndicatorSnapshot(buildCandles(260));
    const { nearestSupport, nearestResistance, supportDistance, resistanceDistance } =
      snapshot.supportResistance;

    if (nearestSupport !== null) {
      expect(nearestSupport).toBeLessThanOrEqual(snapshot.price);
      expect(supportDistance).toBeCloseTo((snapshot.price - nearestSupport) / snapshot.price, 12);
    }
    if (nearestResistance !== null) {
      expect(nearestResistance).toBeGreaterThanOrEqual(snapshot.price);
      expect(resistanceDistance).toBeCloseTo((nearestResistance - snapshot.price) / snapshot.price, 12);
    }
  });

  it('produces a snapshot the scoring engine accepts', () => {
    const result = scoreSnapshot(buildIndicatorSnapshot(buildCandles(260)), DEFAULT_WEIGHTS, {
      signalThreshold: 60,
    });

    expect(['STRONG_BUY', 'BUY', 'HOLD', 'SELL', 'STRONG_SELL']).toContain(result.tier);
    expect(Math.abs(result.compositeScore)).toBeLessThanOrEqual(100);
  });

  it('rejects a window without price movement', () => {
    const flat: Candle[] = buildCandles(220).map((candle) => ({
      ...candle,
      open: 100,
      high: 100,
      low: 100,
      close: 100,
    }));

    expect(() => buildIndicatorSnapshot(flat)).toThrow(InvalidSnapshotError);
  });
});
