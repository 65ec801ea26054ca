import {
  adx,
  atr,
  bollinger,
  cci,
  change,
  ema,
  fibonacciLevels,
  keltner,
  last,
  macd,
  obv,
  pivotPoints,
  rsi,
  sma,
  stochastic,
  vwap,
  williamsR,
} from './indicators';
import { InsufficientHistoryError } from './errors';
import { assertValidSnapshot } from './snapshot.schema';
import type { Candle, IndicatorSnapshot, MovingAverageReading, SupportResistanceIndicators } from './types';

export interface SnapshotParams {
  minCandles: number;
  maPeriods: number[];
  emaPeriods: number[];
  rsiPeriod: number;
  macdFastPeriod: number;
  macdSlowPeriod: number;
  macdSignalPeriod: number;
  adxPeriod: number;
  stochKPeriod: number;
  stochDPeriod: number;
  cciPeriod: number;
  williamsPeriod: number;
  bbPeriod: number;
  bbStd: number;
  atrPeriod: number;
  keltnerPeriod: number;
  keltnerAtrPeriod: number;
  keltnerMultiplier: number;
  volumeMaPeriod: number;
  vwapPeriod: number;
  obvSlopeLookback: number;
  fibLookback: number;
}

export const DEFAULT_SNAPSHOT_PARAMS: SnapshotParams = {
  minCandles: 200,
  maPeriods: [20, 50, 200],
  emaPeriods: [9, 21],
  rsiPeriod: 14,
  macdFastPeriod: 12,
  macdSlowPeriod: 26,
  macdSignalPeriod: 9,
  adxPeriod: 14,
  stochKPeriod: 14,
  stochDPeriod: 3,
  cciPeriod: 20,
  williamsPeriod: 14,
  bbPeriod: 20,
  bbStd: 2,
  atrPeriod: 14,
  keltnerPeriod: 20,
  keltnerAtrPeriod: 10,
  keltnerMultiplier: 2,
  volumeMaPeriod: 20,
  vwapPeriod: 14,
  obvSlopeLookback: 5,
  fibLookback: 50,
};

export const requiredHistory = (params: SnapshotParams): number =>
  Math.max(
    params.minCandles,
    ...params.maPeriods,
    ...params.emaPeriods,
    params.macdSlowPeriod + params.macdSignalPeriod,
    2 * params.adxPeriod + 1,
    params.rsiPeriod + 1,
    params.atrPeriod,
    params.stochKPeriod + params.stochDPeriod - 1,
    params.williamsPeriod,
    params.bbPeriod,
    params.keltnerPeriod,
    params.keltnerAtrPeriod,
    params.cciPeriod,
    params.volumeMaPeriod,
    params.vwapPeriod,
    params.fibLookback,
    params.obvSlopeLookback + 1,
    // pivots come from the bar before the latest one
    2,
  );

const buildMovingAverages = (closes: number[], params: SnapshotParams): MovingAverageReading[] => [
  ...params.maPeriods.map((period) => ({ name: `ma_${period}`, period, value: last(sma(closes, period)) })),
  ...params.emaPeriods.map((period) => ({ name: `ema_${period}`, period, value: last(ema(closes, period)) })),
];

const nearestLevels = (
  price: number,
  levels: number[],
): Pick<
  SupportResistanceIndicators,
  'nearestSupport' | 'nearestResistance' | 'supportDistance' | 'resistanceDistance'
> => {
  const supports = levels.filter((level) => level <= price);
  const resistances = levels.filter((level) => level >= price);
  const nearestSupport = supports.length > 0 ? Math.max(...supports) : null;
  const nearestResistance = resistances.length > 0 ? Math.min(...resistances) : null;

  return {
    nearestSupport,
    nearestResistance,
    supportDistance: nearestSupport === null ? null : (price - nearestSupport) / price,
    resistanceDistance: nearestResistance === null ? null : (nearestResistance - price) / price,
  };
};

/**
 * Computes every reading the scoring engine consumes from a window of
 * closed bars (oldest first). Throws InsufficientHistoryError when the window
 * is shorter than the longest lookback, InvalidSnapshotError when a reading
 * comes out non-finite.
 */
export const buildIndicatorSnapshot = (
  candles: Candle[],
  params: SnapshotParams = DEFAULT_SNAPSHOT_PARAMS,
): IndicatorSnapshot => {
  const required = requiredHistory(params);
  if (candles.length < required) {
    throw new InsufficientHistoryError(required, candles.length);
  }

  const highs = candles.map((candle) => candle.high);
  const lows = candles.map((candle) => candle.low);
  const closes = candles.map((candle) => candle.close);
  const volumes = candles.map((candle) => candle.volume);
  const latest = candles[candles.length - 1];
  const previous = candles[candles.length - 2];
  const price = latest.close;

  const macdSeries = macd(closes, params.macdFastPeriod, params.macdSlowPeriod, params.macdSignalPeriod);
  const histogram = macdSeries.histogram;
  const stoch = stochastic(highs, lows, closes, params.stochKPeriod, params.stochDPeriod);
  const bands = bollinger(closes, params.bbPeriod, params.bbStd);
  const channel = keltner(
    highs,
    lows,
    closes,
    params.keltnerPeriod,
    params.keltnerAtrPeriod,
    params.keltnerMultiplier,
  );
  const vwapValue = last(vwap(highs, lows, closes, volumes, params.vwapPeriod));
  const volumeAverage = last(sma(volumes, params.volumeMaPeriod));

  const pivots = pivotPoints(previous.high, previous.low, previous.close);
  const fibLevels = fibonacciLevels(highs, lows, params.fibLookback);
  const levels = [...Object.values(pivots), ...Object.values(fibLevels)];

  return assertValidSnapshot({
    timestamp: latest.closeTime,
    price,
    trend: {
      movingAverages: buildMovingAverages(closes, params),
      macd: last(macdSeries.macdLine),
      macdSignal: last(macdSeries.signalLine),
      macdHistogram: last(histogram),
      macdHistogramPrev: histogram[histogram.length - 2],
      adx: last(adx(highs, lows, closes, params.adxPeriod).adx),
    },
    momentum: {
      rsi: last(rsi(closes, params.rsiPeriod)),
      stochK: last(stoch.k),
      stochD: last(stoch.d),
      cci: last(cci(highs, lows, closes, params.cciPeriod)),
      williamsR: last(williamsR(highs, lows, closes, params.williamsPeriod)),
    },
    volatility: {
      bbUpper: last(bands.upper),
      bbMiddle: last(bands.middle),
      bbLower: last(bands.lower),
      bbPercent: last(bands.percent),
      bbWidth: last(bands.width),
      atr: last(atr(highs, lows, closes, params.atrPeriod)),
      kcUpper: last(channel.upper),
      kcMiddle: last(channel.middle),
      kcLower: last(channel.lower),
    },
    volume: {
      obvSlope: change(obv(closes, volumes), params.obvSlopeLookback),
      priceSlope: change(closes, params.obvSlopeLookback),
      volumeRatio: latest.volume / volumeAverage,
      vwap: vwapValue,
      vwapDeviation: (price - vwapValue) / vwapValue,
    },
    supportResistance: {
      ...pivots,
      fibLevels,
      ...nearestLevels(price, levels),
    },
  });
};
