import { last, sma } from './indicators';
import type { Candle, MarketAlert, MarketAlertDirection } from './types';

/**
 * Thresholds for the pattern detectors. Percentages are in percent units
 * (3 means 3%), ratios are plain multiples.
 */
export interface MarketAlertParameters {
  minBars: number;
  trendBars: number;
  trendMinMoves: number;
  trendMinChangePct: number;
  trendMinDeviationPct: number;
  maPeriod: number;
  waterfallLookback: number;
  waterfallChangePct: number;
  waterfallVolumeRatio: number;
  bigBarChangePct: number;
  bigBarVolumeRatio: number;
  volumeMaPeriod: number;
  pinWickBodyRatio: number;
  pinOppositeWickRatio: number;
  pinMinRangePct: number;
}

export const DEFAULT_MARKET_ALERT_PARAMETERS: MarketAlertParameters = {
  minBars: 20,
  trendBars: 10,
  trendMinMoves: 7,
  trendMinChangePct: 3,
  trendMinDeviationPct: 2,
  maPeriod: 20,
  waterfallLookback: 4,
  waterfallChangePct: 4,
  waterfallVolumeRatio: 1.5,
  bigBarChangePct: 2.5,
  bigBarVolumeRatio: 2,
  volumeMaPeriod: 20,
  pinWickBodyRatio: 2,
  pinOppositeWickRatio: 0.5,
  pinMinRangePct: 1,
};

const formatPct = (value: number): string => `${value > 0 ? '+' : ''}${value.toFixed(2)}%`;

const formatRatio = (value: number): string => `${value.toFixed(1)}x`;

const lastBar = (candles: Candle[]): Candle => candles[candles.length - 1];

const volumeRatio = (candles: Candle[], period: number): number => {
  const average = last(sma(candles.map((candle) => candle.volume), period));
  return Number.isFinite(average) && average > 0 ? lastBar(candles).volume / average : 1;
};

/** Most of the last `trendBars` closes moved one way, far enough from the moving average. */
export function detectTrendRun(
  candles: Candle[],
  timeframe: string,
  params: MarketAlertParameters = DEFAULT_MARKET_ALERT_PARAMETERS,
): MarketAlert | null {
  if (candles.length < Math.max(params.trendBars, params.maPeriod)) return null;

  const closes = candles.map((candle) => candle.close);
  const window = closes.slice(-params.trendBars);
  let rising = 0;
  let falling = 0;
  for (let i = 1; i < window.length; i += 1) {
    if (window[i] > window[i - 1]) rising += 1;
    if (window[i] < window[i - 1]) falling += 1;
  }

  const first = window[0];
  const close = window[window.length - 1];
  const changePct = ((close - first) / first) * 100;
  const average = last(sma(closes, params.maPeriod));
  const deviationPct = ((close - average) / average) * 100;
  const steps = window.length - 1;

  let direction: MarketAlertDirection | null = null;
  if (
    rising >= params.trendMinMoves &&
    changePct > params.trendMinChangePct &&
    deviationPct > params.trendMinDeviationPct
  ) {
    direction = 'UP';
  } else if (
    falling >= params.trendMinMoves &&
    changePct < -params.trendMinChangePct &&
    deviationPct < -params.trendMinDeviationPct
  ) {
    direction = 'DOWN';
  }
  if (!direction) return null;

  const bar = lastBar(candles);
  return {
    kind: 'TREND',
    direction,
    severity: 'WARNING',
    title: direction === 'UP' ? 'Strong uptrend' : 'Strong downtrend',
    timeframe,
    price: bar.close,
    barTime: bar.closeTime,
    details: {
      [direction === 'UP' ? 'Rising bars' : 'Falling bars']: `${direction === 'UP' ? rising : falling} of ${steps}`,
      Change: formatPct(changePct),
      [`MA${params.maPeriod} deviation`]: formatPct(deviationPct),
    },
  };
}

/**
 * A sharp multi-bar move, or a single heavy bar, on elevated volume. The
 * multi-bar move is checked first.
 */
export function detectWaterfall(
  candles: Candle[],
  timeframe: string,
  params: MarketAlertParameters = DEFAULT_MARKET_ALERT_PARAMETERS,
): MarketAlert | null {
  if (candles.length <= params.waterfallLookback) return null;

  const bar = lastBar(candles);
  const base = candles[candles.length - 1 - params.waterfallLookback].close;
  const runChangePct = ((bar.close - base) / base) * 100;
  const barChangePct = ((bar.close - bar.open) / bar.open) * 100;
  const ratio = volumeRatio(candles, params.volumeMaPeriod);

  const build = (
    direction: MarketAlertDirection,
    title: string,
    changeLabel: string,
    changePct: number,
  ): MarketAlert => ({
    kind: 'WATERFALL',
    direction,
    severity: 'DANGER',
    title,
    timeframe,
    price: bar.close,
    barTime: bar.closeTime,
    details: { [changeLabel]: formatPct(changePct), 'Volume ratio': formatRatio(ratio) },
  });

  const runLabel = `${params.waterfallLookback + 1}-bar change`;
  if (ratio > params.waterfallVolumeRatio) {
    if (runChangePct < -params.waterfallChangePct) return build('DOWN', 'Waterfall drop', runLabel, runChangePct);
    if (runChangePct > params.waterfallChangePct) return build('UP', 'Rapid rally', runLabel, runChangePct);
  }
  if (ratio > params.bigBarVolumeRatio) {
    if (barChangePct < -params.bigBarChangePct) {
      return build('DOWN', 'Heavy sell-off bar', 'Bar change', barChangePct);
    }
    if (barChangePct > params.bigBarChangePct) return build('UP', 'Heavy rally bar', 'Bar change', barChangePct);
  }
  return null;
}

/** A long wick on one side of a small body, with a short wick on the other. */
export function detectPinBar(
  candles: Candle[],
  timeframe: string,
  params: MarketAlertParameters = DEFAULT_MARKET_ALERT_PARAMETERS,
): MarketAlert | null {
  if (candles.length === 0) return null;

  const bar = lastBar(candles);
  const body = Math.abs(bar.close - bar.open);
  const range = bar.high - bar.low;
  if (body === 0 || range === 0) return null;

  const upperRatio = (bar.high - Math.max(bar.open, bar.close)) / body;
  const lowerRatio = (Math.min(bar.open, bar.close) - bar.low) / body;
  const rangePct = (range / bar.close) * 100;
  if (rangePct <= params.pinMinRangePct) return null;

  const base = {
    kind: 'PIN_BAR' as const,
    severity: 'WARNING' as const,
    timeframe,
    price: bar.close,
    barTime: bar.closeTime,
  };

  if (lowerRatio > params.pinWickBodyRatio && upperRatio < params.pinOppositeWickRatio) {
    return {
      ...base,
      direction: 'UP',
      title: 'Bullish pin bar',
      details: {
        'Wick/body': formatRatio(lowerRatio),
        Range: `${rangePct.toFixed(2)}%`,
        Low: bar.low.toFixed(4),
      },
    };
  }
  if (upperRatio > params.pinWickBodyRatio && lowerRatio < params.pinOppositeWickRatio) {
    return {
      ...base,
      direction: 'DOWN',
      title: 'Bearish pin bar',
      details: {
        'Wick/body': formatRatio(upperRatio),
        Range: `${rangePct.toFixed(2)}%`,
        High: bar.high.toFixed(4),
      },
    };
  }
  return null;
}

/** Runs every detector over closed bars. At most one alert per kind. */
export function detectMarketAlerts(
  candles: Candle[],
  timeframe: string,
  params: MarketAlertParameters = DEFAULT_MARKET_ALERT_PARAMETERS,
): MarketAlert[] {
  if (candles.length < params.minBars) return [];

  return [detectTrendRun, detectWaterfall, detectPinBar]
    .map((detect) => detect(candles, timeframe, params))
    .filter((alert): alert is MarketAlert => alert !== null);
}
