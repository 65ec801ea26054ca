export type Tier = 'STRONG_BUY' | 'BUY' | 'HOLD' | 'SELL' | 'STRONG_SELL';

export type Direction = 'LONG' | 'SHORT' | 'FLAT';

export type Dimension = 'trend' | 'momentum' | 'volatility' | 'volume' | 'supportResistance';

export const DIMENSIONS: readonly Dimension[] = [
  'trend',
  'momentum',
  'volatility',
  'volume',
  'supportResistance',
];

export const mapDimensions = <T>(fn: (dimension: Dimension) => T): Record<Dimension, T> => ({
  trend: fn('trend'),
  momentum: fn('momentum'),
  volatility: fn('volatility'),
  volume: fn('volume'),
  supportResistance: fn('supportResistance'),
});

export const tierDirection = (tier: Tier): Direction => {
  if (tier === 'STRONG_BUY' || tier === 'BUY') return 'LONG';
  if (tier === 'STRONG_SELL' || tier === 'SELL') return 'SHORT';
  return 'FLAT';
};

export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  closeTime: number;
}

export interface MovingAverageReading {
  name: string;
  period: number;
  value: number;
}

export interface TrendIndicators {
  movingAverages: MovingAverageReading[];
  macd: number;
  macdSignal: number;
  macdHistogram: number;
  macdHistogramPrev: number;
  adx: number;
}

export interface MomentumIndicators {
  rsi: number;
  stochK: number;
  stochD: number;
  cci: number;
  williamsR: number;
}

export interface VolatilityIndicators {
  bbUpper: number;
  bbMiddle: number;
  bbLower: number;
  /** %B: 0 at the lower band, 1 at the upper band. */
  bbPercent: number;
  /** (upper - lower) / middle */
  bbWidth: number;
  atr: number;
  kcUpper: number;
  kcMiddle: number;
  kcLower: number;
}

export interface VolumeIndicators {
  obvSlope: number;
  /** Close change over the same lookback as obvSlope. */
  priceSlope: number;
  volumeRatio: number;
  vwap: number;
  /** (price - vwap) / vwap */
  vwapDeviation: number;
}

/**
 * `null` on the nearest/distance fields means no level lies on that side of
 * the price, never a missing indicator.
 */
export interface SupportResistanceIndicators {
  pivot: number;
  r1: number;
  r2: number;
  r3: number;
  s1: number;
  s2: number;
  s3: number;
  fibLevels: Record<string, number>;
  nearestSupport: number | null;
  nearestResistance: number | null;
  supportDistance: number | null;
  resistanceDistance: number | null;
}

export interface IndicatorSnapshot {
  timestamp: number;
  price: number;
  trend: TrendIndicators;
  momentum: MomentumIndicators;
  volatility: VolatilityIndicators;
  volume: VolumeIndicators;
  supportResistance: SupportResistanceIndicators;
}

export type DimensionWeights = Record<Dimension, number>;

export interface TierThresholds {
  signalThreshold: number;
}

export interface ScoreResult {
  compositeScore: number;
  tier: Tier;
  componentScores: Record<Dimension, number>;
  reasons: string[];
}

export interface RiskLevels {
  entryPrice: number;
  stopLoss: number;
  takeProfit: number;
  riskRewardRatio: number;
}

export type SuppressionReason = 'HOLD' | 'COOLDOWN';

export interface Decision {
  pair: string;
  timeframe: string;
  tier: Tier;
  score: number;
  componentScores: Record<Dimension, number>;
  riskLevels: RiskLevels | null;
  emitted: boolean;
  suppressedBy: SuppressionReason | null;
  reasons: string[];
  price: number;
  /** Close time of the bar the snapshot was built from. */
  barTime: number;
  timestamp: number;
}

/** Rolling 24h statistics shown next to a decision. */
export interface MarketTicker {
  symbol: string;
  lastPrice: number;
  priceChangePercent: number;
  highPrice: number;
  lowPrice: number;
  volume: number;
  quoteVolume: number;
}

export interface DecisionNotification {
  decision: Decision;
  ticker?: MarketTicker;
}

export type MarketAlertKind = 'TREND' | 'WATERFALL' | 'PIN_BAR';

export type MarketAlertDirection = 'UP' | 'DOWN';

export type MarketAlertSeverity = 'WARNING' | 'DANGER';

/** An unusual price pattern on the latest closed bar, independent of the score. */
export interface MarketAlert {
  kind: MarketAlertKind;
  direction: MarketAlertDirection;
  severity: MarketAlertSeverity;
  title: string;
  timeframe: string;
  price: number;
  barTime: number;
  /** Display label to formatted value, in display order. */
  details: Record<string, string>;
}

export interface MarketAlertNotification {
  pair: string;
  alert: MarketAlert;
  ticker?: MarketTicker;
}
