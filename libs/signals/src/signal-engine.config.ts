import { z } from 'zod';
import type { Env } from '@libs/core';
import { ConfigurationError } from './errors';
import { DEFAULT_SIGNAL_THRESHOLD, DEFAULT_WEIGHTS, weightIssues } from './scoring/scoring.engine';
import {
  mergeScoringParameters,
  type ScoringParameters,
  type ScoringParametersOverrides,
} from './scoring/scoring.parameters';
import { DEFAULT_SNAPSHOT_PARAMS, type SnapshotParams } from './snapshot.builder';
import type { DimensionWeights } from './types';

export interface SignalEngineConfig {
  readonly weights: Readonly<DimensionWeights>;
  readonly signalThreshold: number;
  readonly atrStopMultiplier: number;
  readonly atrProfitMultiplier: number;
  /** Cooldown applied to timeframes without an override. */
  readonly minSignalIntervalMs: number;
  readonly minSignalIntervalByTimeframe: Readonly<Record<string, number>>;
  readonly scoring: ScoringParameters;
}

export interface SignalEngineConfigInput {
  weights?: Partial<DimensionWeights>;
  signalThreshold?: number;
  atrStopMultiplier?: number;
  atrProfitMultiplier?: number;
  minSignalIntervalMs?: number;
  minSignalIntervalByTimeframe?: Record<string, number>;
  scoring?: ScoringParametersOverrides;
}

export const DEFAULT_ATR_STOP_MULTIPLIER = 2;
export const DEFAULT_ATR_PROFIT_MULTIPLIER = 3;
export const DEFAULT_MIN_SIGNAL_INTERVAL_MS = 30 * 60_000;

const finite = z.number().finite();
const positive = finite.positive();
const fraction = finite.min(0).max(1);

const scoringOverridesSchema = z.object({
  trend: z
    .object({
      maWeight: fraction,
      macdWeight: fraction,
      macdSlopeDisagreementFactor: fraction,
      adxFloor: finite.min(0).max(100),
      adxCeiling: finite.min(0).max(100),
      adxMinFactor: finite.min(0),
      adxMaxFactor: finite.min(0),
    })
    .partial()
    .optional(),
  momentum: z
    .object({
      rsiOverbought: finite.min(50).max(100),
      rsiOversold: finite.min(0).max(50),
      rsiExtremeBoost: finite.min(1),
      cciScale: positive,
      rsiWeight: fraction,
      stochasticWeight: fraction,
      cciWeight: fraction,
      williamsWeight: fraction,
    })
    .partial()
    .optional(),
  volatility: z
    .object({
      bollingerWeight: fraction,
      keltnerWeight: fraction,
      squeezeWidth: finite.min(0),
      squeezeDampening: fraction,
    })
    .partial()
    .optional(),
  volume: z
    .object({
      obvWeight: fraction,
      vwapWeight: fraction,
      divergenceWeight: fraction,
      vwapScale: positive,
      volumeRatioFloor: finite.min(0),
      volumeRatioCap: positive,
    })
    .partial()
    .optional(),
  supportResistance: z
    .object({
      pivotRangeAtr: positive,
      proximityAtr: positive,
    })
    .partial()
    .optional(),
});

const configInputSchema = z.object({
  weights: z
    .object({
      trend: finite,
      momentum: finite,
      volatility: finite,
      volume: finite,
      supportResistance: finite,
    })
    .partial()
    .optional(),
  signalThreshold: finite.optional(),
  atrStopMultiplier: finite.optional(),
  atrProfitMultiplier: finite.optional(),
  minSignalIntervalMs: finite.optional(),
  minSignalIntervalByTimeframe: z.record(z.string().min(1), finite).optional(),
  scoring: scoringOverridesSchema.optional(),
});

const freezeScoring = (scoring: ScoringParameters): ScoringParameters =>
  Object.freeze({
    trend: Object.freeze(scoring.trend),
    momentum: Object.freeze(scoring.momentum),
    volatility: Object.freeze(scoring.volatility),
    volume: Object.freeze(scoring.volume),
    supportResistance: Object.freeze(scoring.supportResistance),
  });

const scoringIssues = (scoring: ScoringParameters): string[] => {
  const issues: string[] = [];
  if (scoring.trend.adxCeiling <= scoring.trend.adxFloor) {
    issues.push('scoring.trend.adxCeiling: must be above adxFloor');
  }
  if (scoring.volume.volumeRatioFloor > scoring.volume.volumeRatioCap) {
    issues.push('scoring.volume.volumeRatioFloor: must not exceed volumeRatioCap');
  }
  return issues;
};

/**
 * Validates engine settings once, at startup. Any violation is a
 * ConfigurationError listing every offending field.
 */
export const createSignalEngineConfig = (input: SignalEngineConfigInput = {}): SignalEngineConfig => {
  const parsed = configInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const values = parsed.data;
  const weights: DimensionWeights = { ...DEFAULT_WEIGHTS, ...values.weights };
  const signalThreshold = values.signalThreshold ?? DEFAULT_SIGNAL_THRESHOLD;
  const atrStopMultiplier = values.atrStopMultiplier ?? DEFAULT_ATR_STOP_MULTIPLIER;
  const atrProfitMultiplier = values.atrProfitMultiplier ?? DEFAULT_ATR_PROFIT_MULTIPLIER;
  const minSignalIntervalMs = values.minSignalIntervalMs ?? DEFAULT_MIN_SIGNAL_INTERVAL_MS;
  const minSignalIntervalByTimeframe = values.minSignalIntervalByTimeframe ?? {};
  const scoring = mergeScoringParameters(values.scoring);

  const issues = [...weightIssues(weights), ...scoringIssues(scoring)];
  if (signalThreshold <= 0) {
    issues.push(`signalThreshold: must be positive (got ${signalThreshold})`);
  }
  if (atrStopMultiplier <= 0) {
    issues.push(`atrStopMultiplier: must be positive (got ${atrStopMultiplier})`);
  }
  if (atrProfitMultiplier <= 0) {
    issues.push(`atrProfitMultiplier: must be positive (got ${atrProfitMultiplier})`);
  }
  if (minSignalIntervalMs < 0) {
    issues.push(`minSignalIntervalMs: must not be negative (got ${minSignalIntervalMs})`);
  }
  for (const [timeframe, interval] of Object.entries(minSignalIntervalByTimeframe)) {
    if (interval < 0) {
      issues.push(`minSignalIntervalByTimeframe.${timeframe}: must not be negative (got ${interval})`);
    }
  }
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return Object.freeze({
    weights: Object.freeze(weights),
    signalThreshold,
    atrStopMultiplier,
    atrProfitMultiplier,
    minSignalIntervalMs,
    minSignalIntervalByTimeframe: Object.freeze({ ...minSignalIntervalByTimeframe }),
    scoring: freezeScoring(scoring),
  });
};

export const resolveMinInterval = (config: SignalEngineConfig, timeframe: string): number =>
  config.minSignalIntervalByTimeframe[timeframe] ?? config.minSignalIntervalMs;

export type SignalEnv = Pick<
  Env,
  | 'SIGNAL_WEIGHT_TREND'
  | 'SIGNAL_WEIGHT_MOMENTUM'
  | 'SIGNAL_WEIGHT_VOLATILITY'
  | 'SIGNAL_WEIGHT_VOLUME'
  | 'SIGNAL_WEIGHT_SUPPORT_RESISTANCE'
  | 'SIGNAL_THRESHOLD'
  | 'ATR_STOP_MULTIPLIER'
  | 'ATR_PROFIT_MULTIPLIER'
  | 'MIN_SIGNAL_INTERVAL_MINUTES'
  | 'MIN_SIGNAL_INTERVAL_OVERRIDES'
>;

export const signalEngineConfigFromEnv = (env: SignalEnv): SignalEngineConfig =>
  createSignalEngineConfig({
    weights: {
      trend: env.SIGNAL_WEIGHT_TREND,
      momentum: env.SIGNAL_WEIGHT_MOMENTUM,
      volatility: env.SIGNAL_WEIGHT_VOLATILITY,
      volume: env.SIGNAL_WEIGHT_VOLUME,
      supportResistance: env.SIGNAL_WEIGHT_SUPPORT_RESISTANCE,
    },
    signalThreshold: env.SIGNAL_THRESHOLD,
    atrStopMultiplier: env.ATR_STOP_MULTIPLIER,
    atrProfitMultiplier: env.ATR_PROFIT_MULTIPLIER,
    minSignalIntervalMs: env.MIN_SIGNAL_INTERVAL_MINUTES * 60_000,
    minSignalIntervalByTimeframe: Object.fromEntries(
      Object.entries(env.MIN_SIGNAL_INTERVAL_OVERRIDES).map(([timeframe, minutes]) => [
        timeframe,
        minutes * 60_000,
      ]),
    ),
  });

export type SnapshotEnv = Pick<
  Env,
  | 'MIN_CANDLES'
  | 'MA_PERIODS'
  | 'EMA_PERIODS'
  | 'RSI_PERIOD'
  | 'MACD_FAST_PERIOD'
  | 'MACD_SLOW_PERIOD'
  | 'MACD_SIGNAL_PERIOD'
  | 'ADX_PERIOD'
  | 'STOCH_K_PERIOD'
  | 'STOCH_D_PERIOD'
  | 'BB_PERIOD'
  | 'BB_STD'
  | 'ATR_PERIOD'
>;

const parsePeriods = (name: string, values: string[]): number[] => {
  const periods = values.map(Number);
  const invalid = values.filter((_, index) => !Number.isInteger(periods[index]) || periods[index] <= 0);
  if (invalid.length > 0 || periods.length === 0) {
    throw new ConfigurationError([`${name}: expected positive integer periods (got "${values.join(',')}")`]);
  }
  return periods;
};

export const snapshotParamsFromEnv = (env: SnapshotEnv): SnapshotParams => ({
  ...DEFAULT_SNAPSHOT_PARAMS,
  minCandles: env.MIN_CANDLES,
  maPeriods: parsePeriods('MA_PERIODS', env.MA_PERIODS),
  emaPeriods: parsePeriods('EMA_PERIODS', env.EMA_PERIODS),
  rsiPeriod: env.RSI_PERIOD,
  macdFastPeriod: env.MACD_FAST_PERIOD,
  macdSlowPeriod: env.MACD_SLOW_PERIOD,
  macdSignalPeriod: env.MACD_SIGNAL_PERIOD,
  adxPeriod: env.ADX_PERIOD,
  stochKPeriod: env.STOCH_K_PERIOD,
  stochDPeriod: env.STOCH_D_PERIOD,
  bbPeriod: env.BB_PERIOD,
  bbStd: env.BB_STD,
  atrPeriod: env.ATR_PERIOD,
});
