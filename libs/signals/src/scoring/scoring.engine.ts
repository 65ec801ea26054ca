import { ConfigurationError } from '../errors';
import { assertValidSnapshot } from '../snapshot.schema';
import {
  type Dimension,
  DIMENSIONS,
  type DimensionWeights,
  mapDimensions,
  type ScoreResult,
  type Tier,
  type TierThresholds,
} from '../types';
import { scoreMomentum } from './momentum.scorer';
import { DEFAULT_SCORING_PARAMETERS, type ScoringParameters } from './scoring.parameters';
import { scoreSupportResistance } from './support-resistance.scorer';
import { scoreTrend } from './trend.scorer';
import type { DimensionScorer } from './types';
import { scoreVolatility } from './volatility.scorer';
import { scoreVolume } from './volume.scorer';

export const DIMENSION_SCORERS: Record<Dimension, DimensionScorer> = {
  trend: scoreTrend,
  momentum: scoreMomentum,
  volatility: scoreVolatility,
  volume: scoreVolume,
  supportResistance: scoreSupportResistance,
};

export const DEFAULT_WEIGHTS: DimensionWeights = {
  trend: 0.3,
  momentum: 0.25,
  volatility: 0.15,
  volume: 0.15,
  supportResistance: 0.15,
};

export const DEFAULT_SIGNAL_THRESHOLD = 60;

export const WEIGHT_SUM_TOLERANCE = 1e-9;

const SCORE_PRECISION = 1e6;

/** Rounds half away from zero so the composite stays symmetric around 0. */
export const roundScore = (value: number): number =>
  (Math.sign(value) * Math.round(Math.abs(value) * SCORE_PRECISION)) / SCORE_PRECISION;

export const weightIssues = (weights: DimensionWeights): string[] => {
  const issues: string[] = [];
  for (const dimension of DIMENSIONS) {
    const weight = weights[dimension];
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      issues.push(`weights.${dimension}: must be a number between 0 and 1`);
    }
  }
  const total = DIMENSIONS.reduce((sum, dimension) => sum + weights[dimension], 0);
  if (issues.length === 0 && Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
    issues.push(`weights: must sum to 1 (got ${total})`);
  }
  return issues;
};

/**
 * Half-open tiers on the rounded composite:
 * [T, +inf) STRONG_BUY, [T/2, T) BUY, (-T/2, T/2) HOLD, (-T, -T/2] SELL, (-inf, -T] STRONG_SELL.
 */
export const classifyTier = (compositeScore: number, signalThreshold: number): Tier => {
  if (!Number.isFinite(signalThreshold) || signalThreshold <= 0) {
    throw new ConfigurationError([`signalThreshold: must be positive (got ${signalThreshold})`]);
  }

  const half = signalThreshold / 2;
  if (compositeScore >= signalThreshold) return 'STRONG_BUY';
  if (compositeScore >= half) return 'BUY';
  if (compositeScore <= -signalThreshold) return 'STRONG_SELL';
  if (compositeScore <= -half) return 'SELL';
  return 'HOLD';
};

export const scoreSnapshot = (
  snapshot: unknown,
  weights: DimensionWeights,
  thresholds: TierThresholds,
  parameters: ScoringParameters = DEFAULT_SCORING_PARAMETERS,
): ScoreResult => {
  const issues = weightIssues(weights);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const valid = assertValidSnapshot(snapshot);
  const results = mapDimensions((dimension) => DIMENSION_SCORERS[dimension](valid, parameters));
  const componentScores = mapDimensions((dimension) => results[dimension].score);
  const reasons = DIMENSIONS.flatMap((dimension) => results[dimension].reasons);
  const weighted = DIMENSIONS.reduce(
    (sum, dimension) => sum + weights[dimension] * componentScores[dimension],
    0,
  );

  const compositeScore = roundScore(weighted);
  return {
    compositeScore,
    tier: classifyTier(compositeScore, thresholds.signalThreshold),
    componentScores,
    reasons,
  };
};
