import type { IndicatorSnapshot } from '../types';
import type { ScoringParameters } from './scoring.parameters';

export interface DimensionScore {
  /** Sub-score in [-100, 100]; positive is bullish. */
  score: number;
  reasons: string[];
}

export type DimensionScorer = (snapshot: IndicatorSnapshot, params: ScoringParameters) => DimensionScore;

export const SCORE_LIMIT = 100;

export const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export const clampScore = (value: number): number => clamp(value, -SCORE_LIMIT, SCORE_LIMIT);
