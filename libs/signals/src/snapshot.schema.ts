import { z } from 'zod';
import { InvalidSnapshotError } from './errors';
import type { IndicatorSnapshot } from './types';

const finite = z.number().finite();
const positive = finite.positive();

const movingAverageSchema = z.object({
  name: z.string().min(1),
  period: z.number().int().positive(),
  value: positive,
});

const trendSchema = z.object({
  movingAverages: z.array(movingAverageSchema).min(1),
  macd: finite,
  macdSignal: finite,
  macdHistogram: finite,
  macdHistogramPrev: finite,
  adx: finite.min(0).max(100),
});

const momentumSchema = z.object({
  rsi: finite.min(0).max(100),
  stochK: finite.min(0).max(100),
  stochD: finite.min(0).max(100),
  cci: finite,
  williamsR: finite.min(-100).max(0),
});

const volatilitySchema = z
  .object({
    bbUpper: positive,
    bbMiddle: positive,
    bbLower: finite,
    bbPercent: finite,
    bbWidth: finite.min(0),
    atr: positive,
    kcUpper: positive,
    kcMiddle: positive,
    kcLower: finite,
  })
  .superRefine((value, ctx) => {
    if (value.bbUpper <= value.bbLower) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['bbUpper'],
        message: 'upper Bollinger band must be above the lower band',
      });
    }
    if (value.kcUpper <= value.kcLower) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['kcUpper'],
        message: 'upper Keltner band must be above the lower band',
      });
    }
  });

const volumeSchema = z.object({
  obvSlope: finite,
  priceSlope: finite,
  volumeRatio: finite.min(0),
  vwap: positive,
  vwapDeviation: finite,
});

const optionalLevel = finite.nullable();

const supportResistanceSchema = z.object({
  pivot: finite,
  r1: finite,
  r2: finite,
  r3: finite,
  s1: finite,
  s2: finite,
  s3: finite,
  fibLevels: z.record(z.string(), finite),
  nearestSupport: optionalLevel,
  nearestResistance: optionalLevel,
  supportDistance: finite.min(0).nullable(),
  resistanceDistance: finite.min(0).nullable(),
});

export const indicatorSnapshotSchema = z.object({
  timestamp: finite,
  price: positive,
  trend: trendSchema,
  momentum: momentumSchema,
  volatility: volatilitySchema,
  volume: volumeSchema,
  supportResistance: supportResistanceSchema,
});

const describeIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
};

/**
 * Rejects snapshots with missing or non-finite readings. A reading that
 * cannot be trusted is an error, never a zero.
 */
export const assertValidSnapshot = (snapshot: unknown): IndicatorSnapshot => {
  const result = indicatorSnapshotSchema.safeParse(snapshot);
  if (!result.success) {
    throw new InvalidSnapshotError(result.error.issues.map(describeIssue));
  }
  return result.data;
};
