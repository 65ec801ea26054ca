import { clamp, clampScore, type DimensionScorer } from './types';

/**
 * Moving-average agreement and MACD direction, scaled by ADX. Mixed
 * crossovers are squared toward zero instead of averaged.
 */
export const scoreTrend: DimensionScorer = ({ price, trend }, params) => {
  const config = params.trend;
  const reasons: string[] = [];

  const averages = [...trend.movingAverages].sort((a, b) => a.period - b.period);
  const votes = averages.map((average) => Math.sign(price - average.value));
  for (let i = 0; i < averages.length - 1; i += 1) {
    votes.push(Math.sign(averages[i].value - averages[i + 1].value));
  }
  const agreement = votes.reduce((sum, vote) => sum + vote, 0) / votes.length;
  const maScore = agreement * Math.abs(agreement);

  if (agreement === 1) {
    reasons.push('Moving averages aligned bullish');
  } else if (agreement === -1) {
    reasons.push('Moving averages aligned bearish');
  } else if (Math.abs(agreement) < 0.5) {
    reasons.push('Moving averages mixed');
  }

  const histogramSign = Math.sign(trend.macdHistogram);
  const slopeSign = Math.sign(trend.macdHistogram - trend.macdHistogramPrev);
  let macdScore = 0;
  if (histogramSign !== 0) {
    macdScore = histogramSign * (slopeSign === histogramSign ? 1 : config.macdSlopeDisagreementFactor);
    if (slopeSign === histogramSign) {
      reasons.push(histogramSign > 0 ? 'MACD histogram rising above zero' : 'MACD histogram falling below zero');
    }
  }

  const raw = 100 * (config.maWeight * maScore + config.macdWeight * macdScore);

  const progress = clamp((trend.adx - config.adxFloor) / (config.adxCeiling - config.adxFloor), 0, 1);
  const adxFactor = config.adxMinFactor + (config.adxMaxFactor - config.adxMinFactor) * progress;
  if (trend.adx >= config.adxCeiling) {
    reasons.push(`ADX ${trend.adx.toFixed(0)} confirms a strong trend`);
  } else if (trend.adx <= config.adxFloor) {
    reasons.push(`ADX ${trend.adx.toFixed(0)} signals a weak trend`);
  }

  return { score: clampScore(raw * adxFactor), reasons };
};
