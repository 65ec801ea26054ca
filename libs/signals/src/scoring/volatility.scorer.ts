import { clamp, clampScore, type DimensionScorer } from './types';

const reversionBias = (position: number): number => clamp((0.5 - position) * 2, -1, 1);

/**
 * Band position gives a mean-reversion bias; a squeeze lowers confidence
 * without adding direction.
 */
export const scoreVolatility: DimensionScorer = ({ price, volatility }, params) => {
  const config = params.volatility;
  const reasons: string[] = [];

  if (volatility.bbPercent > 1) {
    reasons.push('Price above upper Bollinger band');
  } else if (volatility.bbPercent < 0) {
    reasons.push('Price below lower Bollinger band');
  }

  const keltnerPosition = (price - volatility.kcLower) / (volatility.kcUpper - volatility.kcLower);
  let raw =
    100 *
    (config.bollingerWeight * reversionBias(volatility.bbPercent) +
      config.keltnerWeight * reversionBias(keltnerPosition));

  if (volatility.bbWidth < config.squeezeWidth) {
    raw *= config.squeezeDampening;
    reasons.push('Bollinger squeeze, breakout pending');
  }

  return { score: clampScore(raw), reasons };
};
