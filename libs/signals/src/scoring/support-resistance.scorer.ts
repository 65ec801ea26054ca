import { clamp, clampScore, type DimensionScorer } from './types';

/**
 * Side of the pivot sets the bias; sitting on the next resistance (support)
 * damps a bullish (bearish) bias in proportion to the remaining distance.
 */
export const scoreSupportResistance: DimensionScorer = ({ price, volatility, supportResistance }, params) => {
  const config = params.supportResistance;
  const reasons: string[] = [];
  const atr = volatility.atr;

  let bias = clamp((price - supportResistance.pivot) / (atr * config.pivotRangeAtr), -1, 1);

  if (bias > 0 && supportResistance.resistanceDistance !== null) {
    const distanceAtr = (supportResistance.resistanceDistance * price) / atr;
    if (distanceAtr < config.proximityAtr) {
      bias *= distanceAtr / config.proximityAtr;
      reasons.push('Price close to resistance');
    }
  }

  if (bias < 0 && supportResistance.supportDistance !== null) {
    const distanceAtr = (supportResistance.supportDistance * price) / atr;
    if (distanceAtr < config.proximityAtr) {
      bias *= distanceAtr / config.proximityAtr;
      reasons.push('Price close to support');
    }
  }

  if (supportResistance.nearestResistance === null) {
    reasons.push('Price above every pivot and Fibonacci level');
  } else if (supportResistance.nearestSupport === null) {
    reasons.push('Price below every pivot and Fibonacci level');
  }

  return { score: clampScore(100 * bias), reasons };
};
