import { clamp, clampScore, type DimensionScorer } from './types';

export const scoreMomentum: DimensionScorer = ({ momentum }, params) => {
  const config = params.momentum;
  const reasons: string[] = [];

  let rsiPart = (momentum.rsi - 50) / 50;
  if (momentum.rsi >= config.rsiOverbought) {
    rsiPart *= config.rsiExtremeBoost;
    reasons.push(`RSI ${momentum.rsi.toFixed(0)} overbought`);
  } else if (momentum.rsi <= config.rsiOversold) {
    rsiPart *= config.rsiExtremeBoost;
    reasons.push(`RSI ${momentum.rsi.toFixed(0)} oversold`);
  }
  rsiPart = clamp(rsiPart, -1, 1);

  const stochasticPart = Math.sign(momentum.stochK - momentum.stochD);
  if (stochasticPart > 0) {
    reasons.push('Stochastic %K above %D');
  } else if (stochasticPart < 0) {
    reasons.push('Stochastic %K below %D');
  }

  // capped so a single oscillator cannot dominate
  const cciPart = Math.sign(momentum.cci) * Math.min(Math.abs(momentum.cci) / config.cciScale, 1);
  const williamsPart = clamp((momentum.williamsR + 50) / 50, -1, 1);

  const raw =
    config.rsiWeight * rsiPart +
    config.stochasticWeight * stochasticPart +
    config.cciWeight * cciPart +
    config.williamsWeight * williamsPart;

  return { score: clampScore(100 * raw), reasons };
};
