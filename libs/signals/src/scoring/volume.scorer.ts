import { clamp, clampScore, type DimensionScorer } from './types';

export const scoreVolume: DimensionScorer = ({ volume }, params) => {
  const config = params.volume;
  const reasons: string[] = [];

  const obvDirection = Math.sign(volume.obvSlope);
  const priceDirection = Math.sign(volume.priceSlope);
  let obvPart = 0;
  if (obvDirection !== 0) {
    if (priceDirection === 0 || priceDirection === obvDirection) {
      obvPart = obvDirection;
      if (priceDirection !== 0) {
        reasons.push(obvDirection > 0 ? 'OBV confirms rising price' : 'OBV confirms falling price');
      }
    } else {
      obvPart = obvDirection * config.divergenceWeight;
      reasons.push('OBV diverges from price');
    }
  }

  const vwapPart =
    Math.sign(volume.vwapDeviation) * Math.min(Math.abs(volume.vwapDeviation) / config.vwapScale, 1);

  const ratioFactor = clamp(volume.volumeRatio, config.volumeRatioFloor, config.volumeRatioCap);
  if (volume.volumeRatio >= 1.5) {
    reasons.push(`Volume ${volume.volumeRatio.toFixed(1)}x above average`);
  }

  const raw = 100 * (config.obvWeight * obvPart + config.vwapWeight * vwapPart) * ratioFactor;
  return { score: clampScore(raw), reasons };
};
