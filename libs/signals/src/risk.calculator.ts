import { InvalidRiskInputError } from './errors';
import { type RiskLevels, type Tier, tierDirection } from './types';

const assertPositive = (name: string, value: number): void => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidRiskInputError(`${name} must be a positive number (got ${value})`);
  }
};

/**
 * ATR-based stop and target around the current price. HOLD carries no trade
 * and therefore no levels.
 */
export const computeRiskLevels = (
  tier: Tier,
  price: number,
  atr: number,
  stopMultiplier: number,
  profitMultiplier: number,
): RiskLevels | null => {
  const direction = tierDirection(tier);
  if (direction === 'FLAT') {
    return null;
  }

  assertPositive('price', price);
  assertPositive('atr', atr);
  assertPositive('stopMultiplier', stopMultiplier);
  assertPositive('profitMultiplier', profitMultiplier);

  const stopDistance = atr * stopMultiplier;
  const profitDistance = atr * profitMultiplier;
  const stopLoss = direction === 'LONG' ? price - stopDistance : price + stopDistance;
  const takeProfit = direction === 'LONG' ? price + profitDistance : price - profitDistance;

  if (stopLoss <= 0 || takeProfit <= 0) {
    throw new InvalidRiskInputError(
      `ATR ${atr} is too large for price ${price}: levels would not be positive prices`,
    );
  }

  return {
    entryPrice: price,
    stopLoss,
    takeProfit,
    riskRewardRatio: profitDistance / stopDistance,
  };
};
