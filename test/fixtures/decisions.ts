import type { Decision, MarketAlert } from '@libs/signals';

export const buildDecision = (overrides: Partial<Decision> = {}): Decision => ({
  pair: 'ETHUSDT',
  timeframe: '1h',
  tier: 'STRONG_BUY',
  score: 66.5,
  componentScores: {
    trend: 100,
    momentum: 86,
    volatility: -100,
    volume: 100,
    supportResistance: 100,
  },
  riskLevels: {
    entryPrice: 2000,
    stopLoss: 1960,
    takeProfit: 2060,
    riskRewardRatio: 1.5,
  },
  emitted: true,
  suppressedBy: null,
  reasons: ['Moving averages aligned bullish', 'RSI 75 overbought'],
  price: 2000,
  barTime: Date.UTC(2024, 0, 1, 12, 0, 0),
  timestamp: Date.UTC(2024, 0, 1, 12, 0, 5),
  ...overrides,
});

export const buildMarketAlert = (overrides: Partial<MarketAlert> = {}): MarketAlert => ({
  kind: 'WATERFALL',
  direction: 'DOWN',
  severity: 'DANGER',
  title: 'Waterfall drop',
  timeframe: '1h',
  price: 1900,
  barTime: Date.UTC(2024, 0, 1, 12, 0, 0),
  details: { '5-bar change': '-5.00%', 'Volume ratio': '2.7x' },
  ...overrides,
});
