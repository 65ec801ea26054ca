import {
  type DecisionNotification,
  type MarketAlert,
  type MarketAlertNotification,
  type MarketTicker,
  type Tier,
  tierDirection,
} from '@libs/signals';

const MAX_REASONS = 10;

export const formatNumber = (value: number): string => value.toFixed(4);

const formatSigned = (value: number, digits = 2): string =>
  `${value > 0 ? '+' : ''}${value.toFixed(digits)}`;

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');

export const formatTierLabel = (tier: Tier): string => tier.replace('_', ' ');

export const tierEmoji = (tier: Tier): string => {
  const direction = tierDirection(tier);
  if (direction === 'LONG') return '🟢';
  if (direction === 'SHORT') return '🔴';
  return '⚪️';
};

export const formatUtcTimestamp = (timestamp: number): string => {
  const iso = new Date(timestamp).toISOString();
  return `${iso.slice(0, 19).replace('T', ' ')} (UTC)`;
};

export const alertEmoji = ({ direction, severity }: MarketAlert): string => {
  if (direction === 'UP') return severity === 'DANGER' ? '🚀' : '📈';
  return severity === 'DANGER' ? '🌊' : '📉';
};

const formatTicker = (ticker: MarketTicker): string[] => [
  '<b>24h</b>',
  `High: ${formatNumber(ticker.highPrice)}`,
  `Low: ${formatNumber(ticker.lowPrice)}`,
  `Change: ${formatSigned(ticker.priceChangePercent)}%`,
  `Volume: ${ticker.volume.toFixed(0)}`,
];

export const formatDecisionMessage = ({ decision, ticker }: DecisionNotification): string => {
  const components = Object.entries(decision.componentScores)
    .map(([dimension, score]) => `${dimension} ${formatSigned(score, 1)}`)
    .join(', ');

  const lines = [
    `${tierEmoji(decision.tier)} <b>${formatTierLabel(decision.tier)}</b> ${escapeHtml(decision.pair)} ${escapeHtml(decision.timeframe)}`,
    `<b>Score:</b> ${formatSigned(decision.score)} / 100`,
    `<b>Components:</b> ${components}`,
    `<b>Price:</b> ${formatNumber(decision.price)}`,
  ];

  if (decision.riskLevels) {
    const { entryPrice, stopLoss, takeProfit, riskRewardRatio } = decision.riskLevels;
    lines.push(
      `<b>Entry:</b> ${formatNumber(entryPrice)}`,
      `<b>Stop loss:</b> ${formatNumber(stopLoss)}`,
      `<b>Take profit:</b> ${formatNumber(takeProfit)}`,
      `<b>Risk/Reward:</b> ${riskRewardRatio.toFixed(2)}`,
    );
  }

  if (ticker) {
    lines.push(...formatTicker(ticker));
  }

  const reasons = decision.reasons.slice(0, MAX_REASONS);
  if (reasons.length > 0) {
    lines.push('<b>Reasons</b>');
    reasons.forEach((reason, index) => lines.push(`${index + 1}. ${escapeHtml(reason)}`));
  }

  lines.push(`<b>Bar close:</b> ${formatUtcTimestamp(decision.barTime)}`);
  lines.push('<i>Automated analysis, not financial advice.</i>');

  return lines.join('\n');
};

export const formatMarketAlertMessage = ({ pair, alert, ticker }: MarketAlertNotification): string => {
  const lines = [
    `${alertEmoji(alert)} <b>${escapeHtml(alert.title)}</b> ${escapeHtml(pair)} ${escapeHtml(alert.timeframe)}`,
    `<b>Price:</b> ${formatNumber(alert.price)}`,
    ...Object.entries(alert.details).map(([label, value]) => `${escapeHtml(label)}: ${escapeHtml(value)}`),
  ];

  if (ticker) {
    lines.push(...formatTicker(ticker));
  }

  lines.push(`<b>Bar close:</b> ${formatUtcTimestamp(alert.barTime)}`);
  lines.push('<i>Automated analysis, not financial advice.</i>');

  return lines.join('\n');
};

export const formatTestMessage = (pair: string, timestamp: number = Date.now()): string =>
  [
    '🔔 <b>Test notification</b>',
    `Signals for ${escapeHtml(pair)} will be delivered here.`,
    formatUtcTimestamp(timestamp),
  ].join('\n');
