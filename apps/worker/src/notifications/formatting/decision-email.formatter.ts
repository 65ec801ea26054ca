import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';
import {
  alertEmoji,
  escapeHtml,
  formatNumber,
  formatTierLabel,
  formatUtcTimestamp,
  tierEmoji,
} from '@libs/telegram';

const MAX_REASONS = 10;

export interface EmailContent {
  subject: string;
  text: string;
  html: string;
}

const row = (label: string, value: string): string =>
  `<tr><td style="padding: 8px; border: 1px solid #ddd;"><b>${label}</b></td><td style="padding: 8px; border: 1px solid #ddd;">${value}</td></tr>`;

export const formatDecisionEmail = ({ decision, ticker }: DecisionNotification): EmailContent => {
  const tier = formatTierLabel(decision.tier);
  const score = decision.score.toFixed(2);
  const subject = `${decision.pair} ${decision.timeframe}: ${tier} (score ${score})`;

  const fields: Array<[string, string]> = [
    ['Signal', tier],
    ['Score', `${score} / 100`],
    ['Price', formatNumber(decision.price)],
  ];
  if (decision.riskLevels) {
    fields.push(
      ['Entry', formatNumber(decision.riskLevels.entryPrice)],
      ['Stop loss', formatNumber(decision.riskLevels.stopLoss)],
      ['Take profit', formatNumber(decision.riskLevels.takeProfit)],
      ['Risk/Reward', decision.riskLevels.riskRewardRatio.toFixed(2)],
    );
  }
  if (ticker) {
    fields.push(
      ['24h high', formatNumber(ticker.highPrice)],
      ['24h low', formatNumber(ticker.lowPrice)],
      ['24h change', `${ticker.priceChangePercent.toFixed(2)}%`],
    );
  }
  fields.push(['Bar close', formatUtcTimestamp(decision.barTime)]);

  const reasons = decision.reasons.slice(0, MAX_REASONS);

  const html = [
    '<html><body style="font-family: Arial, sans-serif;">',
    `<h2>${tierEmoji(decision.tier)} ${escapeHtml(decision.pair)} ${escapeHtml(decision.timeframe)}</h2>`,
    '<table style="border-collapse: collapse; width: 100%;">',
    ...fields.map(([label, value]) => row(label, escapeHtml(value))),
    '</table>',
    '<h3>Reasons</h3>',
    `<ul>${reasons.map((reason) => `<li>${escapeHtml(reason)}</li>`).join('')}</ul>`,
    '<p style="color: red;"><b>Automated analysis, not financial advice.</b></p>',
    '</body></html>',
  ].join('\n');

  const text = [
    subject,
    '',
    ...fields.map(([label, value]) => `${label}: ${value}`),
    '',
    ...reasons.map((reason, index) => `${index + 1}. ${reason}`),
  ].join('\n');

  return { subject, text, html };
};

export const formatMarketAlertEmail = ({ pair, alert, ticker }: MarketAlertNotification): EmailContent => {
  const subject = `${pair} ${alert.timeframe} market alert: ${alert.title}`;

  const fields: Array<[string, string]> = [
    ['Alert', alert.title],
    ['Price', formatNumber(alert.price)],
    ...Object.entries(alert.details),
  ];
  if (ticker) {
    fields.push(['24h change', `${ticker.priceChangePercent.toFixed(2)}%`]);
  }
  fields.push(['Bar close', formatUtcTimestamp(alert.barTime)]);

  const html = [
    '<html><body style="font-family: Arial, sans-serif;">',
    `<h2>${alertEmoji(alert)} ${escapeHtml(pair)} ${escapeHtml(alert.timeframe)}</h2>`,
    '<table style="border-collapse: collapse; width: 100%;">',
    ...fields.map(([label, value]) => row(escapeHtml(label), escapeHtml(value))),
    '</table>',
    '<p style="color: red;"><b>Automated analysis, not financial advice.</b></p>',
    '</body></html>',
  ].join('\n');

  const text = [subject, '', ...fields.map(([label, value]) => `${label}: ${value}`)].join('\n');

  return { subject, text, html };
};

export const formatTestEmail = (pair: string): EmailContent => {
  const text = `Notifications for ${pair} are configured. You will receive an email when a signal fires.`;
  return {
    subject: `${pair} signals: test email`,
    text,
    html: `<p>${escapeHtml(text)}</p>`,
  };
};
