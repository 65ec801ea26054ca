import type { DecisionNotification, MarketAlertNotification } from '@libs/signals';

export const NOTIFICATION_CHANNELS = Symbol('NOTIFICATION_CHANNELS');

export interface NotificationChannel {
  readonly name: string;
  isEnabled(): boolean;
  send(notification: DecisionNotification): Promise<void>;
  sendAlert(notification: MarketAlertNotification): Promise<void>;
  sendTest(pair: string): Promise<void>;
}
