import { type Tier, tierDirection } from './types';

export interface ThrottleEntry {
  lastEmittedAt: number;
  lastTier: Tier;
}

const throttleKey = (pair: string, timeframe: string): string => `${pair}|${timeframe}`;

/**
 * Per (pair, timeframe) cooldown for non-HOLD signals. State lives only as
 * long as the instance; a restart starts every key idle.
 *
 * A direction flip (long <-> short) always passes, cooldown or not.
 */
export class SignalThrottle {
  private readonly state = new Map<string, ThrottleEntry>();

  shouldEmit(pair: string, timeframe: string, tier: Tier, now: number, minIntervalMs: number): boolean {
    const direction = tierDirection(tier);
    if (direction === 'FLAT') {
      return true;
    }

    const entry = this.state.get(throttleKey(pair, timeframe));
    if (!entry) {
      return true;
    }

    if (tierDirection(entry.lastTier) !== direction) {
      return true;
    }

    return now - entry.lastEmittedAt >= minIntervalMs;
  }

  record(pair: string, timeframe: string, tier: Tier, now: number): void {
    if (tierDirection(tier) === 'FLAT') {
      return;
    }
    this.state.set(throttleKey(pair, timeframe), { lastEmittedAt: now, lastTier: tier });
  }

  /**
   * Check and record in one synchronous step, so two cycles for the same key
   * cannot both observe an idle key.
   */
  tryEmit(pair: string, timeframe: string, tier: Tier, now: number, minIntervalMs: number): boolean {
    if (!this.shouldEmit(pair, timeframe, tier, now, minIntervalMs)) {
      return false;
    }
    this.record(pair, timeframe, tier, now);
    return true;
  }

  get(pair: string, timeframe: string): ThrottleEntry | undefined {
    const entry = this.state.get(throttleKey(pair, timeframe));
    return entry ? { ...entry } : undefined;
  }

  get size(): number {
    return this.state.size;
  }

  clear(): void {
    this.state.clear();
  }
}
