import { describe, expect, it, vi } from 'vitest';
import {
  createSignalEngineConfig,
  evaluate,
  InvalidRiskInputError,
  InvalidSnapshotError,
  SignalOrchestrator,
  SignalThrottle,
} from '@libs/signals';
import { bullishSnapshot, neutralSnapshot } from './fixtures/snapshots';

const MINUTE = 60_000;
const T0 = Date.UTC(2024, 0, 1, 12, 0, 5);

// the bullish fixture scores -100 on volatility, so volatility alone reads STRONG_SELL
const volatilityOnly = createSignalEngineConfig({
  weights: { trend: 0, momentum: 0, volatility: 1, volume: 0, supportResistance: 0 },
});

describe('signal orchestrator', () => {
  it('emits a STRONG_BUY with risk levels and records it', () => {
    const throttle = new SignalThrottle();
    const orchestrator = new SignalOrchestrator(createSignalEngineConfig(), throttle);

    const decision = orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0);

    expect(decision).toMatchObject({
      pair: 'ETHUSDT',
      timeframe: '1h',
      tier: 'STRONG_BUY',
      emitted: true,
      suppressedBy: null,
      price: 2000,
      barTime: Date.UTC(2024, 0, 1, 12, 0, 0),
      timestamp: T0,
      riskLevels: { entryPrice: 2000, stopLoss: 1960, takeProfit: 2060, riskRewardRatio: 1.5 },
    });
    expect(decision.score).toBeCloseTo(66.5, 6);
    expect(throttle.get('ETHUSDT', '1h')).toEqual({ lastEmittedAt: T0, lastTier: 'STRONG_BUY' });
  });

  it('suppresses a repeat inside the cooldown but keeps its levels', () => {
    const throttle = new SignalThrottle();
    const orchestrator = new SignalOrchestrator(createSignalEngineConfig(), throttle);

    orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0);
    const repeat = orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0 + 10 * MINUTE);
    const later = orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0 + 30 * MINUTE);

    expect(repeat.emitted).toBe(false);
    expect(repeat.suppressedBy).toBe('COOLDOWN');
    expect(repeat.riskLevels).not.toBeNull();
    expect(later.emitted).toBe(true);
    expect(throttle.get('ETHUSDT', '1h')?.lastEmittedAt).toBe(T0 + 30 * MINUTE);
  });

  it('lets a reversal through during the cooldown', () => {
    const throttle = new SignalThrottle();
    const bullish = new SignalOrchestrator(createSignalEngineConfig(), throttle);
    const bearish = new SignalOrchestrator(volatilityOnly, throttle);

    bullish.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0);
    const reversal = bearish.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0 + MINUTE);

    expect(reversal.tier).toBe('STRONG_SELL');
    expect(reversal.emitted).toBe(true);
    expect(reversal.riskLevels).toEqual({
      entryPrice: 2000,
      stopLoss: 2040,
      takeProfit: 1940,
      riskRewardRatio: 1.5,
    });
  });

  it('marks HOLD as not emitted without consulting the throttle', () => {
    const throttle = new SignalThrottle();
    const tryEmit = vi.spyOn(throttle, 'tryEmit');
    const orchestrator = new SignalOrchestrator(createSignalEngineConfig(), throttle);

    const decision = orchestrator.evaluate(neutralSnapshot(), 'ETHUSDT', '1h', T0);

    expect(decision.tier).toBe('HOLD');
    expect(decision.emitted).toBe(false);
    expect(decision.suppressedBy).toBe('HOLD');
    expect(decision.riskLevels).toBeNull();
    expect(tryEmit).not.toHaveBeenCalled();
    expect(throttle.size).toBe(0);
  });

  it('applies a per-timeframe cooldown override', () => {
    const throttle = new SignalThrottle();
    const config = createSignalEngineConfig({ minSignalIntervalByTimeframe: { '4h': 240 * MINUTE } });
    const orchestrator = new SignalOrchestrator(config, throttle);

    orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '4h', T0);
    orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0);

    expect(orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '4h', T0 + 60 * MINUTE).emitted).toBe(false);
    expect(orchestrator.evaluate(bullishSnapshot(), 'ETHUSDT', '1h', T0 + 60 * MINUTE).emitted).toBe(true);
  });

  it('fails on an invalid snapshot and leaves the throttle untouched', () => {
    const throttle = new SignalThrottle();
    const orchestrator = new SignalOrchestrator(createSignalEngineConfig(), throttle);
    const snapshot = bullishSnapshot();
    snapshot.volume.vwap = Number.NaN;

    expect(() => orchestrator.evaluate(snapshot, 'ETHUSDT', '1h', T0)).toThrow(InvalidSnapshotError);
    expect(throttle.size).toBe(0);
  });

  it('fails when risk levels cannot be computed and leaves the throttle untouched', () => {
    const throttle = new SignalThrottle();
    const orchestrator = new SignalOrchestrator(createSignalEngineConfig(), throttle);
    const snapshot = bullishSnapshot();
    // still a BUY, but a 2 ATR stop lands on zero
    snapshot.volatility.atr = 1000;

    expect(() => orchestrator.evaluate(snapshot, 'ETHUSDT', '1h', T0)).toThrow(InvalidRiskInputError);
    expect(throttle.size).toBe(0);
  });

  it('exposes the same cycle as a function', () => {
    const throttle = new SignalThrottle();
    const decision = evaluate(bullishSnapshot(), 'ETHUSDT', '15m', T0, createSignalEngineConfig(), throttle);

    expect(decision.emitted).toBe(true);
    expect(throttle.get('ETHUSDT', '15m')?.lastTier).toBe('STRONG_BUY');
  });
});
