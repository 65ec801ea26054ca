import { computeRiskLevels } from './risk.calculator';
import { scoreSnapshot } from './scoring/scoring.engine';
import { resolveMinInterval, type SignalEngineConfig } from './signal-engine.config';
import type { SignalThrottle } from './signal-throttle';
import type { Decision, IndicatorSnapshot } from './types';

/**
 * One evaluation cycle: score, attach risk levels, consult the throttle.
 * Any failure propagates before the throttle is touched, so a failed cycle
 * leaves no trace.
 */
export class SignalOrchestrator {
  constructor(
    private readonly config: SignalEngineConfig,
    private readonly throttle: SignalThrottle,
  ) {}

  evaluate(snapshot: IndicatorSnapshot, pair: string, timeframe: string, now: number): Decision {
    const { config } = this;
    const result = scoreSnapshot(
      snapshot,
      config.weights,
      { signalThreshold: config.signalThreshold },
      config.scoring,
    );

    const riskLevels = computeRiskLevels(
      result.tier,
      snapshot.price,
      snapshot.volatility.atr,
      config.atrStopMultiplier,
      config.atrProfitMultiplier,
    );

    const base = {
      pair,
      timeframe,
      tier: result.tier,
      score: result.compositeScore,
      componentScores: result.componentScores,
      riskLevels,
      reasons: result.reasons,
      price: snapshot.price,
      barTime: snapshot.timestamp,
      timestamp: now,
    };

    if (result.tier === 'HOLD') {
      return { ...base, emitted: false, suppressedBy: 'HOLD' };
    }

    const emitted = this.throttle.tryEmit(pair, timeframe, result.tier, now, resolveMinInterval(config, timeframe));
    return { ...base, emitted, suppressedBy: emitted ? null : 'COOLDOWN' };
  }
}

export const evaluate = (
  snapshot: IndicatorSnapshot,
  pair: string,
  timeframe: string,
  now: number,
  config: SignalEngineConfig,
  throttle: SignalThrottle,
): Decision => new SignalOrchestrator(config, throttle).evaluate(snapshot, pair, timeframe, now);
