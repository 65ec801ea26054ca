export * from './types';
export * from './errors';
export * from './indicators';
export * from './snapshot.schema';
export * from './snapshot.builder';
export * from './market-alerts';
export * from './scoring/types';
export * from './scoring/scoring.parameters';
export * from './scoring/scoring.engine';
export * from './scoring/trend.scorer';
export * from './scoring/momentum.scorer';
export * from './scoring/volatility.scorer';
export * from './scoring/volume.scorer';
export * from './scoring/support-resistance.scorer';
export * from './risk.calculator';
export * from './signal-throttle';
export * from './signal-engine.config';
export * from './signal-orchestrator';
export * from './signals.constants';
export * from './signals.module';
