/**
 * Curve shapes used by the dimension scorers. Defaults are a starting point
 * and every field can be overridden from configuration.
 */
export interface ScoringParameters {
  trend: {
    maWeight: number;
    macdWeight: number;
    macdSlopeDisagreementFactor: number;
    adxFloor: number;
    adxCeiling: number;
    adxMinFactor: number;
    adxMaxFactor: number;
  };
  momentum: {
    rsiOverbought: number;
    rsiOversold: number;
    rsiExtremeBoost: number;
    cciScale: number;
    rsiWeight: number;
    stochasticWeight: number;
    cciWeight: number;
    williamsWeight: number;
  };
  volatility: {
    bollingerWeight: number;
    keltnerWeight: number;
    squeezeWidth: number;
    squeezeDampening: number;
  };
  volume: {
    obvWeight: number;
    vwapWeight: number;
    divergenceWeight: number;
    vwapScale: number;
    volumeRatioFloor: number;
    volumeRatioCap: number;
  };
  supportResistance: {
    pivotRangeAtr: number;
    proximityAtr: number;
  };
}

export const DEFAULT_SCORING_PARAMETERS: ScoringParameters = {
  trend: {
    maWeight: 0.6,
    macdWeight: 0.4,
    macdSlopeDisagreementFactor: 0.5,
    adxFloor: 20,
    adxCeiling: 40,
    adxMinFactor: 0.3,
    adxMaxFactor: 1.2,
  },
  momentum: {
    rsiOverbought: 70,
    rsiOversold: 30,
    rsiExtremeBoost: 1.5,
    cciScale: 100,
    rsiWeight: 0.4,
    stochasticWeight: 0.2,
    cciWeight: 0.2,
    williamsWeight: 0.2,
  },
  volatility: {
    bollingerWeight: 0.6,
    keltnerWeight: 0.4,
    squeezeWidth: 0.02,
    squeezeDampening: 0.5,
  },
  volume: {
    obvWeight: 0.7,
    vwapWeight: 0.3,
    divergenceWeight: 0.6,
    vwapScale: 0.01,
    volumeRatioFloor: 0.5,
    volumeRatioCap: 2,
  },
  supportResistance: {
    pivotRangeAtr: 2,
    proximityAtr: 0.5,
  },
};

export type ScoringParametersOverrides = {
  [K in keyof ScoringParameters]?: Partial<ScoringParameters[K]>;
};

export const mergeScoringParameters = (
  overrides: ScoringParametersOverrides = {},
  base: ScoringParameters = DEFAULT_SCORING_PARAMETERS,
): ScoringParameters => ({
  trend: { ...base.trend, ...overrides.trend },
  momentum: { ...base.momentum, ...overrides.momentum },
  volatility: { ...base.volatility, ...overrides.volatility },
  volume: { ...base.volume, ...overrides.volume },
  supportResistance: { ...base.supportResistance, ...overrides.supportResistance },
});
