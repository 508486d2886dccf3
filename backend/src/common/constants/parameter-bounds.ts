export interface ParameterBounds {
  min: number;
  max: number;
  step: number;
}

export const PORTFOLIO_BOUNDS: ParameterBounds = { min: 1000, max: 1000000, step: 1000 };
export const RISK_PCT_BOUNDS: ParameterBounds = { min: 0.5, max: 5.0, step: 0.1 };
export const MAX_DRAWDOWN_PCT_BOUNDS: ParameterBounds = { min: 5.0, max: 50.0, step: 0.1 };
// Upper bound of the normal and worst sliders is the scenario above them
export const SCENARIO_PCT_BOUNDS: ParameterBounds = { min: 0, max: 100, step: 1 };
export const PRICE_BOUNDS: ParameterBounds = { min: 0.01, max: 10000000, step: 0.01 };
export const PROJECTION_MONTHS_BOUNDS: ParameterBounds = { min: 1, max: 120, step: 1 };

export const PROJECTION_MODES = ['linear', 'compound'] as const;
export type ProjectionMode = (typeof PROJECTION_MODES)[number];

export const SCENARIO_KEYS = ['best', 'normal', 'worst'] as const;
export type ScenarioKey = (typeof SCENARIO_KEYS)[number];
