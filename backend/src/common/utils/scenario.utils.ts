import { SCENARIO_PCT_BOUNDS, ScenarioKey } from '../constants/parameter-bounds';

export type ScenarioReturns = Record<ScenarioKey, number>;

export interface ClampedScenarios extends ScenarioReturns {
  adjusted: boolean;
}

export const SCENARIO_LABELS: Record<ScenarioKey, string> = {
  best: 'Best Case',
  normal: 'Normal Case',
  worst: 'Worst Case',
};

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/**
 * Clamps best into the scenario range, then normal under best and worst under
 * normal, so the result always satisfies 0 <= worst <= normal <= best <= 100.
 */
export const clampScenarios = (scenarios: ScenarioReturns): ClampedScenarios => {
  const best = clamp(scenarios.best, SCENARIO_PCT_BOUNDS.min, SCENARIO_PCT_BOUNDS.max);
  const normal = clamp(scenarios.normal, SCENARIO_PCT_BOUNDS.min, best);
  const worst = clamp(scenarios.worst, SCENARIO_PCT_BOUNDS.min, normal);

  return {
    best,
    normal,
    worst,
    adjusted: best !== scenarios.best || normal !== scenarios.normal || worst !== scenarios.worst,
  };
};
