import type { DashboardParams } from './types';

export type ScenarioParam = 'bestCasePct' | 'normalCasePct' | 'worstCasePct';

export const SCENARIO_MIN = 0;
export const SCENARIO_MAX = 100;

export function clamp(n: number, min: number, max: number) {
  return Math.min(max, Math.max(min, n));
}

/**
 * Upper bound of a scenario slider: best is capped by the axis, normal by
 * best and worst by normal.
 */
export function scenarioSliderMax(key: ScenarioParam, params: DashboardParams): number {
  if (key === 'normalCasePct') return params.bestCasePct;
  if (key === 'worstCasePct') return params.normalCasePct;
  return SCENARIO_MAX;
}

export function clampScenarioParams(params: DashboardParams): DashboardParams {
  const bestCasePct = clamp(params.bestCasePct, SCENARIO_MIN, SCENARIO_MAX);
  const normalCasePct = clamp(params.normalCasePct, SCENARIO_MIN, bestCasePct);
  const worstCasePct = clamp(params.worstCasePct, SCENARIO_MIN, normalCasePct);
  return { ...params, bestCasePct, normalCasePct, worstCasePct };
}

/**
 * Moves one scenario slider. Lowering a scenario drags the ones below it down
 * with it; raising one never moves the others.
 */
export function applyScenarioChange(params: DashboardParams, key: ScenarioParam, value: number): DashboardParams {
  return clampScenarioParams({ ...params, [key]: Math.round(value) });
}
