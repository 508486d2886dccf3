import type { ProjectionResult, ScenarioKey } from './types';

export type ProjectionRow = { month: number } & Partial<Record<ScenarioKey, number>>;

const LINE_COLORS: Record<string, string> = {
  green: '#4ade80',
  blue: '#3b82f6',
  red: '#f5576c',
};

export function lineColor(color: string): string {
  return LINE_COLORS[color] ?? color;
}

/**
 * Pivots the per-scenario series into one row per month for recharts.
 */
export function toProjectionRows(projection: ProjectionResult): ProjectionRow[] {
  return projection.months.map((month, i) => {
    const row: ProjectionRow = { month };
    for (const series of projection.series) {
      row[series.scenario] = series.values[i];
    }
    return row;
  });
}
