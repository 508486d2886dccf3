import { ProjectionMode, ScenarioKey } from '../../common/constants/parameter-bounds';

export interface ProjectionSeries {
  scenario: ScenarioKey;
  label: string;
  color: string;
  returnPct: number;
  values: number[]; // Portfolio value at month 1..N
}

export interface ProjectionResult {
  mode: ProjectionMode;
  title: string;
  xAxisTitle: string;
  yAxisTitle: string;
  initialPortfolio: number;
  months: number[];
  series: ProjectionSeries[];
}
