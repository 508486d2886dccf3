export type ProjectionMode = 'linear' | 'compound';
export type ScenarioKey = 'best' | 'normal' | 'worst';

export interface DashboardParams {
  initialPortfolio: number;
  riskPct: number;
  maxDrawdownPct: number;
  bestCasePct: number;
  normalCasePct: number;
  worstCasePct: number;
}

export type ParameterKey = keyof DashboardParams | 'entryPrice' | 'stopLossPrice';

export interface ParameterDefinition {
  key: ParameterKey;
  label: string;
  unit: 'USD' | '%';
  min: number;
  max: number;
  step: number;
  defaultValue: number;
  maxFrom?: ParameterKey;
}

export interface ParameterDefinitions {
  parameters: ParameterDefinition[];
  projection: {
    mode: ProjectionMode;
    months: number;
    monthsBounds: { min: number; max: number; step: number };
  };
}

export interface RiskMetrics {
  initialPortfolio: number;
  riskPct: number;
  maxDrawdownPct: number;
  riskAmount: number;
  maxLoss: number;
  remainingPortfolio: number;
  maxTrades: number | null;
  maxTradesDisplay: number | null;
  averageTradeSize: number | null;
}

export interface GaugeBand {
  from: number;
  to: number;
  color: string;
}

export interface GaugeSpec {
  key: ScenarioKey;
  title: string;
  value: number;
  axis: [number, number];
  barColor: string;
  bands: GaugeBand[];
}

export interface ProjectionSeries {
  scenario: ScenarioKey;
  label: string;
  color: string;
  returnPct: number;
  values: number[];
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

export interface DashboardResult {
  parameters: DashboardParams;
  scenariosAdjusted: boolean;
  metrics: RiskMetrics;
  gauges: GaugeSpec[];
  projection: ProjectionResult;
}

export interface SizingParams {
  initialPortfolio: number;
  riskPct: number;
  entryPrice: number;
  stopLossPrice: number;
}

export interface PositionSizeResult extends SizingParams {
  riskAmount: number;
  riskPerUnit: number;
  positionSize: number | null;
  totalValue: number | null;
  direction: 'long' | 'short' | null;
  unavailableReason: 'ENTRY_EQUALS_STOP' | null;
}
