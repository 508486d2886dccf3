import { ScenarioKey } from '../../common/constants/parameter-bounds';
import { RiskMetrics } from '../../risk/dto/risk-metrics.dto';
import { ProjectionResult } from '../../projection/dto/projection-result.dto';

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

export interface DashboardResult {
  parameters: {
    initialPortfolio: number;
    riskPct: number;
    maxDrawdownPct: number;
    bestCasePct: number;
    normalCasePct: number;
    worstCasePct: number;
  };
  scenariosAdjusted: boolean;
  metrics: RiskMetrics;
  gauges: GaugeSpec[];
  projection: ProjectionResult;
}
