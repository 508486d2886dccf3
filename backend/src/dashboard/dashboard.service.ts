import { Injectable } from '@nestjs/common';
import { LoggerService } from '../logger/logger.service';
import { RiskService } from '../risk/risk.service';
import { ProjectionService } from '../projection/projection.service';
import { SCENARIO_KEYS, SCENARIO_PCT_BOUNDS } from '../common/constants/parameter-bounds';
import { SCENARIO_LABELS, ScenarioReturns, clampScenarios } from '../common/utils/scenario.utils';
import { DashboardRequestDto } from './dto/dashboard-request.dto';
import { DashboardResult, GaugeSpec } from './dto/dashboard-result.dto';

export const GAUGE_BAR_COLOR = 'darkblue';

@Injectable()
export class DashboardService {
  constructor(
    private riskService: RiskService,
    private projectionService: ProjectionService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('DashboardService');
  }

  /**
   * One gauge per scenario, all sharing the same bands: worst, normal and
   * best shade the ranges up to each scenario's return.
   */
  buildGauges(scenarios: ScenarioReturns): GaugeSpec[] {
    const bands = [
      { from: SCENARIO_PCT_BOUNDS.min, to: scenarios.worst, color: 'lightgray' },
      { from: scenarios.worst, to: scenarios.normal, color: 'gray' },
      { from: scenarios.normal, to: scenarios.best, color: 'lightblue' },
    ];

    return SCENARIO_KEYS.map((key): GaugeSpec => ({
      key,
      title: SCENARIO_LABELS[key],
      value: scenarios[key],
      axis: [SCENARIO_PCT_BOUNDS.min, SCENARIO_PCT_BOUNDS.max],
      barColor: GAUGE_BAR_COLOR,
      bands: bands.map((band) => ({ ...band })),
    }));
  }

  build(request: DashboardRequestDto): DashboardResult {
    const scenarios = clampScenarios({
      best: request.bestCasePct,
      normal: request.normalCasePct,
      worst: request.worstCasePct,
    });
    if (scenarios.adjusted) {
      this.logger.warn('Scenario returns were out of order and have been clamped', {
        requested: [request.bestCasePct, request.normalCasePct, request.worstCasePct],
        clamped: [scenarios.best, scenarios.normal, scenarios.worst],
      });
    }

    const metrics = this.riskService.computeMetrics(request);
    const projection = this.projectionService.buildProjection(
      request.initialPortfolio,
      scenarios,
      request.projectionMode,
      request.projectionMonths,
    );

    return {
      parameters: {
        initialPortfolio: request.initialPortfolio,
        riskPct: request.riskPct,
        maxDrawdownPct: request.maxDrawdownPct,
        bestCasePct: scenarios.best,
        normalCasePct: scenarios.normal,
        worstCasePct: scenarios.worst,
      },
      scenariosAdjusted: scenarios.adjusted,
      metrics,
      gauges: this.buildGauges(scenarios),
      projection,
    };
  }
}
