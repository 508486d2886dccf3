import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from '../logger/logger.service';
import {
  PROJECTION_MODES,
  PROJECTION_MONTHS_BOUNDS,
  ProjectionMode,
  SCENARIO_KEYS,
  ScenarioKey,
} from '../common/constants/parameter-bounds';
import { SCENARIO_LABELS, ScenarioReturns, clamp, clampScenarios } from '../common/utils/scenario.utils';
import { ProjectionRequestDto } from './dto/projection-request.dto';
import { ProjectionResult, ProjectionSeries } from './dto/projection-result.dto';

export const DEFAULT_PROJECTION_MONTHS = 12;
export const DEFAULT_PROJECTION_MODE: ProjectionMode = 'linear';

const SERIES_COLORS: Record<ScenarioKey, string> = {
  best: 'green',
  normal: 'blue',
  worst: 'red',
};

const isProjectionMode = (value: string): value is ProjectionMode =>
  PROJECTION_MODES.some((mode) => mode === value);

@Injectable()
export class ProjectionService {
  constructor(
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('ProjectionService');
  }

  monthRange(months: number): number[] {
    return Array.from({ length: months }, (_, i) => i + 1);
  }

  /**
   * Adds the same monthly gain, `portfolio * pct`, every month.
   */
  projectLinear(portfolio: number, returnPct: number, months: number): number[] {
    const monthlyGain = portfolio * (returnPct / 100);
    return this.monthRange(months).map((m) => portfolio + monthlyGain * m);
  }

  /**
   * Reinvests each month's return: `portfolio * (1 + pct)^m`.
   */
  projectCompound(portfolio: number, returnPct: number, months: number): number[] {
    const growth = 1 + returnPct / 100;
    return this.monthRange(months).map((m) => portfolio * Math.pow(growth, m));
  }

  getDefaultMonths(): number {
    const configured = parseInt(this.configService.get<string>('PROJECTION_MONTHS') || '', 10);
    if (isNaN(configured)) {
      return DEFAULT_PROJECTION_MONTHS;
    }
    return clamp(configured, PROJECTION_MONTHS_BOUNDS.min, PROJECTION_MONTHS_BOUNDS.max);
  }

  getDefaultMode(): ProjectionMode {
    const configured = (this.configService.get<string>('PROJECTION_MODE') || '').trim().toLowerCase();
    return isProjectionMode(configured) ? configured : DEFAULT_PROJECTION_MODE;
  }

  buildProjection(
    initialPortfolio: number,
    scenarios: ScenarioReturns,
    mode: ProjectionMode = this.getDefaultMode(),
    months: number = this.getDefaultMonths(),
  ): ProjectionResult {
    const project = mode === 'compound' ? this.projectCompound.bind(this) : this.projectLinear.bind(this);

    const series: ProjectionSeries[] = SCENARIO_KEYS.map((key) => ({
      scenario: key,
      label: SCENARIO_LABELS[key],
      color: SERIES_COLORS[key],
      returnPct: scenarios[key],
      values: project(initialPortfolio, scenarios[key], months),
    }));

    this.logger.debug('Built portfolio projection', { mode, months, initialPortfolio });

    return {
      mode,
      title: `${months}-Month Portfolio Projection (${mode === 'compound' ? 'Compound' : 'Linear'})`,
      xAxisTitle: 'Months',
      yAxisTitle: 'Portfolio Value (USD)',
      initialPortfolio,
      months: this.monthRange(months),
      series,
    };
  }

  project(request: ProjectionRequestDto): ProjectionResult {
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

    return this.buildProjection(request.initialPortfolio, scenarios, request.mode, request.months);
  }
}
