import { Injectable, BadRequestException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggerService } from '../logger/logger.service';
import {
  MAX_DRAWDOWN_PCT_BOUNDS,
  ParameterBounds,
  PORTFOLIO_BOUNDS,
  PRICE_BOUNDS,
  ProjectionMode,
  PROJECTION_MONTHS_BOUNDS,
  RISK_PCT_BOUNDS,
  SCENARIO_PCT_BOUNDS,
} from '../common/constants/parameter-bounds';
import { clamp, clampScenarios } from '../common/utils/scenario.utils';
import { ProjectionService } from '../projection/projection.service';

export type ParameterKey =
  | 'initialPortfolio'
  | 'riskPct'
  | 'maxDrawdownPct'
  | 'bestCasePct'
  | 'normalCasePct'
  | 'worstCasePct'
  | 'entryPrice'
  | 'stopLossPrice';

export interface ParameterDefinition extends ParameterBounds {
  key: ParameterKey;
  label: string;
  unit: 'USD' | '%';
  defaultValue: number;
  // Key of the parameter whose value caps this one
  maxFrom?: ParameterKey;
}

export interface ParameterDefinitions {
  parameters: ParameterDefinition[];
  projection: {
    mode: ProjectionMode;
    months: number;
    monthsBounds: ParameterBounds;
  };
}

interface SettingDefault {
  value: string;
  description: string;
}

@Injectable()
export class ParametersService {
  private readonly defaultSettings: Record<string, SettingDefault> = {
    DEFAULT_PORTFOLIO_USD: { value: '75000', description: 'Initial portfolio in USD' },
    DEFAULT_RISK_PCT: { value: '2.0', description: 'Risk per trade (%)' },
    DEFAULT_MAX_DRAWDOWN_PCT: { value: '32.6', description: 'Estimated max drawdown (%)' },
    DEFAULT_BEST_CASE_PCT: { value: '66', description: 'Best case monthly return (%)' },
    DEFAULT_NORMAL_CASE_PCT: { value: '32', description: 'Normal case monthly return (%)' },
    DEFAULT_WORST_CASE_PCT: { value: '21', description: 'Worst case monthly return (%)' },
    DEFAULT_ENTRY_PRICE: { value: '100', description: 'Entry price for position sizing' },
    DEFAULT_STOP_LOSS_PRICE: { value: '95', description: 'Stop-loss price for position sizing' },
  };

  constructor(
    private configService: ConfigService,
    private projectionService: ProjectionService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('ParametersService');
  }

  /**
   * Get a setting value from the environment, falling back to the default
   */
  getSetting(key: string): string {
    const envValue = this.configService.get<string>(key);
    if (envValue) {
      return envValue;
    }

    const defaultValue = this.defaultSettings[key];
    if (defaultValue) {
      return defaultValue.value;
    }

    throw new BadRequestException(`Unknown setting key: ${key}`);
  }

  /**
   * Get setting as number, clamped into `bounds`. A malformed value falls back
   * to the built-in default.
   */
  getSettingNumber(key: string, bounds: ParameterBounds): number {
    const value = this.getSetting(key);
    let num = parseFloat(value);
    if (isNaN(num)) {
      const fallback = this.defaultSettings[key].value;
      this.logger.warn(`Setting ${key} is not a valid number: ${value}, using ${fallback}`);
      num = parseFloat(fallback);
    }
    return clamp(num, bounds.min, bounds.max);
  }

  getDefinitions(): ParameterDefinitions {
    const scenarios = clampScenarios({
      best: Math.round(this.getSettingNumber('DEFAULT_BEST_CASE_PCT', SCENARIO_PCT_BOUNDS)),
      normal: Math.round(this.getSettingNumber('DEFAULT_NORMAL_CASE_PCT', SCENARIO_PCT_BOUNDS)),
      worst: Math.round(this.getSettingNumber('DEFAULT_WORST_CASE_PCT', SCENARIO_PCT_BOUNDS)),
    });
    if (scenarios.adjusted) {
      this.logger.warn('Configured scenario defaults were out of order and have been clamped', {
        best: scenarios.best,
        normal: scenarios.normal,
        worst: scenarios.worst,
      });
    }

    const parameters: ParameterDefinition[] = [
      {
        key: 'initialPortfolio',
        label: 'Initial Portfolio (USD)',
        unit: 'USD',
        ...PORTFOLIO_BOUNDS,
        defaultValue: this.getSettingNumber('DEFAULT_PORTFOLIO_USD', PORTFOLIO_BOUNDS),
      },
      {
        key: 'riskPct',
        label: 'Risk Per Trade (%)',
        unit: '%',
        ...RISK_PCT_BOUNDS,
        defaultValue: this.getSettingNumber('DEFAULT_RISK_PCT', RISK_PCT_BOUNDS),
      },
      {
        key: 'maxDrawdownPct',
        label: 'Estimated Max Drawdown (%)',
        unit: '%',
        ...MAX_DRAWDOWN_PCT_BOUNDS,
        defaultValue: this.getSettingNumber('DEFAULT_MAX_DRAWDOWN_PCT', MAX_DRAWDOWN_PCT_BOUNDS),
      },
      {
        key: 'bestCasePct',
        label: 'Best Case Return (%)',
        unit: '%',
        ...SCENARIO_PCT_BOUNDS,
        defaultValue: scenarios.best,
      },
      {
        key: 'normalCasePct',
        label: 'Normal Case Return (%)',
        unit: '%',
        ...SCENARIO_PCT_BOUNDS,
        defaultValue: scenarios.normal,
        maxFrom: 'bestCasePct',
      },
      {
        key: 'worstCasePct',
        label: 'Worst Case Return (%)',
        unit: '%',
        ...SCENARIO_PCT_BOUNDS,
        defaultValue: scenarios.worst,
        maxFrom: 'normalCasePct',
      },
      {
        key: 'entryPrice',
        label: 'Entry Price (USD)',
        unit: 'USD',
        ...PRICE_BOUNDS,
        defaultValue: this.getSettingNumber('DEFAULT_ENTRY_PRICE', PRICE_BOUNDS),
      },
      {
        key: 'stopLossPrice',
        label: 'Stop-Loss Price (USD)',
        unit: 'USD',
        ...PRICE_BOUNDS,
        defaultValue: this.getSettingNumber('DEFAULT_STOP_LOSS_PRICE', PRICE_BOUNDS),
      },
    ];

    return {
      parameters,
      projection: {
        mode: this.projectionService.getDefaultMode(),
        months: this.projectionService.getDefaultMonths(),
        monthsBounds: PROJECTION_MONTHS_BOUNDS,
      },
    };
  }
}
