import { IsNumber, IsInt, IsIn, IsOptional, Min, Max } from 'class-validator';
import {
  MAX_DRAWDOWN_PCT_BOUNDS,
  PORTFOLIO_BOUNDS,
  PROJECTION_MODES,
  PROJECTION_MONTHS_BOUNDS,
  ProjectionMode,
  RISK_PCT_BOUNDS,
  SCENARIO_PCT_BOUNDS,
} from '../../common/constants/parameter-bounds';

export class DashboardRequestDto {
  @IsNumber()
  @Min(PORTFOLIO_BOUNDS.min)
  @Max(PORTFOLIO_BOUNDS.max)
  initialPortfolio!: number;

  @IsNumber()
  @Min(RISK_PCT_BOUNDS.min)
  @Max(RISK_PCT_BOUNDS.max)
  riskPct!: number;

  @IsNumber()
  @Min(MAX_DRAWDOWN_PCT_BOUNDS.min)
  @Max(MAX_DRAWDOWN_PCT_BOUNDS.max)
  maxDrawdownPct!: number;

  @IsInt()
  @Min(SCENARIO_PCT_BOUNDS.min)
  @Max(SCENARIO_PCT_BOUNDS.max)
  bestCasePct!: number;

  @IsInt()
  @Min(SCENARIO_PCT_BOUNDS.min)
  @Max(SCENARIO_PCT_BOUNDS.max)
  normalCasePct!: number; // Clamped to bestCasePct

  @IsInt()
  @Min(SCENARIO_PCT_BOUNDS.min)
  @Max(SCENARIO_PCT_BOUNDS.max)
  worstCasePct!: number; // Clamped to normalCasePct

  @IsIn(PROJECTION_MODES)
  @IsOptional()
  projectionMode?: ProjectionMode;

  @IsInt()
  @Min(PROJECTION_MONTHS_BOUNDS.min)
  @Max(PROJECTION_MONTHS_BOUNDS.max)
  @IsOptional()
  projectionMonths?: number;
}
