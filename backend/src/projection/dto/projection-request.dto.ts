import { IsNumber, IsInt, IsIn, IsOptional, Min, Max } from 'class-validator';
import {
  PORTFOLIO_BOUNDS,
  PROJECTION_MODES,
  PROJECTION_MONTHS_BOUNDS,
  ProjectionMode,
  SCENARIO_PCT_BOUNDS,
} from '../../common/constants/parameter-bounds';

export class ProjectionRequestDto {
  @IsNumber()
  @Min(PORTFOLIO_BOUNDS.min)
  @Max(PORTFOLIO_BOUNDS.max)
  initialPortfolio!: number;

  @IsInt()
  @Min(SCENARIO_PCT_BOUNDS.min)
  @Max(SCENARIO_PCT_BOUNDS.max)
  bestCasePct!: number; // Monthly return, percentage

  @IsInt()
  @Min(SCENARIO_PCT_BOUNDS.min)
  @Max(SCENARIO_PCT_BOUNDS.max)
  normalCasePct!: number;

  @IsInt()
  @Min(SCENARIO_PCT_BOUNDS.min)
  @Max(SCENARIO_PCT_BOUNDS.max)
  worstCasePct!: number;

  @IsIn(PROJECTION_MODES)
  @IsOptional()
  mode?: ProjectionMode; // Default: PROJECTION_MODE

  @IsInt()
  @Min(PROJECTION_MONTHS_BOUNDS.min)
  @Max(PROJECTION_MONTHS_BOUNDS.max)
  @IsOptional()
  months?: number; // Default: PROJECTION_MONTHS
}
