import { IsNumber, Min, Max } from 'class-validator';
import {
  MAX_DRAWDOWN_PCT_BOUNDS,
  PORTFOLIO_BOUNDS,
  RISK_PCT_BOUNDS,
} from '../../common/constants/parameter-bounds';

export class RiskRequestDto {
  @IsNumber()
  @Min(PORTFOLIO_BOUNDS.min)
  @Max(PORTFOLIO_BOUNDS.max)
  initialPortfolio!: number; // USD

  @IsNumber()
  @Min(RISK_PCT_BOUNDS.min)
  @Max(RISK_PCT_BOUNDS.max)
  riskPct!: number; // Percentage of the portfolio risked per trade

  @IsNumber()
  @Min(MAX_DRAWDOWN_PCT_BOUNDS.min)
  @Max(MAX_DRAWDOWN_PCT_BOUNDS.max)
  maxDrawdownPct!: number; // Estimated peak-to-trough decline (percentage)
}
