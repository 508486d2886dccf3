import { IsNumber, Min, Max } from 'class-validator';
import { PORTFOLIO_BOUNDS, PRICE_BOUNDS, RISK_PCT_BOUNDS } from '../../common/constants/parameter-bounds';

export class SizingRequestDto {
  @IsNumber()
  @Min(PORTFOLIO_BOUNDS.min)
  @Max(PORTFOLIO_BOUNDS.max)
  initialPortfolio!: number;

  @IsNumber()
  @Min(RISK_PCT_BOUNDS.min)
  @Max(RISK_PCT_BOUNDS.max)
  riskPct!: number;

  @IsNumber()
  @Min(PRICE_BOUNDS.min)
  @Max(PRICE_BOUNDS.max)
  entryPrice!: number;

  @IsNumber()
  @Min(PRICE_BOUNDS.min)
  @Max(PRICE_BOUNDS.max)
  stopLossPrice!: number;
}
