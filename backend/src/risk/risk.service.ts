import { Injectable } from '@nestjs/common';
import { LoggerService } from '../logger/logger.service';
import { RiskRequestDto } from './dto/risk-request.dto';
import { RiskMetrics } from './dto/risk-metrics.dto';

// Absorbs float noise such as 49.99999999999999 before flooring a trade count
const FLOOR_EPSILON = 1e-9;

@Injectable()
export class RiskService {
  constructor(private logger: LoggerService) {
    this.logger.setContext('RiskService');
  }

  calculateRiskAmount(portfolio: number, riskPct: number): number {
    return portfolio * (riskPct / 100);
  }

  calculateMaxLoss(portfolio: number, maxDrawdownPct: number): number {
    return portfolio * (maxDrawdownPct / 100);
  }

  calculateRemainingPortfolio(portfolio: number, maxLoss: number): number {
    return portfolio - maxLoss;
  }

  /**
   * How many trades of `riskAmount` the portfolio can carry. Null when the risk
   * amount is zero or not a finite number.
   */
  calculateMaxTrades(portfolio: number, riskAmount: number): number | null {
    if (!Number.isFinite(riskAmount) || riskAmount === 0) {
      return null;
    }
    return portfolio / riskAmount;
  }

  floorTrades(maxTrades: number | null): number | null {
    return maxTrades === null ? null : Math.floor(maxTrades + FLOOR_EPSILON);
  }

  calculateAverageTradeSize(portfolio: number, maxTrades: number | null): number | null {
    if (maxTrades === null || maxTrades === 0) {
      return null;
    }
    return portfolio / maxTrades;
  }

  computeMetrics(request: RiskRequestDto): RiskMetrics {
    const { initialPortfolio, riskPct, maxDrawdownPct } = request;

    const riskAmount = this.calculateRiskAmount(initialPortfolio, riskPct);
    const maxLoss = this.calculateMaxLoss(initialPortfolio, maxDrawdownPct);
    const remainingPortfolio = this.calculateRemainingPortfolio(initialPortfolio, maxLoss);
    const maxTrades = this.calculateMaxTrades(initialPortfolio, riskAmount);

    if (maxTrades === null) {
      this.logger.warn('Max trades undefined for a zero risk amount', { initialPortfolio, riskPct });
    }

    const metrics: RiskMetrics = {
      initialPortfolio,
      riskPct,
      maxDrawdownPct,
      riskAmount,
      maxLoss,
      remainingPortfolio,
      maxTrades,
      maxTradesDisplay: this.floorTrades(maxTrades),
      averageTradeSize: this.calculateAverageTradeSize(initialPortfolio, maxTrades),
    };

    this.logger.debug('Computed risk metrics', { riskAmount, maxLoss, maxTrades: metrics.maxTradesDisplay });
    return metrics;
  }
}
