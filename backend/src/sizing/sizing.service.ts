import { Injectable } from '@nestjs/common';
import { LoggerService } from '../logger/logger.service';
import { RiskService } from '../risk/risk.service';
import { SizingRequestDto } from './dto/sizing-request.dto';
import { PositionSize, PositionSizeResult } from './dto/position-size.dto';

@Injectable()
export class SizingService {
  constructor(
    private riskService: RiskService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SizingService');
  }

  /**
   * Sizes a position so that a stop-loss hit costs exactly `riskAmount`.
   * Entry and stop at the same price leave nothing to size against.
   */
  calculatePositionSize(riskAmount: number, entryPrice: number, stopLossPrice: number): PositionSize {
    const priceDistance = entryPrice - stopLossPrice;
    const riskPerUnit = Math.abs(priceDistance);

    if (priceDistance === 0) {
      return {
        riskAmount,
        entryPrice,
        stopLossPrice,
        riskPerUnit,
        positionSize: null,
        totalValue: null,
        direction: null,
        unavailableReason: 'ENTRY_EQUALS_STOP',
      };
    }

    const positionSize = Math.abs(riskAmount / priceDistance);

    return {
      riskAmount,
      entryPrice,
      stopLossPrice,
      riskPerUnit,
      positionSize,
      totalValue: positionSize * entryPrice,
      direction: priceDistance > 0 ? 'long' : 'short',
      unavailableReason: null,
    };
  }

  size(request: SizingRequestDto): PositionSizeResult {
    const riskAmount = this.riskService.calculateRiskAmount(request.initialPortfolio, request.riskPct);
    const result = this.calculatePositionSize(riskAmount, request.entryPrice, request.stopLossPrice);

    if (result.unavailableReason) {
      this.logger.warn('Position size undefined', {
        reason: result.unavailableReason,
        entryPrice: request.entryPrice,
      });
    } else {
      this.logger.debug('Sized position', { positionSize: result.positionSize, direction: result.direction });
    }

    return {
      initialPortfolio: request.initialPortfolio,
      riskPct: request.riskPct,
      ...result,
    };
  }
}
