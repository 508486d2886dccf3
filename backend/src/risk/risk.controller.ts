import { Controller, Post, Body, HttpCode } from '@nestjs/common';
import { RiskService } from './risk.service';
import { RiskRequestDto } from './dto/risk-request.dto';
import { RiskMetrics } from './dto/risk-metrics.dto';

@Controller('api/risk')
export class RiskController {
  constructor(private riskService: RiskService) {}

  @Post('metrics')
  @HttpCode(200)
  getMetrics(@Body() request: RiskRequestDto): RiskMetrics {
    return this.riskService.computeMetrics(request);
  }
}
