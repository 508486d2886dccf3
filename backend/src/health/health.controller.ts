import { Controller, Get, Header } from '@nestjs/common';
import { HealthService, HealthCheckResult } from './health.service';

@Controller('api/health')
export class HealthController {
  constructor(private healthService: HealthService) {}

  @Get()
  getHealth(): HealthCheckResult {
    return this.healthService.checkHealth();
  }

  @Get('metrics/prometheus')
  @Header('Content-Type', 'text/plain')
  getPrometheusMetrics(): string {
    return this.healthService.getPrometheusMetrics();
  }
}
