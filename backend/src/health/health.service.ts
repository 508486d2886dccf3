import { Injectable } from '@nestjs/common';
import { ParametersService } from '../parameters/parameters.service';

export interface HealthCheckResult {
  status: 'healthy' | 'unhealthy' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    configuration: {
      status: 'up' | 'down';
      responseTime?: number;
      error?: string;
    };
  };
  memory: {
    rssBytes: number;
    heapUsedBytes: number;
  };
}

@Injectable()
export class HealthService {
  private startTime: number;

  constructor(private parametersService: ParametersService) {
    this.startTime = Date.now();
  }

  checkHealth(): HealthCheckResult {
    const configuration = this.checkConfiguration();
    const { rss, heapUsed } = process.memoryUsage();

    return {
      status: configuration.status === 'up' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000), // seconds
      checks: { configuration },
      memory: {
        rssBytes: rss,
        heapUsedBytes: heapUsed,
      },
    };
  }

  /**
   * Resolves the dashboard defaults the same way a page load does.
   */
  private checkConfiguration(): { status: 'up' | 'down'; responseTime?: number; error?: string } {
    try {
      const start = Date.now();
      this.parametersService.getDefinitions();
      return {
        status: 'up',
        responseTime: Date.now() - start,
      };
    } catch (error: unknown) {
      return {
        status: 'down',
        error: error instanceof Error ? error.message : 'Configuration could not be resolved',
      };
    }
  }

  getPrometheusMetrics(): string {
    const health = this.checkHealth();

    const metrics: string[] = [];

    // Health status (1 = healthy, 0 = unhealthy/degraded)
    metrics.push(`# HELP strategy_dashboard_health_status Health status of the application (1 = healthy, 0 = unhealthy)`);
    metrics.push(`# TYPE strategy_dashboard_health_status gauge`);
    metrics.push(`strategy_dashboard_health_status{status="${health.status}"} ${health.status === 'healthy' ? 1 : 0}`);

    metrics.push(`# HELP strategy_dashboard_uptime_seconds Application uptime in seconds`);
    metrics.push(`# TYPE strategy_dashboard_uptime_seconds gauge`);
    metrics.push(`strategy_dashboard_uptime_seconds ${health.uptime}`);

    metrics.push(`# HELP strategy_dashboard_configuration_status Configuration status (1 = up, 0 = down)`);
    metrics.push(`# TYPE strategy_dashboard_configuration_status gauge`);
    metrics.push(`strategy_dashboard_configuration_status ${health.checks.configuration.status === 'up' ? 1 : 0}`);

    metrics.push(`# HELP strategy_dashboard_heap_used_bytes V8 heap in use`);
    metrics.push(`# TYPE strategy_dashboard_heap_used_bytes gauge`);
    metrics.push(`strategy_dashboard_heap_used_bytes ${health.memory.heapUsedBytes}`);

    return metrics.join('\n') + '\n';
  }
}
