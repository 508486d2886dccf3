import { Test, TestingModule } from '@nestjs/testing';
import { HealthService } from './health.service';
import { ParametersService } from '../parameters/parameters.service';

describe('HealthService', () => {
  let service: HealthService;
  let parametersService: { getDefinitions: jest.Mock };

  beforeEach(async () => {
    parametersService = {
      getDefinitions: jest.fn().mockReturnValue({ parameters: [] }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HealthService,
        {
          provide: ParametersService,
          useValue: parametersService,
        },
      ],
    }).compile();

    service = module.get<HealthService>(HealthService);
  });

  it('should be healthy when the configuration resolves', () => {
    const health = service.checkHealth();

    expect(health.status).toBe('healthy');
    expect(health.checks.configuration.status).toBe('up');
    expect(health.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should be degraded when the configuration cannot be resolved', () => {
    parametersService.getDefinitions.mockImplementation(() => {
      throw new Error('Unknown setting key: DEFAULT_LEVERAGE');
    });

    const health = service.checkHealth();

    expect(health.status).toBe('degraded');
    expect(health.checks.configuration).toEqual({
      status: 'down',
      error: 'Unknown setting key: DEFAULT_LEVERAGE',
    });
  });

  it('should expose prometheus gauges', () => {
    const lines = service.getPrometheusMetrics().split('\n');

    expect(lines).toContain('strategy_dashboard_health_status{status="healthy"} 1');
    expect(lines).toContain('strategy_dashboard_configuration_status 1');
    expect(lines).toContain('# TYPE strategy_dashboard_uptime_seconds gauge');
  });
});
