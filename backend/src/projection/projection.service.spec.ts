import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ProjectionService } from './projection.service';
import { LoggerService } from '../logger/logger.service';

describe('ProjectionService', () => {
  let service: ProjectionService;
  let configService: { get: jest.Mock };
  let logger: { setContext: jest.Mock; log: jest.Mock; warn: jest.Mock; debug: jest.Mock; error: jest.Mock };

  beforeEach(async () => {
    configService = {
      get: jest.fn().mockReturnValue(undefined),
    };

    logger = {
      setContext: jest.fn(),
      log: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProjectionService,
        {
          provide: ConfigService,
          useValue: configService,
        },
        {
          provide: LoggerService,
          useValue: logger,
        },
      ],
    }).compile();

    service = module.get<ProjectionService>(ProjectionService);
  });

  describe('projectLinear', () => {
    it('should add the same monthly gain each month', () => {
      const values = service.projectLinear(75000, 66, 12);

      expect(values).toHaveLength(12);
      expect(values[0]).toBeCloseTo(124500, 2);
      expect(values[1]).toBeCloseTo(174000, 2);
      expect(values[11]).toBeCloseTo(669000, 2);
    });

    it('should stay flat at a zero return', () => {
      expect(service.projectLinear(75000, 0, 3)).toEqual([75000, 75000, 75000]);
    });
  });

  describe('projectCompound', () => {
    it('should reinvest each month', () => {
      const values = service.projectCompound(75000, 66, 3);

      expect(values[0]).toBeCloseTo(124500, 2);
      expect(values[1]).toBeCloseTo(206670, 2);
      expect(values[2]).toBeCloseTo(343072.2, 2);
    });

    it('should match the linear projection at month 1 and exceed it afterwards', () => {
      const linear = service.projectLinear(75000, 32, 12);
      const compound = service.projectCompound(75000, 32, 12);

      expect(compound[0]).toBeCloseTo(linear[0], 6);
      for (let i = 1; i < 12; i++) {
        expect(compound[i]).toBeGreaterThan(linear[i]);
      }
    });
  });

  describe('buildProjection', () => {
    it('should build one series per scenario with the configured defaults', () => {
      const result = service.buildProjection(75000, { best: 66, normal: 32, worst: 21 });

      expect(result.mode).toBe('linear');
      expect(result.title).toBe('12-Month Portfolio Projection (Linear)');
      expect(result.months).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
      expect(result.series.map((s) => [s.scenario, s.label, s.color])).toEqual([
        ['best', 'Best Case', 'green'],
        ['normal', 'Normal Case', 'blue'],
        ['worst', 'Worst Case', 'red'],
      ]);
      expect(result.series[1].values[0]).toBeCloseTo(99000, 2);
      expect(result.series[2].values[0]).toBeCloseTo(90750, 2);
    });

    it('should honour a configured mode and horizon', () => {
      configService.get.mockImplementation((key: string) => {
        if (key === 'PROJECTION_MODE') return 'Compound';
        if (key === 'PROJECTION_MONTHS') return '24';
        return undefined;
      });

      const result = service.buildProjection(75000, { best: 10, normal: 5, worst: 0 });

      expect(result.mode).toBe('compound');
      expect(result.title).toBe('24-Month Portfolio Projection (Compound)');
      expect(result.months).toHaveLength(24);
    });

    it('should fall back to the defaults for unusable configuration', () => {
      configService.get.mockImplementation((key: string) => {
        if (key === 'PROJECTION_MODE') return 'exponential';
        if (key === 'PROJECTION_MONTHS') return 'twelve';
        return undefined;
      });

      expect(service.getDefaultMode()).toBe('linear');
      expect(service.getDefaultMonths()).toBe(12);
    });

    it('should clamp a configured horizon into range', () => {
      configService.get.mockImplementation((key: string) => (key === 'PROJECTION_MONTHS' ? '500' : undefined));

      expect(service.getDefaultMonths()).toBe(120);
    });
  });

  describe('project', () => {
    it('should clamp out-of-order scenarios and warn', () => {
      const result = service.project({
        initialPortfolio: 75000,
        bestCasePct: 20,
        normalCasePct: 40,
        worstCasePct: 10,
        mode: 'compound',
        months: 2,
      });

      expect(result.series.map((s) => s.returnPct)).toEqual([20, 20, 10]);
      expect(result.months).toEqual([1, 2]);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('should not warn for ordered scenarios', () => {
      service.project({ initialPortfolio: 75000, bestCasePct: 66, normalCasePct: 32, worstCasePct: 21 });

      expect(logger.warn).not.toHaveBeenCalled();
    });
  });
});
