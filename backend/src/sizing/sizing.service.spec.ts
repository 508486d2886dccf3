import { Test, TestingModule } from '@nestjs/testing';
import { SizingService } from './sizing.service';
import { RiskService } from '../risk/risk.service';
import { LoggerService } from '../logger/logger.service';

describe('SizingService', () => {
  let service: SizingService;
  let logger: { setContext: jest.Mock; log: jest.Mock; warn: jest.Mock; debug: jest.Mock; error: jest.Mock };

  beforeEach(async () => {
    logger = {
      setContext: jest.fn(),
      log: jest.fn(),
      error: jest.fn(),
      warn: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SizingService,
        RiskService,
        {
          provide: LoggerService,
          useValue: logger,
        },
      ],
    }).compile();

    service = module.get<SizingService>(SizingService);
  });

  describe('calculatePositionSize', () => {
    it('should size a long position so the stop costs the risk amount', () => {
      const result = service.calculatePositionSize(1500, 100, 95);

      expect(result.riskPerUnit).toBe(5);
      expect(result.positionSize).toBeCloseTo(300, 2);
      expect(result.totalValue).toBeCloseTo(30000, 2);
      expect(result.direction).toBe('long');
      expect(result.unavailableReason).toBeNull();
    });

    it('should size a short position with the stop above entry', () => {
      const result = service.calculatePositionSize(1500, 100, 110);

      expect(result.riskPerUnit).toBe(10);
      expect(result.positionSize).toBeCloseTo(150, 2);
      expect(result.totalValue).toBeCloseTo(15000, 2);
      expect(result.direction).toBe('short');
    });

    it('should be undefined when entry equals stop', () => {
      expect(service.calculatePositionSize(1500, 100, 100)).toEqual({
        riskAmount: 1500,
        entryPrice: 100,
        stopLossPrice: 100,
        riskPerUnit: 0,
        positionSize: null,
        totalValue: null,
        direction: null,
        unavailableReason: 'ENTRY_EQUALS_STOP',
      });
    });
  });

  describe('size', () => {
    it('should derive the risk amount from the portfolio', () => {
      const result = service.size({ initialPortfolio: 75000, riskPct: 2, entryPrice: 100, stopLossPrice: 95 });

      expect(result.initialPortfolio).toBe(75000);
      expect(result.riskPct).toBe(2);
      expect(result.riskAmount).toBeCloseTo(1500, 2);
      expect(result.positionSize).toBeCloseTo(300, 2);
      expect(result.totalValue).toBeCloseTo(30000, 2);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should warn when the size is undefined', () => {
      const result = service.size({ initialPortfolio: 75000, riskPct: 2, entryPrice: 42.5, stopLossPrice: 42.5 });

      expect(result.positionSize).toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('Position size undefined', {
        reason: 'ENTRY_EQUALS_STOP',
        entryPrice: 42.5,
      });
    });
  });
});
