import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { SizingController } from './sizing.controller';
import { SizingService } from './sizing.service';
import { RiskService } from '../risk/risk.service';
import { LoggerService } from '../logger/logger.service';
import { SizingRequestDto } from './dto/sizing-request.dto';

describe('SizingController', () => {
  let controller: SizingController;
  const pipe = new ValidationPipe({ whitelist: true, transform: true });

  const body = {
    initialPortfolio: 75000,
    riskPct: 2,
    entryPrice: 100,
    stopLossPrice: 95,
  };

  const validate = (payload: Record<string, unknown>) =>
    pipe.transform(payload, { type: 'body', metatype: SizingRequestDto });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [SizingController],
      providers: [
        SizingService,
        RiskService,
        {
          provide: LoggerService,
          useValue: {
            setContext: jest.fn(),
            log: jest.fn(),
            error: jest.fn(),
            warn: jest.fn(),
            debug: jest.fn(),
          },
        },
      ],
    }).compile();

    controller = module.get<SizingController>(SizingController);
  });

  it('should size a long position from a validated request', async () => {
    const request = await validate(body);
    const result = controller.size(request);

    expect(result.riskAmount).toBeCloseTo(1500, 6);
    expect(result.positionSize).toBeCloseTo(300, 6);
    expect(result.totalValue).toBeCloseTo(30000, 4);
    expect(result.direction).toBe('long');
  });

  it('should report an undefined size when entry equals stop', async () => {
    const request = await validate({ ...body, stopLossPrice: 100 });
    const result = controller.size(request);

    expect(result.positionSize).toBeNull();
    expect(result.totalValue).toBeNull();
    expect(result.unavailableReason).toBe('ENTRY_EQUALS_STOP');
  });

  it('should reject a zero entry price', async () => {
    await expect(validate({ ...body, entryPrice: 0 })).rejects.toBeInstanceOf(BadRequestException);
  });

  it('should reject a missing stop-loss price', async () => {
    const { stopLossPrice: _omitted, ...rest } = body;
    await expect(validate(rest)).rejects.toBeInstanceOf(BadRequestException);
  });
});
