import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException, ValidationPipe } from '@nestjs/common';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';
import { DashboardRequestDto } from './dto/dashboard-request.dto';

describe('DashboardController', () => {
  let controller: DashboardController;
  let dashboardService: { build: jest.Mock };
  const pipe = new ValidationPipe({ whitelist: true, transform: true });

  const validate = (body: Record<string, unknown>) =>
    pipe.transform(body, { type: 'body', metatype: DashboardRequestDto });

  beforeEach(async () => {
    dashboardService = {
      build: jest.fn().mockReturnValue({ scenariosAdjusted: false }),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DashboardController],
      providers: [
        {
          provide: DashboardService,
          useValue: dashboardService,
        },
      ],
    }).compile();

    controller = module.get<DashboardController>(DashboardController);
  });

  it('should delegate to the dashboard service', () => {
    const request = Object.assign(new DashboardRequestDto(), {
      initialPortfolio: 75000,
      riskPct: 2,
      maxDrawdownPct: 32.6,
      bestCasePct: 66,
      normalCasePct: 32,
      worstCasePct: 21,
    });

    expect(controller.build(request)).toEqual({ scenariosAdjusted: false });
    expect(dashboardService.build).toHaveBeenCalledWith(request);
  });

  describe('request validation', () => {
    const body = {
      initialPortfolio: 75000,
      riskPct: 2,
      maxDrawdownPct: 32.6,
      bestCasePct: 66,
      normalCasePct: 32,
      worstCasePct: 21,
    };

    it('should accept a complete request and strip unknown fields', async () => {
      const result = await validate({ ...body, leverage: 10 });

      expect(result).toBeInstanceOf(DashboardRequestDto);
      expect(result).not.toHaveProperty('leverage');
    });

    it('should accept out-of-order scenarios for clamping', async () => {
      await expect(validate({ ...body, normalCasePct: 90 })).resolves.toBeInstanceOf(DashboardRequestDto);
    });

    it('should reject a risk percentage above 5%', async () => {
      await expect(validate({ ...body, riskPct: 6 })).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should reject fractional scenario returns', async () => {
      await expect(validate({ ...body, bestCasePct: 66.5 })).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should reject an unknown projection mode', async () => {
      await expect(validate({ ...body, projectionMode: 'exponential' })).rejects.toBeInstanceOf(
        BadRequestException,
      );
    });
  });
});
