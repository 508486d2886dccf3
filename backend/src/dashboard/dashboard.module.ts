import { Module } from '@nestjs/common';
import { DashboardService } from './dashboard.service';
import { DashboardController } from './dashboard.controller';
import { RiskModule } from '../risk/risk.module';
import { ProjectionModule } from '../projection/projection.module';

@Module({
  imports: [RiskModule, ProjectionModule],
  controllers: [DashboardController],
  providers: [DashboardService],
  exports: [DashboardService],
})
export class DashboardModule {}
