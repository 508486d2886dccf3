import { Module } from '@nestjs/common';
import { SizingService } from './sizing.service';
import { SizingController } from './sizing.controller';
import { RiskModule } from '../risk/risk.module';

@Module({
  imports: [RiskModule],
  controllers: [SizingController],
  providers: [SizingService],
  exports: [SizingService],
})
export class SizingModule {}
