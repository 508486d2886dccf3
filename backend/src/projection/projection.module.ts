import { Module } from '@nestjs/common';
import { ProjectionService } from './projection.service';
import { ProjectionController } from './projection.controller';

@Module({
  controllers: [ProjectionController],
  providers: [ProjectionService],
  exports: [ProjectionService],
})
export class ProjectionModule {}
