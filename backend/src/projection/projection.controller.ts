import { Controller, Post, Body, HttpCode } from '@nestjs/common';
import { ProjectionService } from './projection.service';
import { ProjectionRequestDto } from './dto/projection-request.dto';
import { ProjectionResult } from './dto/projection-result.dto';

@Controller('api/projection')
export class ProjectionController {
  constructor(private projectionService: ProjectionService) {}

  @Post()
  @HttpCode(200)
  project(@Body() request: ProjectionRequestDto): ProjectionResult {
    return this.projectionService.project(request);
  }
}
