import { Controller, Post, Body, HttpCode } from '@nestjs/common';
import { SizingService } from './sizing.service';
import { SizingRequestDto } from './dto/sizing-request.dto';
import { PositionSizeResult } from './dto/position-size.dto';

@Controller('api/sizing')
export class SizingController {
  constructor(private sizingService: SizingService) {}

  @Post()
  @HttpCode(200)
  size(@Body() request: SizingRequestDto): PositionSizeResult {
    return this.sizingService.size(request);
  }
}
