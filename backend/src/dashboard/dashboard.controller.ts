import { Controller, Post, Body, HttpCode } from '@nestjs/common';
import { DashboardService } from './dashboard.service';
import { DashboardRequestDto } from './dto/dashboard-request.dto';
import { DashboardResult } from './dto/dashboard-result.dto';

@Controller('api/dashboard')
export class DashboardController {
  constructor(private dashboardService: DashboardService) {}

  @Post()
  @HttpCode(200)
  build(@Body() request: DashboardRequestDto): DashboardResult {
    return this.dashboardService.build(request);
  }
}
