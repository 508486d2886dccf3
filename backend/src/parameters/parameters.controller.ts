import { Controller, Get } from '@nestjs/common';
import { ParametersService, ParameterDefinitions } from './parameters.service';

@Controller('api/parameters')
export class ParametersController {
  constructor(private parametersService: ParametersService) {}

  @Get()
  getParameters(): ParameterDefinitions {
    return this.parametersService.getDefinitions();
  }
}
