import { Injectable, OnModuleInit } from '@nestjs/common';
import { ParametersService } from './parameters/parameters.service';
import { LoggerService } from './logger/logger.service';

@Injectable()
export class AppService implements OnModuleInit {
  constructor(
    private parametersService: ParametersService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('AppService');
  }

  onModuleInit() {
    // Surface configuration problems at startup rather than on first page load
    const { parameters, projection } = this.parametersService.getDefinitions();
    this.logger.log('Dashboard defaults resolved', {
      defaults: Object.fromEntries(parameters.map((p) => [p.key, p.defaultValue])),
      projection: `${projection.months} months, ${projection.mode}`,
    });
  }

  getHello(): string {
    return 'Trading Strategy Dashboard API';
  }
}
