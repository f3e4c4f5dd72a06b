import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { AcquisitionService } from './acquisition/acquisition.service';
import { ConfigService } from './config/config.service';

@ApiTags('Health')
@Controller()
export class AppController {
  constructor(
    private readonly acquisition: AcquisitionService,
    private readonly config: ConfigService,
  ) {}

  @Get('health')
  @ApiOperation({ summary: 'Health check endpoint' })
  @ApiResponse({ status: 200, description: 'Service is healthy, with strategy availability' })
  async health() {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      strategies: await this.acquisition.strategyStatus(),
      challengeSolverAvailable: this.acquisition.challengeSolverAvailable,
      proxyConfigured: this.acquisition.proxyConfigured,
      cacheBackend: this.acquisition.cacheBackend,
    };
  }

  @Get()
  @ApiOperation({ summary: 'API root endpoint' })
  @ApiResponse({ status: 200, description: 'API information' })
  root() {
    return {
      name: 'Cloakscope API',
      version: '0.0.1',
      description: 'SEO metadata extraction and cloaking detection',
      documentation: `/${this.config.apiPrefix}/docs`,
    };
  }
}
