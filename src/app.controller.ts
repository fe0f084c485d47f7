import { Controller, Get } from '@nestjs/common';
import { AppService } from './app.service';
import { HealthService } from './health/health.service';

@Controller()
export class AppController {
  constructor(
    private readonly appService: AppService,
    private readonly healthService: HealthService,
  ) {}

  @Get()
  getInfo() {
    return this.appService.getInfo();
  }

  @Get('health')
  async health() {
    // Quick status; /api/health has the per-component detail
    const health = await this.healthService.checkHealth();
    return {
      status: health.status === 'healthy' ? 'ok' : 'degraded',
      timestamp: health.timestamp,
      uptime: health.uptime,
    };
  }
}
