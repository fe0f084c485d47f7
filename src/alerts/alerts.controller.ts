import { Controller, Get, UseGuards, Query, ParseIntPipe, DefaultValuePipe, ParseEnumPipe } from '@nestjs/common';
import { ApiKeyGuard } from '../common/guards/shared-secret.guard';
import { AlertsService } from './alerts.service';
import { AlertType } from '../entities/alert.entity';

@Controller('api/alerts')
@UseGuards(ApiKeyGuard)
export class AlertsController {
  constructor(private alertsService: AlertsService) {}

  @Get('history')
  async getAlertHistory(@Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number) {
    return await this.alertsService.getAlertHistory(Math.min(Math.max(limit, 1), 500));
  }

  @Get('by-type')
  async getAlertsByType(
    @Query('type', new ParseEnumPipe(AlertType)) type: AlertType,
    @Query('limit', new DefaultValuePipe(50), ParseIntPipe) limit: number,
  ) {
    return await this.alertsService.getAlertsByType(type, Math.min(Math.max(limit, 1), 500));
  }
}
