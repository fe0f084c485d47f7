import { Injectable, OnModuleInit } from '@nestjs/common';
import { SettingsService } from './settings/settings.service';
import { TradeLifecycleService } from './trades/trade-lifecycle.service';
import { ReportsService } from './reports/reports.service';

@Injectable()
export class AppService implements OnModuleInit {
  constructor(
    private settingsService: SettingsService,
    private lifecycle: TradeLifecycleService,
    private reportsService: ReportsService,
  ) {}

  async onModuleInit() {
    await this.settingsService.initializeDefaults();
  }

  getInfo() {
    return {
      name: 'Pyramid Ledger API',
      validationMode: this.lifecycle.mode,
      timezone: this.reportsService.timezone,
    };
  }
}
