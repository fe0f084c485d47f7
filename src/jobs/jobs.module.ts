import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { ReportsModule } from '../reports/reports.module';
import { AlertsModule } from '../alerts/alerts.module';
import { DailyReportProcessor } from './processors/daily-report.processor';
import { JobsService } from './jobs.service';
import { JobsScheduler } from './jobs.scheduler';
import { DAILY_REPORT_QUEUE } from './jobs.constants';

@Module({
  imports: [BullModule.registerQueue({ name: DAILY_REPORT_QUEUE }), ReportsModule, AlertsModule],
  providers: [JobsService, JobsScheduler, DailyReportProcessor],
  exports: [JobsService],
})
export class JobsModule {}
