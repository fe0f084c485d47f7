import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { previousZonedDay } from '../common/utils/time.util';
import { LoggerService } from '../logger/logger.service';
import { JobsService } from './jobs.service';

// Decorator arguments are fixed when this file loads, so these come from the process environment
const DAILY_REPORT_CRON = process.env.DAILY_REPORT_CRON || '0 12 * * *';
const SCHEDULE_TIMEZONE = process.env.TIMEZONE || 'UTC';

@Injectable()
export class JobsScheduler {
  constructor(
    private jobsService: JobsService,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('JobsScheduler');
  }

  @Cron(DAILY_REPORT_CRON, { name: 'daily-report', timeZone: SCHEDULE_TIMEZONE })
  async handleDailyReport() {
    await this.scheduleDailyReport(new Date());
  }

  /** Enqueues the report for the local day before `now`. */
  async scheduleDailyReport(now: Date): Promise<void> {
    const timezone = this.configService.get<string>('TIMEZONE') || 'UTC';
    const date = previousZonedDay(now, timezone);
    try {
      const jobId = await this.jobsService.enqueueDailyReport(date, timezone);
      this.logger.log('Enqueued daily report', { date, timezone, jobId });
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to enqueue daily report', error instanceof Error ? error.stack : undefined, {
        date,
        timezone,
        error: message,
      });
    }
  }
}
