import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Injectable } from '@nestjs/common';
import { Job } from 'bullmq';
import { AlertsService } from '../../alerts/alerts.service';
import { LoggerService } from '../../logger/logger.service';
import { ReportsService } from '../../reports/reports.service';
import { TradingReport } from '../../reports/report.aggregator';
import { DAILY_REPORT_QUEUE, DailyReportJobData } from '../jobs.constants';

@Processor(DAILY_REPORT_QUEUE)
@Injectable()
export class DailyReportProcessor extends WorkerHost {
  constructor(
    private reportsService: ReportsService,
    private alertsService: AlertsService,
    private logger: LoggerService,
  ) {
    super();
    this.logger.setContext('DailyReportProcessor');
  }

  async process(job: Pick<Job<DailyReportJobData>, 'id' | 'data' | 'attemptsMade'>): Promise<TradingReport> {
    const { date, timezone } = job.data;
    this.logger.log('Generating daily report', { jobId: job.id, date, timezone });

    try {
      return await this.reportsService.generateDailyReport(date, timezone);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('Daily report job failed', error instanceof Error ? error.stack : undefined, {
        jobId: job.id,
        date,
        timezone,
        attempt: job.attemptsMade + 1,
        error: message,
      });
      await this.alertsService.alertJobFailure('daily-report', message, job.id);
      // Rethrow so BullMQ applies the retry policy
      throw error;
    }
  }
}
