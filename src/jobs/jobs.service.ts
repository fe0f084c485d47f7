import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { DAILY_REPORT_QUEUE, DailyReportJobData } from './jobs.constants';

@Injectable()
export class JobsService {
  constructor(@InjectQueue(DAILY_REPORT_QUEUE) private dailyReportQueue: Queue<DailyReportJobData>) {}

  /**
   * One job per (day, timezone): a second enqueue of the same day is a no-op
   * while the first job is still retained.
   */
  async enqueueDailyReport(date: string, timezone: string): Promise<string | undefined> {
    const job = await this.dailyReportQueue.add(
      'generate-daily-report',
      { date, timezone },
      {
        jobId: `daily-report-${date}-${timezone.replace(/[^A-Za-z0-9_-]/g, '_')}`,
        attempts: 3,
        backoff: { type: 'exponential', delay: 60000 },
        removeOnComplete: 100,
        removeOnFail: 500,
      },
    );
    return job.id;
  }
}
