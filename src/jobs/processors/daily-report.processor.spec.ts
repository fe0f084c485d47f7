import { Test } from '@nestjs/testing';
import { DailyReportProcessor } from './daily-report.processor';
import { ReportsService } from '../../reports/reports.service';
import { AlertsService } from '../../alerts/alerts.service';
import { LoggerService } from '../../logger/logger.service';
import { DailyReportJobData } from '../jobs.constants';

function job(data: DailyReportJobData, id?: string) {
  return { id, data, attemptsMade: 0 };
}

describe('DailyReportProcessor', () => {
  let processor: DailyReportProcessor;
  let reportsService: { generateDailyReport: jest.Mock };
  let alertsService: { alertJobFailure: jest.Mock };

  beforeEach(async () => {
    reportsService = { generateDailyReport: jest.fn() };
    alertsService = { alertJobFailure: jest.fn().mockResolvedValue(undefined) };

    const module = await Test.createTestingModule({
      providers: [
        DailyReportProcessor,
        { provide: ReportsService, useValue: reportsService },
        { provide: AlertsService, useValue: alertsService },
        {
          provide: LoggerService,
          useValue: { setContext: jest.fn(), log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
        },
      ],
    }).compile();

    processor = module.get(DailyReportProcessor);
  });

  it('should generate the report for the job day', async () => {
    reportsService.generateDailyReport.mockResolvedValue({ totalTrades: 2 });

    await expect(processor.process(job({ date: '2024-03-10', timezone: 'UTC' }))).resolves.toEqual({ totalTrades: 2 });
    expect(reportsService.generateDailyReport).toHaveBeenCalledWith('2024-03-10', 'UTC');
  });

  it('should alert and rethrow so the queue retries', async () => {
    reportsService.generateDailyReport.mockRejectedValue(new Error('database unavailable'));

    await expect(processor.process(job({ date: '2024-03-10', timezone: 'UTC' }, '7'))).rejects.toThrow(
      'database unavailable',
    );
    expect(alertsService.alertJobFailure).toHaveBeenCalledWith('daily-report', 'database unavailable', '7');
  });
});
