export const DAILY_REPORT_QUEUE = 'daily-report';

export interface DailyReportJobData {
  date: string; // YYYY-MM-DD in `timezone`
  timezone: string;
}
