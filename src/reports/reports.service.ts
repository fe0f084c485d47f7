import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DailyReport } from '../entities/daily-report.entity';
import { InvalidReportRequestError } from '../common/errors';
import { toColumn } from '../common/utils/decimal.util';
import { isValidTimeZone, previousZonedDay, toInstant, zonedDayWindow } from '../common/utils/time.util';
import { LoggerService } from '../logger/logger.service';
import { RealtimeService } from '../realtime/realtime.service';
import { TradeStore } from '../trades/trade-store';
import { TradingReport, aggregateTrades } from './report.aggregator';

@Injectable()
export class ReportsService {
  readonly timezone: string;

  constructor(
    private tradeStore: TradeStore,
    @InjectRepository(DailyReport)
    private reportRepository: Repository<DailyReport>,
    private configService: ConfigService,
    private realtimeService: RealtimeService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('ReportsService');
    this.timezone = this.configService.get<string>('TIMEZONE') || 'UTC';
    if (!isValidTimeZone(this.timezone)) {
      throw new Error(`TIMEZONE must be an IANA timezone name, got "${this.timezone}"`);
    }
  }

  async aggregate(start: Date, end: Date): Promise<TradingReport> {
    if (!(start.getTime() < end.getTime())) {
      throw new InvalidReportRequestError('Report window start must be before its end', {
        start: start.toISOString(),
        end: end.toISOString(),
      });
    }
    const trades = await this.tradeStore.findClosedBetween(start, end);
    return aggregateTrades(trades, { start, end });
  }

  /**
   * Report for the calendar day `label` as observed in `timezone`. A trade
   * closed at 23:59 local time belongs to that day whatever the offset.
   */
  async aggregateDay(label: string, timezone: string = this.timezone): Promise<TradingReport> {
    const window = zonedDayWindow(label, timezone);
    const report = await this.aggregate(window.start, window.end);
    return { ...report, label, timezone };
  }

  async aggregateRange(start: string, end: string): Promise<TradingReport> {
    const from = toInstant(start);
    const to = toInstant(end);
    if (!from || !to) {
      throw new InvalidReportRequestError('start and end must be ISO-8601 timestamps with an offset', { start, end });
    }
    return this.aggregate(from, to);
  }

  /**
   * Builds, stores and broadcasts a daily report. Defaults to the local day
   * before now in the reporting timezone.
   */
  async generateDailyReport(label?: string, timezone: string = this.timezone): Promise<TradingReport> {
    const day = label ?? previousZonedDay(new Date(), timezone);
    const report = await this.aggregateDay(day, timezone);

    await this.reportRepository.upsert(
      {
        reportDate: day,
        timezone,
        windowStart: report.window.start,
        windowEnd: report.window.end,
        totalTrades: report.totalTrades,
        netProfit: toColumn(report.netProfit),
        report: serializeReport(report),
      },
      ['reportDate', 'timezone'],
    );

    this.logger.log('Daily report generated', {
      date: day,
      timezone,
      totalTrades: report.totalTrades,
      netProfit: report.netProfit,
    });
    this.realtimeService.broadcast('daily-report', report);
    return report;
  }

  async getStoredReport(label: string, timezone: string = this.timezone): Promise<DailyReport | null> {
    return this.reportRepository.findOne({ where: { reportDate: label, timezone } });
  }

  async listStoredReports(limit = 30): Promise<DailyReport[]> {
    return this.reportRepository.find({ order: { reportDate: 'DESC' }, take: limit });
  }
}

function serializeReport(report: TradingReport): Record<string, unknown> {
  return {
    ...report,
    window: { start: report.window.start.toISOString(), end: report.window.end.toISOString() },
    trades: report.trades.map((line) => ({ ...line, closedAt: line.closedAt.toISOString() })),
  };
}
