import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { ReportsService } from './reports.service';
import { DailyReport } from '../entities/daily-report.entity';
import { TradeStore } from '../trades/trade-store';
import { InMemoryTradeStore } from '../trades/testing/in-memory-trade.store';
import { RealtimeService } from '../realtime/realtime.service';
import { LoggerService } from '../logger/logger.service';
import { InvalidReportRequestError } from '../common/errors';
import { ClosedTrade } from '../trades/trade.types';

function closedAt(id: string, instant: string, netPnl: number): ClosedTrade {
  const time = new Date(instant);
  return {
    trade: {
      id,
      exchange: 'binance',
      base: 'BTC',
      quote: 'USDT',
      status: 'CLOSED',
      openedAt: new Date('2024-03-01T00:00:00Z'),
      closedAt: time,
      netPnl,
      netPnlPercent: null,
    },
    pyramids: [
      {
        id: `${id}-p1`,
        tradeId: id,
        index: 1,
        entryPrice: 100,
        size: 1,
        entryTime: new Date('2024-03-01T00:00:00Z'),
        entryFee: 0.1,
        signalKey: `${id}:pyramid:1`,
        warnings: [],
        netPnl,
        netPnlPercent: null,
      },
    ],
    exit: { id: `${id}-x`, tradeId: id, price: 100 + netPnl, time, fee: 0.1, signalKey: `${id}:exit` },
  };
}

describe('ReportsService', () => {
  let store: InMemoryTradeStore;
  let repository: { upsert: jest.Mock; findOne: jest.Mock; find: jest.Mock };
  let realtime: { broadcast: jest.Mock };

  async function createService(timezone?: string): Promise<ReportsService> {
    const module = await Test.createTestingModule({
      providers: [
        ReportsService,
        { provide: TradeStore, useValue: store },
        { provide: getRepositoryToken(DailyReport), useValue: repository },
        { provide: ConfigService, useValue: new ConfigService(timezone ? { TIMEZONE: timezone } : {}) },
        { provide: RealtimeService, useValue: realtime },
        {
          provide: LoggerService,
          useValue: { setContext: jest.fn(), log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
        },
      ],
    }).compile();
    return module.get(ReportsService);
  }

  beforeEach(() => {
    store = new InMemoryTradeStore();
    repository = {
      upsert: jest.fn().mockResolvedValue(undefined),
      findOne: jest.fn().mockResolvedValue(null),
      find: jest.fn().mockResolvedValue([]),
    };
    realtime = { broadcast: jest.fn() };

    // 23:59 and 00:01 in Tokyo (UTC+9) on either side of local midnight
    store.seedClosedTrade(closedAt('late', '2024-03-10T14:59:00Z', 10));
    store.seedClosedTrade(closedAt('next', '2024-03-10T15:01:00Z', -4));
  });

  it('should count a trade closed at 23:59 local time in that day', async () => {
    const service = await createService('Asia/Tokyo');

    const report = await service.aggregateDay('2024-03-10');

    expect(report.window).toEqual({
      start: new Date('2024-03-09T15:00:00Z'),
      end: new Date('2024-03-10T15:00:00Z'),
    });
    expect(report).toMatchObject({ label: '2024-03-10', timezone: 'Asia/Tokyo', totalTrades: 1, netProfit: 10 });
  });

  it('should put both trades in the same UTC day', async () => {
    const service = await createService();

    const report = await service.aggregateDay('2024-03-10');

    expect(service.timezone).toBe('UTC');
    expect(report).toMatchObject({ totalTrades: 2, netProfit: 6, grossLoss: -4 });
  });

  it('should span 23 hours on a spring-forward day', async () => {
    const service = await createService('America/New_York');

    const report = await service.aggregateDay('2024-03-10');

    expect(report.window).toEqual({
      start: new Date('2024-03-10T05:00:00Z'),
      end: new Date('2024-03-11T04:00:00Z'),
    });
    expect(report.totalTrades).toBe(2);
  });

  it('should take a timezone per request', async () => {
    const service = await createService();

    const report = await service.aggregateDay('2024-03-11', 'Asia/Tokyo');

    expect(report).toMatchObject({ timezone: 'Asia/Tokyo', totalTrades: 1, netProfit: -4 });
  });

  it('should reject an empty or inverted window', async () => {
    const service = await createService();
    const instant = new Date('2024-03-10T00:00:00Z');

    await expect(service.aggregate(instant, instant)).rejects.toThrow(InvalidReportRequestError);
  });

  it('should reject range bounds without an offset', async () => {
    const service = await createService();

    await expect(service.aggregateRange('2024-03-10T00:00:00', '2024-03-11T00:00:00Z')).rejects.toThrow(
      'start and end must be ISO-8601 timestamps with an offset',
    );
  });

  it('should aggregate an explicit range', async () => {
    const service = await createService();

    const report = await service.aggregateRange('2024-03-10T15:00:00+00:00', '2024-03-10T16:00:00Z');

    expect(report).toMatchObject({ totalTrades: 1, netProfit: -4 });
  });

  it('should store and broadcast a generated daily report', async () => {
    const service = await createService('Asia/Tokyo');

    const report = await service.generateDailyReport('2024-03-10');

    expect(repository.upsert).toHaveBeenCalledWith(
      expect.objectContaining({
        reportDate: '2024-03-10',
        timezone: 'Asia/Tokyo',
        windowStart: new Date('2024-03-09T15:00:00Z'),
        windowEnd: new Date('2024-03-10T15:00:00Z'),
        totalTrades: 1,
        netProfit: '10',
      }),
      ['reportDate', 'timezone'],
    );
    expect(realtime.broadcast).toHaveBeenCalledWith('daily-report', report);
  });

  it('should refuse to start with an unknown timezone', async () => {
    await expect(createService('Mars/Olympus_Mons')).rejects.toThrow(
      'TIMEZONE must be an IANA timezone name, got "Mars/Olympus_Mons"',
    );
  });
});
