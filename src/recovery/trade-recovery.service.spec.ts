import { Test } from '@nestjs/testing';
import { LoggerService } from '../logger/logger.service';
import { FeeScheduleService } from '../trades/fee-schedule';
import { TradeStore } from '../trades/trade-store';
import { InMemoryTradeStore } from '../trades/testing/in-memory-trade.store';
import { ExportedSignal } from './alert-export.parser';
import { RECOVERED_WARNING, RecoveryOptions, TradeRecoveryService } from './trade-recovery.service';

function entry(alertId: string, index: number, price: number, time: string): ExportedSignal {
  return {
    type: 'pyramid',
    exchange: 'binance',
    symbol: 'BTCUSDT',
    index,
    size: 1,
    alertId,
    exportId: `row-${alertId}`,
    price,
    time: new Date(time),
  };
}

function exit(alertId: string, price: number, time: string): ExportedSignal {
  return { type: 'exit', exchange: 'binance', symbol: 'BTCUSDT', alertId, exportId: `row-${alertId}`, price, time: new Date(time) };
}

const LIVE: RecoveryOptions = { dryRun: false, entries: true, exits: true };

const FULL_CYCLE = [
  entry('btc-1', 1, 100, '2024-03-10T08:00:00Z'),
  entry('btc-2', 2, 110, '2024-03-10T09:00:00Z'),
  exit('btc-exit', 150, '2024-03-10T12:00:00Z'),
];

describe('TradeRecoveryService', () => {
  let store: InMemoryTradeStore;
  let service: TradeRecoveryService;

  beforeEach(async () => {
    store = new InMemoryTradeStore();
    const module = await Test.createTestingModule({
      providers: [
        TradeRecoveryService,
        { provide: TradeStore, useValue: store },
        { provide: FeeScheduleService, useValue: { rateFor: jest.fn().mockReturnValue(0.001) } },
        {
          provide: LoggerService,
          useValue: { setContext: jest.fn(), log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
        },
      ],
    }).compile();
    service = module.get(TradeRecoveryService);
  });

  it('should rebuild a missing trade at the exported prices and times', async () => {
    const result = await service.replay(FULL_CYCLE, LIVE);

    expect(result).toEqual({
      signals: 3,
      pyramidsRecorded: 2,
      tradesOpened: 1,
      exitsRecorded: 1,
      skippedExisting: 0,
      skippedClosed: 0,
      skippedNoOpenTrade: 0,
      errors: [],
    });
    const [trade] = [...store.trades.values()];
    expect(trade).toMatchObject({ status: 'CLOSED', closedAt: new Date('2024-03-10T12:00:00Z'), netPnl: 89.49 });
    expect(store.pyramids[0]).toMatchObject({
      entryPrice: 100,
      entryTime: new Date('2024-03-10T08:00:00Z'),
      entryFee: 0.1,
      signalKey: 'btc-1:pyramid:1',
      warnings: [RECOVERED_WARNING],
    });
    expect(store.exits).toEqual([expect.objectContaining({ price: 150, fee: 0.3, signalKey: 'btc-exit:exit' })]);
  });

  it('should skip everything on a second replay of the same export', async () => {
    await service.replay(FULL_CYCLE, LIVE);

    const result = await service.replay(FULL_CYCLE, LIVE);

    expect(result).toMatchObject({ pyramidsRecorded: 0, exitsRecorded: 0, skippedExisting: 2, skippedClosed: 1 });
    expect(store.trades.size).toBe(1);
    expect(store.pyramids).toHaveLength(2);
  });

  it('should close a trade left open when its exit never arrived', async () => {
    await store.recordPyramid(
      { exchange: 'binance', base: 'BTC', quote: 'USDT' },
      {
        index: 1,
        entryPrice: 100,
        size: 1,
        entryTime: new Date('2024-03-10T07:00:00Z'),
        entryFee: 0.1,
        signalKey: 'live-1:pyramid:1',
        warnings: [],
      },
    );

    const result = await service.replay(
      [entry('live-1', 1, 101, '2024-03-10T07:00:00Z'), exit('btc-exit', 120, '2024-03-10T12:00:00Z')],
      LIVE,
    );

    expect(result).toMatchObject({ pyramidsRecorded: 0, skippedExisting: 1, exitsRecorded: 1 });
    const [trade] = [...store.trades.values()];
    expect(trade).toMatchObject({ status: 'CLOSED', netPnl: 19.78 });
    expect(store.pyramids[0].entryPrice).toBe(100);
  });

  it('should leave the store alone for an exit with no open trade', async () => {
    const result = await service.replay([exit('btc-exit', 150, '2024-03-10T12:00:00Z')], LIVE);

    expect(result.skippedNoOpenTrade).toBe(1);
    expect(store.exits).toEqual([]);
  });

  it('should only replay the kinds of signal asked for', async () => {
    const result = await service.replay(FULL_CYCLE, { dryRun: false, entries: false, exits: true });

    expect(result).toMatchObject({ pyramidsRecorded: 0, exitsRecorded: 0, skippedNoOpenTrade: 1 });
    expect(store.trades.size).toBe(0);
  });

  it('should count the changes of a dry run without writing', async () => {
    const result = await service.replay(FULL_CYCLE, { ...LIVE, dryRun: true });

    expect(result).toMatchObject({ pyramidsRecorded: 2, tradesOpened: 1, exitsRecorded: 1, skippedNoOpenTrade: 0 });
    expect(store.trades.size).toBe(0);
    expect(store.pyramids).toEqual([]);
  });

  it('should collect rejected signals and carry on', async () => {
    const result = await service.replay(
      [entry('btc-9', 6, 100, '2024-03-10T08:00:00Z'), entry('btc-1', 1, 100, '2024-03-10T09:00:00Z')],
      LIVE,
    );

    expect(result.errors).toEqual(['btc-9: Pyramid index must be an integer from 1 to 5, got 6']);
    expect(result.pyramidsRecorded).toBe(1);
  });
});
