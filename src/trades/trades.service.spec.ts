import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TradesService } from './trades.service';
import { TradeStore } from './trade-store';
import { InMemoryTradeStore } from './testing/in-memory-trade.store';

const TIME = new Date('2024-03-10T10:00:00Z');

describe('TradesService', () => {
  let store: InMemoryTradeStore;
  let service: TradesService;

  beforeEach(async () => {
    store = new InMemoryTradeStore();
    const module = await Test.createTestingModule({
      providers: [TradesService, { provide: TradeStore, useValue: store }],
    }).compile();
    service = module.get(TradesService);

    await store.recordPyramid(
      { exchange: 'okx', base: 'ETH', quote: 'USDT' },
      { index: 1, entryPrice: 3000, size: 0.5, entryTime: TIME, entryFee: 1.5, signalKey: 'e1:pyramid:1', warnings: [] },
    );
  });

  it('should list trades with a display pair', async () => {
    const trades = await service.findAll();

    expect(trades).toHaveLength(1);
    expect(trades[0]).toMatchObject({ exchange: 'okx', pair: 'ETH/USDT', status: 'OPEN' });
  });

  it('should filter by status', async () => {
    await expect(service.findAll('CLOSED')).resolves.toEqual([]);
    await expect(service.findOpen()).resolves.toHaveLength(1);
  });

  it('should return a trade with its pyramids', async () => {
    const [trade] = await service.findAll();

    const detail = await service.findOne(trade.id);

    expect(detail.pair).toBe('ETH/USDT');
    expect(detail.pyramids.map((p) => [p.index, p.entryPrice])).toEqual([[1, 3000]]);
    expect(detail.exit).toBeNull();
  });

  it('should throw NotFoundException for an unknown id', async () => {
    await expect(service.findOne('missing')).rejects.toThrow(NotFoundException);
  });
});
