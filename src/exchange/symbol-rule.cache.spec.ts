import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { getRepositoryToken } from '@nestjs/typeorm';
import { SymbolRule } from '../entities/symbol-rule.entity';
import { LoggerService } from '../logger/logger.service';
import { SymbolRuleCache } from './symbol-rule.cache';
import { TradingRule } from './exchange.types';

const NOW = new Date('2024-03-10T12:00:00Z');
const BTC_USDT = { base: 'BTC', quote: 'USDT' };

function row(overrides: Partial<SymbolRule> = {}): SymbolRule {
  const entity = new SymbolRule();
  entity.id = 'rule-1';
  entity.exchange = 'binance';
  entity.base = 'BTC';
  entity.quote = 'USDT';
  entity.tickSize = '0.010000000000';
  entity.stepSize = '0.000010000000';
  entity.minQuantity = '0.000010000000';
  entity.minNotional = '5.000000000000';
  entity.refreshedAt = new Date(NOW.getTime() - 5 * 60 * 1000);
  return Object.assign(entity, overrides);
}

describe('SymbolRuleCache', () => {
  let cache: SymbolRuleCache;
  let repository: { findOne: jest.Mock; upsert: jest.Mock };
  let logger: { setContext: jest.Mock; warn: jest.Mock; debug: jest.Mock; log: jest.Mock; error: jest.Mock };

  beforeEach(async () => {
    repository = {
      findOne: jest.fn(),
      upsert: jest.fn().mockResolvedValue(undefined),
    };
    logger = { setContext: jest.fn(), warn: jest.fn(), debug: jest.fn(), log: jest.fn(), error: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SymbolRuleCache,
        { provide: getRepositoryToken(SymbolRule), useValue: repository },
        { provide: ConfigService, useValue: { get: jest.fn((key: string) => (key === 'SYMBOL_RULE_TTL_MINUTES' ? '15' : undefined)) } },
        { provide: LoggerService, useValue: logger },
      ],
    }).compile();

    cache = module.get(SymbolRuleCache);
  });

  it('should read the TTL from configuration', () => {
    expect(cache.ttlMs).toBe(15 * 60 * 1000);
  });

  it('should return null when nothing is stored', async () => {
    repository.findOne.mockResolvedValue(null);

    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toBeNull();
    expect(repository.findOne).toHaveBeenCalledWith({ where: { exchange: 'binance', base: 'BTC', quote: 'USDT' } });
  });

  it('should serve a fresh persisted entry with numeric fields', async () => {
    repository.findOne.mockResolvedValue(row());

    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toEqual({
      exchange: 'binance',
      base: 'BTC',
      quote: 'USDT',
      tickSize: 0.01,
      stepSize: 0.00001,
      minQuantity: 0.00001,
      minNotional: 5,
      refreshedAt: new Date('2024-03-10T11:55:00Z'),
    });
  });

  it('should keep a served entry in memory', async () => {
    repository.findOne.mockResolvedValue(row());

    await cache.get('binance', BTC_USDT, NOW);
    await cache.get('binance', BTC_USDT, NOW);

    expect(repository.findOne).toHaveBeenCalledTimes(1);
  });

  it('should treat an entry at or beyond the TTL as a miss', async () => {
    repository.findOne.mockResolvedValue(row({ refreshedAt: new Date('2024-03-10T11:45:00Z') }));

    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toBeNull();
  });

  it('should self-heal an entry whose timestamp is not an instant', async () => {
    repository.findOne.mockResolvedValue(row({ refreshedAt: new Date('not a date') }));

    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      'Discarding unreadable cached symbol rule, refetching',
      expect.objectContaining({ exchange: 'binance', pair: 'BTC/USDT' }),
    );
  });

  it('should self-heal an entry with a non-numeric field', async () => {
    repository.findOne.mockResolvedValue(row({ tickSize: 'abc' }));

    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should treat a failing read as a miss', async () => {
    repository.findOne.mockRejectedValue(new Error('column "refreshedAt" is of type timestamp'));

    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith(
      'Discarding unreadable cached symbol rule, refetching',
      expect.objectContaining({ error: 'column "refreshedAt" is of type timestamp' }),
    );
  });

  it('should persist and then serve a stored rule from memory', async () => {
    const rule: TradingRule = {
      exchange: 'okx',
      base: 'ETH',
      quote: 'USDT',
      tickSize: 0.01,
      stepSize: 0.0001,
      minQuantity: 0.001,
      minNotional: 0,
      refreshedAt: new Date(NOW.getTime() - 1000),
    };

    await cache.put(rule);

    expect(repository.upsert).toHaveBeenCalledWith(
      {
        exchange: 'okx',
        base: 'ETH',
        quote: 'USDT',
        tickSize: '0.01',
        stepSize: '0.0001',
        minQuantity: '0.001',
        minNotional: '0',
        refreshedAt: rule.refreshedAt,
      },
      ['exchange', 'base', 'quote'],
    );
    await expect(cache.get('okx', { base: 'ETH', quote: 'USDT' }, NOW)).resolves.toBe(rule);
    expect(repository.findOne).not.toHaveBeenCalled();
  });

  it('should keep the in-memory entry when persisting fails', async () => {
    repository.upsert.mockRejectedValue(new Error('connection refused'));
    const rule: TradingRule = {
      exchange: 'binance',
      base: 'BTC',
      quote: 'USDT',
      tickSize: 0.01,
      stepSize: 0.00001,
      minQuantity: 0.00001,
      minNotional: 5,
      refreshedAt: NOW,
    };

    await expect(cache.put(rule)).resolves.toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith('Failed to persist symbol rule', expect.objectContaining({ error: 'connection refused' }));
    await expect(cache.get('binance', BTC_USDT, NOW)).resolves.toBe(rule);
  });

  it('should refetch after invalidation', async () => {
    repository.findOne.mockResolvedValue(row());
    await cache.get('binance', BTC_USDT, NOW);

    cache.invalidate('binance', BTC_USDT);
    await cache.get('binance', BTC_USDT, NOW);

    expect(repository.findOne).toHaveBeenCalledTimes(2);
  });
});
