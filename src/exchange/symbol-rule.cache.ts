import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { SymbolRule } from '../entities/symbol-rule.entity';
import { LoggerService } from '../logger/logger.service';
import { fromColumn, toColumn } from '../common/utils/decimal.util';
import { toInstant } from '../common/utils/time.util';
import { CanonicalExchange, CanonicalPair, displayPair } from './symbol-normalizer';
import { TradingRule } from './exchange.types';

class MalformedRuleError extends Error {}

/**
 * Trading rules keyed by (exchange, pair), held in memory and persisted to
 * `symbol_rules`. Entries are disposable: anything unreadable is a miss.
 * No lock is held across the live fetch; concurrent refreshes simply
 * overwrite each other.
 */
@Injectable()
export class SymbolRuleCache {
  private readonly entries = new Map<string, TradingRule>();
  readonly ttlMs: number;

  constructor(
    @InjectRepository(SymbolRule)
    private ruleRepository: Repository<SymbolRule>,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('SymbolRuleCache');
    const ttlMinutes = parseFloat(this.configService.get<string>('SYMBOL_RULE_TTL_MINUTES') || '15');
    this.ttlMs = (Number.isFinite(ttlMinutes) && ttlMinutes > 0 ? ttlMinutes : 15) * 60 * 1000;
  }

  isFresh(refreshedAt: unknown, now: Date = new Date()): boolean {
    const instant = toInstant(refreshedAt);
    if (!instant) {
      return false;
    }
    const age = now.getTime() - instant.getTime();
    return age >= 0 && age < this.ttlMs;
  }

  async get(exchange: CanonicalExchange, pair: CanonicalPair, now: Date = new Date()): Promise<TradingRule | null> {
    const key = cacheKey(exchange, pair);
    const held = this.entries.get(key);
    if (held && this.isFresh(held.refreshedAt, now)) {
      return held;
    }

    try {
      const row = await this.ruleRepository.findOne({
        where: { exchange, base: pair.base, quote: pair.quote },
      });
      if (!row) {
        return null;
      }
      const rule = fromRow(row, exchange);
      if (!this.isFresh(rule.refreshedAt, now)) {
        return null;
      }
      this.entries.set(key, rule);
      return rule;
    } catch (error: unknown) {
      this.entries.delete(key);
      this.logger.warn('Discarding unreadable cached symbol rule, refetching', {
        exchange,
        pair: displayPair(pair),
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async put(rule: TradingRule): Promise<void> {
    this.entries.set(cacheKey(rule.exchange, rule), rule);
    try {
      await this.ruleRepository.upsert(
        {
          exchange: rule.exchange,
          base: rule.base,
          quote: rule.quote,
          tickSize: toColumn(rule.tickSize),
          stepSize: toColumn(rule.stepSize),
          minQuantity: toColumn(rule.minQuantity),
          minNotional: toColumn(rule.minNotional),
          refreshedAt: rule.refreshedAt,
        },
        ['exchange', 'base', 'quote'],
      );
    } catch (error: unknown) {
      // The in-memory entry still serves this replica; the row is rebuilt on the next refresh.
      this.logger.warn('Failed to persist symbol rule', {
        exchange: rule.exchange,
        pair: displayPair(rule),
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  invalidate(exchange: CanonicalExchange, pair: CanonicalPair): void {
    this.entries.delete(cacheKey(exchange, pair));
  }
}

function cacheKey(exchange: CanonicalExchange, pair: CanonicalPair): string {
  return `${exchange}:${pair.base}/${pair.quote}`;
}

function fromRow(row: SymbolRule, exchange: CanonicalExchange): TradingRule {
  const refreshedAt = toInstant(row.refreshedAt);
  if (!refreshedAt) {
    throw new MalformedRuleError(`refreshedAt is not an absolute instant: ${String(row.refreshedAt)}`);
  }
  const tickSize = fromColumn(row.tickSize);
  const stepSize = fromColumn(row.stepSize);
  const minQuantity = fromColumn(row.minQuantity);
  const minNotional = fromColumn(row.minNotional);
  if (tickSize === null || stepSize === null || minQuantity === null || minNotional === null) {
    throw new MalformedRuleError('non-numeric rule field');
  }
  return {
    exchange,
    base: row.base,
    quote: row.quote,
    tickSize,
    stepSize,
    minQuantity,
    minNotional,
    refreshedAt,
  };
}
