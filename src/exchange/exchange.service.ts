import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DomainError, ExchangeUnavailableError } from '../common/errors';
import { withTimeout } from '../common/utils/timeout.util';
import { LoggerService } from '../logger/logger.service';
import { EXCHANGE_ADAPTERS } from './adapters';
import { ExchangeAdapter, ExchangeAdapterRegistry, PriceQuote, TradingRule } from './exchange.types';
import { SymbolRuleCache } from './symbol-rule.cache';
import { CanonicalExchange, CanonicalPair, displayPair } from './symbol-normalizer';

const DEFAULT_TIMEOUT_MS = 10000;

/** EXCHANGE_TIMEOUT_MS, or the default when it is missing, non-numeric or not positive. */
export function exchangeTimeoutMs(configService: ConfigService): number {
  const configured = parseInt(configService.get<string>('EXCHANGE_TIMEOUT_MS') || '', 10);
  return Number.isFinite(configured) && configured > 0 ? configured : DEFAULT_TIMEOUT_MS;
}

export interface MarketSnapshot {
  quote: PriceQuote;
  rule: TradingRule;
}

/**
 * Single entry point for live market data. Every outbound call is bounded by
 * EXCHANGE_TIMEOUT_MS and every failure leaves as a DomainError.
 */
@Injectable()
export class ExchangeService {
  private readonly timeoutMs: number;

  constructor(
    @Inject(EXCHANGE_ADAPTERS)
    private adapters: ExchangeAdapterRegistry,
    private ruleCache: SymbolRuleCache,
    private configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('ExchangeService');
    this.timeoutMs = exchangeTimeoutMs(this.configService);
  }

  adapterFor(exchange: CanonicalExchange): ExchangeAdapter {
    return this.adapters[exchange];
  }

  async getPrice(exchange: CanonicalExchange, pair: CanonicalPair): Promise<PriceQuote> {
    const adapter = this.adapterFor(exchange);
    return this.bounded(exchange, pair, 'price', () => adapter.getPrice(pair));
  }

  /**
   * Cached trading rules; a miss or a stale entry triggers one live fetch.
   */
  async getRules(exchange: CanonicalExchange, pair: CanonicalPair): Promise<TradingRule> {
    const cached = await this.ruleCache.get(exchange, pair);
    if (cached) {
      return cached;
    }

    const adapter = this.adapterFor(exchange);
    const limits = await this.bounded(exchange, pair, 'rules', () => adapter.getRules(pair));
    const rule: TradingRule = {
      exchange,
      base: pair.base,
      quote: pair.quote,
      ...limits,
      refreshedAt: new Date(),
    };
    await this.ruleCache.put(rule);
    this.logger.debug('Refreshed symbol rules', {
      exchange,
      pair: displayPair(pair),
      tickSize: rule.tickSize,
      stepSize: rule.stepSize,
      minQuantity: rule.minQuantity,
      minNotional: rule.minNotional,
    });
    return rule;
  }

  async getSnapshot(exchange: CanonicalExchange, pair: CanonicalPair): Promise<MarketSnapshot> {
    const [quote, rule] = await Promise.all([this.getPrice(exchange, pair), this.getRules(exchange, pair)]);
    return { quote, rule };
  }

  private async bounded<T>(
    exchange: CanonicalExchange,
    pair: CanonicalPair,
    operation: string,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await withTimeout(
        call(),
        this.timeoutMs,
        () =>
          new ExchangeUnavailableError(`${exchange} ${operation} request exceeded ${this.timeoutMs}ms`, {
            exchange,
            pair: displayPair(pair),
          }),
      );
    } catch (error: unknown) {
      if (error instanceof DomainError) {
        this.logger.warn(`Exchange ${operation} request failed`, {
          exchange,
          pair: displayPair(pair),
          code: error.code,
          error: error.message,
        });
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Unexpected exchange ${operation} failure`, error instanceof Error ? error.stack : undefined, {
        exchange,
        pair: displayPair(pair),
      });
      throw new ExchangeUnavailableError(`${exchange} ${operation} failed: ${message}`, {
        exchange,
        pair: displayPair(pair),
      });
    }
  }
}
