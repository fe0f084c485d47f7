import { CanonicalExchange, CanonicalPair } from './symbol-normalizer';

export interface PriceQuote {
  price: number;
  fetchedAt: Date;
}

/**
 * Trading constraints an exchange publishes for one pair.
 */
export interface TradingRuleSpec {
  tickSize: number;
  stepSize: number;
  minQuantity: number;
  minNotional: number;
}

export interface TradingRule extends TradingRuleSpec {
  exchange: CanonicalExchange;
  base: string;
  quote: string;
  refreshedAt: Date;
}

export interface ExchangeAdapter {
  readonly exchange: CanonicalExchange;
  formatSymbol(pair: CanonicalPair): string;
  getPrice(pair: CanonicalPair): Promise<PriceQuote>;
  getRules(pair: CanonicalPair): Promise<TradingRuleSpec>;
}

export type ExchangeAdapterRegistry = Record<CanonicalExchange, ExchangeAdapter>;
