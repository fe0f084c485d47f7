import { CanonicalExchange, CanonicalPair } from '../symbol-normalizer';
import { PriceQuote, TradingRuleSpec } from '../exchange.types';
import {
  DEFAULT_STEP,
  HttpFailure,
  JsonObject,
  PublicRestAdapter,
  asArray,
  asObject,
  num,
  positivePrice,
} from './public-rest.adapter';

// Binance: BTCUSDT, spot API v3
export class BinanceAdapter extends PublicRestAdapter {
  readonly exchange: CanonicalExchange = 'binance';
  protected readonly baseUrl: string = 'https://api.binance.com';
  protected readonly notionalFilters: string[] = ['NOTIONAL', 'MIN_NOTIONAL'];

  formatSymbol(pair: CanonicalPair): string {
    return `${pair.base}${pair.quote}`;
  }

  protected isUnknownSymbol(failure: HttpFailure): boolean {
    const body = asObject(failure.body);
    return failure.status === 400 && typeof body.msg === 'string' && /invalid symbol/i.test(body.msg);
  }

  async getPrice(pair: CanonicalPair): Promise<PriceQuote> {
    const symbol = this.formatSymbol(pair);
    const data = asObject(await this.publicRequest('/api/v3/ticker/price', symbol, { symbol }));
    const price = positivePrice(data.price);
    if (price === null) {
      throw this.unavailable(`no price in ticker response for ${symbol}`, symbol);
    }
    return { price, fetchedAt: new Date() };
  }

  async getRules(pair: CanonicalPair): Promise<TradingRuleSpec> {
    const symbol = this.formatSymbol(pair);
    const data = asObject(await this.publicRequest('/api/v3/exchangeInfo', symbol, { symbol }));
    const info = asObject(asArray(data.symbols)[0]);
    if (Object.keys(info).length === 0) {
      throw this.unavailable(`exchangeInfo returned no entry for ${symbol}`, symbol);
    }
    return this.rulesFromInfo(info);
  }

  protected rulesFromInfo(info: JsonObject): TradingRuleSpec {
    const filters = new Map<string, JsonObject>();
    for (const entry of asArray(info.filters)) {
      const filter = asObject(entry);
      if (typeof filter.filterType === 'string') {
        filters.set(filter.filterType, filter);
      }
    }

    const lot = filters.get('LOT_SIZE') ?? {};
    const price = filters.get('PRICE_FILTER') ?? {};
    const notionalFilter = this.notionalFilters.map((name) => filters.get(name)).find((f) => f !== undefined) ?? {};

    return {
      tickSize: num(price.tickSize, DEFAULT_STEP),
      stepSize: num(lot.stepSize, DEFAULT_STEP),
      minQuantity: num(lot.minQty, 0),
      minNotional: num(notionalFilter.minNotional, 0),
    };
  }
}
