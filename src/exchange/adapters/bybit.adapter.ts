import { CanonicalExchange, CanonicalPair } from '../symbol-normalizer';
import { PriceQuote, TradingRuleSpec } from '../exchange.types';
import { SymbolNotFoundError } from '../../common/errors';
import {
  DEFAULT_STEP,
  JsonObject,
  PublicRestAdapter,
  asArray,
  asObject,
  instantFromMs,
  num,
  positivePrice,
} from './public-rest.adapter';

// Bybit: BTCUSDT, API v5 spot category
export class BybitAdapter extends PublicRestAdapter {
  readonly exchange: CanonicalExchange = 'bybit';
  protected readonly baseUrl = 'https://api.bybit.com';

  formatSymbol(pair: CanonicalPair): string {
    return `${pair.base}${pair.quote}`;
  }

  async getPrice(pair: CanonicalPair): Promise<PriceQuote> {
    const symbol = this.formatSymbol(pair);
    const { entry, body } = await this.firstEntry('/v5/market/tickers', symbol);
    const price = positivePrice(entry.lastPrice);
    if (price === null) {
      throw this.unavailable(`no last price for ${symbol}`, symbol);
    }
    return { price, fetchedAt: instantFromMs(body.time) };
  }

  async getRules(pair: CanonicalPair): Promise<TradingRuleSpec> {
    const symbol = this.formatSymbol(pair);
    const { entry } = await this.firstEntry('/v5/market/instruments-info', symbol);
    const lot = asObject(entry.lotSizeFilter);
    const price = asObject(entry.priceFilter);
    return {
      tickSize: num(price.tickSize, DEFAULT_STEP),
      stepSize: num(lot.basePrecision, DEFAULT_STEP),
      minQuantity: num(lot.minOrderQty, 0),
      minNotional: num(lot.minOrderAmt, 0),
    };
  }

  private async firstEntry(path: string, symbol: string): Promise<{ entry: JsonObject; body: JsonObject }> {
    const body = asObject(await this.publicRequest(path, symbol, { category: 'spot', symbol }));
    // 10001: params error, returned for unknown symbols
    if (body.retCode === 10001) {
      throw new SymbolNotFoundError(this.exchange, symbol);
    }
    if (body.retCode !== 0) {
      throw this.unavailable(String(body.retMsg ?? `retCode ${String(body.retCode)}`), symbol);
    }
    const entry = asArray(asObject(body.result).list)[0];
    if (entry === undefined) {
      throw new SymbolNotFoundError(this.exchange, symbol);
    }
    return { entry: asObject(entry), body };
  }
}
