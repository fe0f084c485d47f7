import { CanonicalExchange, CanonicalPair } from '../symbol-normalizer';
import { PriceQuote, TradingRuleSpec } from '../exchange.types';
import { SymbolNotFoundError } from '../../common/errors';
import { DEFAULT_STEP, PublicRestAdapter, asObject, instantFromMs, num, positivePrice } from './public-rest.adapter';

// KuCoin: BTC-USDT. Success is signalled by code "200000".
export class KucoinAdapter extends PublicRestAdapter {
  readonly exchange: CanonicalExchange = 'kucoin';
  protected readonly baseUrl = 'https://api.kucoin.com';

  formatSymbol(pair: CanonicalPair): string {
    return `${pair.base}-${pair.quote}`;
  }

  async getPrice(pair: CanonicalPair): Promise<PriceQuote> {
    const symbol = this.formatSymbol(pair);
    const data = await this.payload('/api/v1/market/orderbook/level1', symbol, { symbol });
    const price = positivePrice(data.price);
    if (price === null) {
      throw this.unavailable(`no price for ${symbol}`, symbol);
    }
    return { price, fetchedAt: instantFromMs(data.time) };
  }

  async getRules(pair: CanonicalPair): Promise<TradingRuleSpec> {
    const symbol = this.formatSymbol(pair);
    const info = await this.payload(`/api/v2/symbols/${symbol}`, symbol);
    return {
      tickSize: num(info.priceIncrement, DEFAULT_STEP),
      stepSize: num(info.baseIncrement, DEFAULT_STEP),
      minQuantity: num(info.baseMinSize, 0),
      minNotional: num(info.quoteMinSize, 0),
    };
  }

  private async payload(path: string, symbol: string, params: Record<string, unknown> = {}) {
    const body = asObject(await this.publicRequest(path, symbol, params));
    if (body.code !== '200000') {
      throw this.unavailable(String(body.msg ?? `code ${String(body.code)}`), symbol);
    }
    // Unknown symbols answer 200000 with a null payload
    if (body.data === null || body.data === undefined) {
      throw new SymbolNotFoundError(this.exchange, symbol);
    }
    return asObject(body.data);
  }
}
