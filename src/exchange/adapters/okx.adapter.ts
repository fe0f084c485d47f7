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

// OKX: BTC-USDT, API v5. Errors come back as HTTP 200 with a non-zero `code`.
export class OkxAdapter extends PublicRestAdapter {
  readonly exchange: CanonicalExchange = 'okx';
  protected readonly baseUrl = 'https://www.okx.com';

  formatSymbol(pair: CanonicalPair): string {
    return `${pair.base}-${pair.quote}`;
  }

  async getPrice(pair: CanonicalPair): Promise<PriceQuote> {
    const symbol = this.formatSymbol(pair);
    const ticker = await this.firstEntry('/api/v5/market/ticker', symbol, { instId: symbol });
    const price = positivePrice(ticker.last);
    if (price === null) {
      throw this.unavailable(`no last price for ${symbol}`, symbol);
    }
    return { price, fetchedAt: instantFromMs(ticker.ts) };
  }

  async getRules(pair: CanonicalPair): Promise<TradingRuleSpec> {
    const symbol = this.formatSymbol(pair);
    const info = await this.firstEntry('/api/v5/public/instruments', symbol, { instType: 'SPOT', instId: symbol });
    return {
      tickSize: num(info.tickSz, DEFAULT_STEP),
      stepSize: num(info.lotSz, DEFAULT_STEP),
      minQuantity: num(info.minSz, 0),
      // OKX publishes no minimum notional for spot
      minNotional: 0,
    };
  }

  private async firstEntry(path: string, symbol: string, params: JsonObject): Promise<JsonObject> {
    const body = asObject(await this.publicRequest(path, symbol, params));
    // 51001: instrument ID does not exist
    if (body.code === '51001') {
      throw new SymbolNotFoundError(this.exchange, symbol);
    }
    if (body.code !== '0') {
      throw this.unavailable(String(body.msg ?? `code ${String(body.code)}`), symbol);
    }
    const entry = asArray(body.data)[0];
    if (entry === undefined) {
      throw new SymbolNotFoundError(this.exchange, symbol);
    }
    return asObject(entry);
  }
}
