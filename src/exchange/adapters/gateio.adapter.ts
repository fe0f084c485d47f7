import { CanonicalExchange, CanonicalPair } from '../symbol-normalizer';
import { PriceQuote, TradingRuleSpec } from '../exchange.types';
import { SymbolNotFoundError } from '../../common/errors';
import { DEFAULT_STEP, HttpFailure, PublicRestAdapter, asArray, asObject, num, positivePrice } from './public-rest.adapter';

// Gate.io: BTC_USDT, API v4
export class GateioAdapter extends PublicRestAdapter {
  readonly exchange: CanonicalExchange = 'gateio';
  protected readonly baseUrl = 'https://api.gateio.ws/api/v4';

  formatSymbol(pair: CanonicalPair): string {
    return `${pair.base}_${pair.quote}`;
  }

  protected isUnknownSymbol(failure: HttpFailure): boolean {
    const body = asObject(failure.body);
    return failure.status === 404 || body.label === 'INVALID_CURRENCY_PAIR';
  }

  async getPrice(pair: CanonicalPair): Promise<PriceQuote> {
    const symbol = this.formatSymbol(pair);
    const tickers = asArray(await this.publicRequest('/spot/tickers', symbol, { currency_pair: symbol }));
    if (tickers.length === 0) {
      throw new SymbolNotFoundError(this.exchange, symbol);
    }
    const price = positivePrice(asObject(tickers[0]).last);
    if (price === null) {
      throw this.unavailable(`no last price for ${symbol}`, symbol);
    }
    return { price, fetchedAt: new Date() };
  }

  async getRules(pair: CanonicalPair): Promise<TradingRuleSpec> {
    const symbol = this.formatSymbol(pair);
    const info = asObject(await this.publicRequest(`/spot/currency_pairs/${symbol}`, symbol));
    // Gate.io publishes decimal counts, not steps
    const pricePrecision = num(info.precision, 8);
    const amountPrecision = num(info.amount_precision, 8);
    return {
      tickSize: pricePrecision >= 0 ? Math.pow(10, -pricePrecision) : DEFAULT_STEP,
      stepSize: amountPrecision >= 0 ? Math.pow(10, -amountPrecision) : DEFAULT_STEP,
      minQuantity: num(info.min_base_amount, 0),
      minNotional: num(info.min_quote_amount, 0),
    };
  }
}
