import { CanonicalExchange } from '../symbol-normalizer';
import { TradingRuleSpec } from '../exchange.types';
import { BinanceAdapter } from './binance.adapter';
import { JsonObject, num } from './public-rest.adapter';

/**
 * MEXC mirrors the Binance v3 spot API. Pairs that ship without a
 * PRICE_FILTER publish their tick as a decimal count in `quotePrecision`,
 * and the lot step as `baseSizePrecision`.
 */
export class MexcAdapter extends BinanceAdapter {
  readonly exchange: CanonicalExchange = 'mexc';
  protected readonly baseUrl: string = 'https://api.mexc.com';
  protected readonly notionalFilters: string[] = ['MIN_NOTIONAL'];

  protected rulesFromInfo(info: JsonObject): TradingRuleSpec {
    const rules = super.rulesFromInfo(info);
    const hasPriceFilter = Array.isArray(info.filters)
      && info.filters.some((f: unknown) => typeof f === 'object' && f !== null && 'filterType' in f && f.filterType === 'PRICE_FILTER');

    const digits = num(info.quotePrecision, NaN);
    const stepSize = num(info.baseSizePrecision, 0);

    return {
      ...rules,
      tickSize: !hasPriceFilter && Number.isInteger(digits) && digits >= 0 ? Math.pow(10, -digits) : rules.tickSize,
      stepSize: stepSize > 0 ? stepSize : rules.stepSize,
      minNotional: rules.minNotional > 0 ? rules.minNotional : num(info.quoteAmountPrecision, 0),
    };
  }
}
