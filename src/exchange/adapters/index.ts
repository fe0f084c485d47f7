import { ExchangeAdapterRegistry } from '../exchange.types';
import { BinanceAdapter } from './binance.adapter';
import { BybitAdapter } from './bybit.adapter';
import { GateioAdapter } from './gateio.adapter';
import { KucoinAdapter } from './kucoin.adapter';
import { MexcAdapter } from './mexc.adapter';
import { OkxAdapter } from './okx.adapter';

export const EXCHANGE_ADAPTERS = Symbol('EXCHANGE_ADAPTERS');

export function createExchangeAdapters(timeoutMs: number): ExchangeAdapterRegistry {
  return {
    binance: new BinanceAdapter(timeoutMs),
    bybit: new BybitAdapter(timeoutMs),
    okx: new OkxAdapter(timeoutMs),
    gateio: new GateioAdapter(timeoutMs),
    kucoin: new KucoinAdapter(timeoutMs),
    mexc: new MexcAdapter(timeoutMs),
  };
}

export { BinanceAdapter, BybitAdapter, GateioAdapter, KucoinAdapter, MexcAdapter, OkxAdapter };
