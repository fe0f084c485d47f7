import { UnknownExchangeError, UnrecognizedSymbolError } from '../common/errors';

export const CANONICAL_EXCHANGES = ['binance', 'bybit', 'okx', 'gateio', 'kucoin', 'mexc'] as const;

export type CanonicalExchange = (typeof CANONICAL_EXCHANGES)[number];

export interface CanonicalPair {
  base: string;
  quote: string;
}

export interface SignalTarget extends CanonicalPair {
  exchange: CanonicalExchange;
}

// Checked in order; longer codes that end in a shorter one (FDUSD/USD) come first.
export const QUOTE_ASSETS = [
  'FDUSD',
  'USDT',
  'USDC',
  'BUSD',
  'TUSD',
  'USDP',
  'BTC',
  'ETH',
  'BNB',
  'EUR',
  'GBP',
  'TRY',
] as const;

const EXCHANGE_ALIASES: Record<string, CanonicalExchange> = {
  binance: 'binance',
  bin: 'binance',
  bybit: 'bybit',
  okx: 'okx',
  okex: 'okx',
  gate: 'gateio',
  'gate.io': 'gateio',
  gateio: 'gateio',
  kucoin: 'kucoin',
  mexc: 'mexc',
  mxc: 'mexc',
};

const PAIR_DELIMITERS = ['/', '-', '_'];

export function normalizeExchange(name: string): CanonicalExchange {
  const key = (name || '').trim().toLowerCase();
  const canonical = Object.prototype.hasOwnProperty.call(EXCHANGE_ALIASES, key)
    ? EXCHANGE_ALIASES[key]
    : undefined;
  if (!canonical) {
    throw new UnknownExchangeError(name);
  }
  return canonical;
}

export function isCanonicalExchange(name: string): name is CanonicalExchange {
  return (CANONICAL_EXCHANGES as readonly string[]).includes(name);
}

/**
 * Parses `BTC/USDT`, `BTCUSDT`, `BTC-USDT`, `BTC_USDT` and prefixed forms
 * such as `BINANCE:BTCUSDT` into a canonical pair.
 */
export function parsePair(symbol: string): CanonicalPair {
  let raw = (symbol || '').trim().toUpperCase();
  const prefixAt = raw.indexOf(':');
  if (prefixAt >= 0) {
    raw = raw.slice(prefixAt + 1);
  }
  if (!raw) {
    throw new UnrecognizedSymbolError(symbol);
  }

  for (const delimiter of PAIR_DELIMITERS) {
    const at = raw.indexOf(delimiter);
    if (at >= 0) {
      const base = raw.slice(0, at);
      const quote = raw.slice(at + 1);
      if (isAssetCode(base) && isAssetCode(quote)) {
        return { base, quote };
      }
      throw new UnrecognizedSymbolError(symbol);
    }
  }

  for (const quote of QUOTE_ASSETS) {
    if (raw.endsWith(quote)) {
      const base = raw.slice(0, raw.length - quote.length);
      if (isAssetCode(base)) {
        return { base, quote };
      }
    }
  }

  throw new UnrecognizedSymbolError(symbol);
}

export function normalizeTarget(exchange: string, symbol: string): SignalTarget {
  return { exchange: normalizeExchange(exchange), ...parsePair(symbol) };
}

export function displayPair(pair: CanonicalPair): string {
  return `${pair.base}/${pair.quote}`;
}

function isAssetCode(value: string): boolean {
  return /^[A-Z0-9]+$/.test(value);
}
