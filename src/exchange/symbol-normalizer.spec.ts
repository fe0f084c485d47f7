import { UnknownExchangeError, UnrecognizedSymbolError } from '../common/errors';
import { displayPair, normalizeExchange, normalizeTarget, parsePair } from './symbol-normalizer';

describe('symbol-normalizer', () => {
  describe('normalizeTarget', () => {
    it.each(['BTC/USDT', 'BTCUSDT', 'BTC-USDT', 'BTC_USDT', 'BINANCE:BTCUSDT', 'binance:btc/usdt', ' btcusdt '])(
      'should normalize %s on binance to BTC/USDT',
      (symbol) => {
        expect(normalizeTarget('Binance', symbol)).toEqual({ exchange: 'binance', base: 'BTC', quote: 'USDT' });
      },
    );
  });

  describe('parsePair', () => {
    it('should split on the first delimiter', () => {
      expect(parsePair('ETH/BTC')).toEqual({ base: 'ETH', quote: 'BTC' });
    });

    it('should detect a quote suffix when no delimiter is present', () => {
      expect(parsePair('SOLUSDC')).toEqual({ base: 'SOL', quote: 'USDC' });
      expect(parsePair('ETHBTC')).toEqual({ base: 'ETH', quote: 'BTC' });
    });

    it('should prefer FDUSD over a shorter suffix', () => {
      expect(parsePair('BTCFDUSD')).toEqual({ base: 'BTC', quote: 'FDUSD' });
    });

    it('should reject a symbol with no known quote asset', () => {
      expect(() => parsePair('FOOBAR')).toThrow(UnrecognizedSymbolError);
    });

    it('should reject a bare quote asset', () => {
      expect(() => parsePair('USDT')).toThrow(UnrecognizedSymbolError);
    });

    it('should reject an empty side around a delimiter', () => {
      expect(() => parsePair('BTC/')).toThrow(UnrecognizedSymbolError);
      expect(() => parsePair('-USDT')).toThrow(UnrecognizedSymbolError);
    });

    it('should reject an empty symbol', () => {
      expect(() => parsePair('')).toThrow(UnrecognizedSymbolError);
      expect(() => parsePair('BINANCE:')).toThrow(UnrecognizedSymbolError);
    });
  });

  describe('normalizeExchange', () => {
    it.each([
      ['okex', 'okx'],
      ['OKX', 'okx'],
      ['gate.io', 'gateio'],
      ['gate', 'gateio'],
      ['mxc', 'mexc'],
      ['bin', 'binance'],
      [' Bybit ', 'bybit'],
      ['kucoin', 'kucoin'],
    ])('should map %s to %s', (alias, canonical) => {
      expect(normalizeExchange(alias)).toBe(canonical);
    });

    it('should reject an unmapped alias', () => {
      expect(() => normalizeExchange('kraken')).toThrow(UnknownExchangeError);
    });

    it('should not resolve object prototype keys', () => {
      expect(() => normalizeExchange('constructor')).toThrow(UnknownExchangeError);
    });
  });

  it('should display a pair with a slash', () => {
    expect(displayPair({ base: 'ETH', quote: 'USDT' })).toBe('ETH/USDT');
  });
});
