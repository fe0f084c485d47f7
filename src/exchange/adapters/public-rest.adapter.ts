import axios from 'axios';
import { ExchangeUnavailableError, SymbolNotFoundError } from '../../common/errors';
import { CanonicalExchange, CanonicalPair } from '../symbol-normalizer';
import { ExchangeAdapter, PriceQuote, TradingRuleSpec } from '../exchange.types';

export type JsonObject = Record<string, unknown>;

export interface HttpFailure {
  status?: number;
  code?: string;
  body?: unknown;
  message: string;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

// Used when an exchange omits a step; one satoshi.
export const DEFAULT_STEP = 0.00000001;

/**
 * Shared plumbing for adapters that read an exchange's public REST market
 * data. No credentials are ever attached.
 */
export abstract class PublicRestAdapter implements ExchangeAdapter {
  abstract readonly exchange: CanonicalExchange;
  protected abstract readonly baseUrl: string;

  constructor(protected readonly timeoutMs: number) {}

  abstract formatSymbol(pair: CanonicalPair): string;
  abstract getPrice(pair: CanonicalPair): Promise<PriceQuote>;
  abstract getRules(pair: CanonicalPair): Promise<TradingRuleSpec>;

  /**
   * True when the failure means the pair does not exist on this exchange.
   */
  protected isUnknownSymbol(failure: HttpFailure): boolean {
    return failure.status === 404;
  }

  protected async publicRequest(path: string, symbol: string, params: JsonObject = {}): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    try {
      const response = await axios.get<unknown>(url, { params, timeout: this.timeoutMs });
      return response.data;
    } catch (error: unknown) {
      const failure = describeHttpFailure(error);
      if (this.isUnknownSymbol(failure)) {
        throw new SymbolNotFoundError(this.exchange, symbol);
      }
      if (failure.code && TIMEOUT_CODES.has(failure.code)) {
        throw new ExchangeUnavailableError(`${this.exchange} timed out after ${this.timeoutMs}ms`, {
          exchange: this.exchange,
          path,
          symbol,
        });
      }
      throw new ExchangeUnavailableError(`${this.exchange} API error: ${failure.message}`, {
        exchange: this.exchange,
        path,
        symbol,
        status: failure.status,
      });
    }
  }

  protected unavailable(message: string, symbol: string): ExchangeUnavailableError {
    return new ExchangeUnavailableError(`${this.exchange} API error: ${message}`, {
      exchange: this.exchange,
      symbol,
    });
  }
}

export function describeHttpFailure(error: unknown): HttpFailure {
  if (!isObject(error)) {
    return { message: String(error) };
  }
  const response = isObject(error.response) ? error.response : undefined;
  return {
    status: response && typeof response.status === 'number' ? response.status : undefined,
    code: typeof error.code === 'string' ? error.code : undefined,
    body: response ? response.data : undefined,
    message: typeof error.message === 'string' ? error.message : 'request failed',
  };
}

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asObject(value: unknown): JsonObject {
  return isObject(value) ? value : {};
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * Reads a numeric field that exchanges send either as a number or a string.
 */
export function num(value: unknown, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/**
 * Reads a millisecond timestamp, falling back to now.
 */
export function instantFromMs(value: unknown): Date {
  const ms = num(value, NaN);
  return Number.isFinite(ms) && ms > 0 ? new Date(ms) : new Date();
}

export function positivePrice(value: unknown): number | null {
  const price = num(value, NaN);
  return Number.isFinite(price) && price > 0 ? price : null;
}
