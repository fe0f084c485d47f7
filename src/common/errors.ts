/**
 * Domain error hierarchy.
 *
 * Every error carries a kind that decides how the HTTP layer answers and
 * whether the caller may retry. Duplicate deliveries are not errors and never
 * surface through this hierarchy.
 */
export type ErrorKind = 'input' | 'validation' | 'upstream' | 'state';

export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly code: string;
  readonly retryable: boolean = false;

  constructor(
    message: string,
    readonly context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      kind: this.kind,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    };
  }
}

export class MalformedSignalError extends DomainError {
  readonly kind = 'input';
  readonly code = 'MALFORMED_SIGNAL';
}

export class UnrecognizedSymbolError extends DomainError {
  readonly kind = 'input';
  readonly code = 'UNRECOGNIZED_SYMBOL';

  constructor(symbol: string) {
    super(`Cannot isolate a quote asset in symbol "${symbol}"`, { symbol });
  }
}

export class UnknownExchangeError extends DomainError {
  readonly kind = 'input';
  readonly code = 'UNKNOWN_EXCHANGE';

  constructor(exchange: string) {
    super(`Unknown exchange "${exchange}"`, { exchange });
  }
}

export class InvalidPyramidIndexError extends DomainError {
  readonly kind = 'input';
  readonly code = 'INVALID_PYRAMID_INDEX';

  constructor(index: unknown) {
    super(`Pyramid index must be an integer from 1 to 5, got ${String(index)}`, { index });
  }
}

export class InvalidReportRequestError extends DomainError {
  readonly kind = 'input';
  readonly code = 'INVALID_REPORT_REQUEST';
}

export class ValidationError extends DomainError {
  readonly kind = 'validation';
  readonly code = 'RULE_VIOLATION';

  constructor(
    readonly violations: string[],
    context: Record<string, unknown> = {},
  ) {
    super(`Trading rule violation: ${violations.join('; ')}`, { ...context, violations });
  }
}

export class ExchangeUnavailableError extends DomainError {
  readonly kind = 'upstream';
  readonly code = 'EXCHANGE_UNAVAILABLE';
  override readonly retryable = true;
}

export class SymbolNotFoundError extends DomainError {
  readonly kind = 'upstream';
  readonly code = 'SYMBOL_NOT_FOUND';

  constructor(exchange: string, symbol: string) {
    super(`Symbol ${symbol} not found on ${exchange}`, { exchange, symbol });
  }
}

export class NoOpenTradeError extends DomainError {
  readonly kind = 'state';
  readonly code = 'NO_OPEN_TRADE';

  constructor(exchange: string, pair: string) {
    super(`No open trade for ${pair} on ${exchange}`, { exchange, pair });
  }
}

export class TradeConflictError extends DomainError {
  readonly kind = 'state';
  readonly code = 'TRADE_CONFLICT';
  override readonly retryable = true;
}
