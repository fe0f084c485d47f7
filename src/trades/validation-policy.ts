import { ValidationError } from '../common/errors';
import { roundToStep, toDecimal } from '../common/utils/decimal.util';
import { TradingRuleSpec } from '../exchange/exchange.types';

export const VALIDATION_MODES = ['strict', 'lenient'] as const;

export type ValidationMode = (typeof VALIDATION_MODES)[number];

export interface ValidatedOrder {
  /** Price rounded half-up to the tick size. */
  price: number;
  size: number;
  /** Violations tolerated in lenient mode; always empty in strict mode. */
  warnings: string[];
}

/**
 * Reads VALIDATION_MODE. Unset means strict; anything else that is not a
 * known mode is a configuration error.
 */
export function parseValidationMode(value: string | undefined): ValidationMode {
  const mode = (value ?? '').trim().toLowerCase() || 'strict';
  const known = VALIDATION_MODES.find((m) => m === mode);
  if (!known) {
    throw new Error(`VALIDATION_MODE must be one of ${VALIDATION_MODES.join(', ')}, got "${value}"`);
  }
  return known;
}

export function roundPriceToTick(price: number, tickSize: number): number {
  return roundToStep(toDecimal(price), toDecimal(tickSize)).toNumber();
}

/**
 * Checks an entry against the pair's trading rules. Strict mode throws on
 * the first failing signal with every violation listed.
 */
export function validateOrder(
  price: number,
  size: number,
  rule: TradingRuleSpec,
  mode: ValidationMode,
  context: Record<string, unknown> = {},
): ValidatedOrder {
  const violations: string[] = [];

  if (!(price > 0)) {
    violations.push(`price ${price} must be positive`);
  }
  if (!(size > 0)) {
    violations.push(`size ${size} must be positive`);
  }

  const rounded = price > 0 ? roundPriceToTick(price, rule.tickSize) : price;
  if (price > 0 && !(rounded > 0)) {
    violations.push(`price ${price} rounds to zero at tick size ${rule.tickSize}`);
  }

  if (size > 0 && size < rule.minQuantity) {
    violations.push(`size ${size} is below minimum quantity ${rule.minQuantity}`);
  }

  if (rule.minNotional > 0 && rounded > 0 && size > 0) {
    const notional = toDecimal(rounded).times(size);
    if (notional.lt(rule.minNotional)) {
      violations.push(`notional ${notional.toString()} is below minimum notional ${rule.minNotional}`);
    }
  }

  if (violations.length > 0 && mode === 'strict') {
    throw new ValidationError(violations, context);
  }

  return { price: rounded, size, warnings: violations };
}
