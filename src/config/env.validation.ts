import { parseValidationMode } from '../trades/validation-policy';
import { isValidTimeZone } from '../common/utils/time.util';

/**
 * Fails startup on settings that would otherwise be silently misread.
 */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const text = (key: string): string | undefined => {
    const value = config[key];
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
  };

  parseValidationMode(text('VALIDATION_MODE'));

  const timezone = text('TIMEZONE');
  if (timezone && !isValidTimeZone(timezone)) {
    throw new Error(`TIMEZONE must be an IANA timezone name, got "${timezone}"`);
  }

  for (const key of ['PORT', 'EXCHANGE_TIMEOUT_MS', 'SYMBOL_RULE_TTL_MINUTES', 'REDIS_PORT', 'DB_PORT']) {
    const value = text(key);
    if (value !== undefined && !/^\d+$/.test(value)) {
      throw new Error(`${key} must be a positive integer, got "${value}"`);
    }
  }
  return config;
}
