import { validateEnv } from './env.validation';

describe('validateEnv', () => {
  it('should accept an empty environment', () => {
    expect(validateEnv({})).toEqual({});
  });

  it('should accept known values', () => {
    const env = { VALIDATION_MODE: 'lenient', TIMEZONE: 'Europe/Berlin', EXCHANGE_TIMEOUT_MS: '5000' };

    expect(validateEnv(env)).toBe(env);
  });

  it('should reject an unknown validation mode', () => {
    expect(() => validateEnv({ VALIDATION_MODE: 'loose' })).toThrow(
      'VALIDATION_MODE must be one of strict, lenient, got "loose"',
    );
  });

  it('should reject an unknown timezone', () => {
    expect(() => validateEnv({ TIMEZONE: 'Europe/Atlantis' })).toThrow(
      'TIMEZONE must be an IANA timezone name, got "Europe/Atlantis"',
    );
  });

  it('should reject a non-numeric timeout', () => {
    expect(() => validateEnv({ EXCHANGE_TIMEOUT_MS: '10s' })).toThrow('EXCHANGE_TIMEOUT_MS must be a positive integer, got "10s"');
  });
});
