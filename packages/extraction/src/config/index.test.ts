import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { configFromEnv, DEFAULT_CONFIG, resolveConfig } from './index';

describe('Extraction configuration', () => {
  it('should resolve to the defaults without overrides', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should merge overrides per section', () => {
    const config = resolveConfig({ amount: { maxAmount: 50_000 } });
    expect(config.amount.maxAmount).toBe(50_000);
    expect(config.amount.minSignificantAmount).toBe(0.5);
    expect(config.vendor).toEqual(DEFAULT_CONFIG.vendor);
  });

  it('should reject out-of-range values', () => {
    expect(() => resolveConfig({ lineItems: { minTotalPrice: -1 } })).toThrow(ZodError);
    expect(() => resolveConfig({ vendor: { uppercaseRatio: 2 } })).toThrow(ZodError);
  });

  it('should read overrides from the environment', () => {
    expect(
      configFromEnv({
        EXTRACTION_MAX_AMOUNT: '5000',
        EXTRACTION_MIN_LINE_ITEM_TOTAL: '2.5',
        EXTRACTION_MIN_TEXT_LENGTH: 'abc'
      })
    ).toEqual({ amount: { maxAmount: 5000 }, lineItems: { minTotalPrice: 2.5 } });
  });

  it('should return no overrides for an empty environment', () => {
    expect(configFromEnv({})).toEqual({});
  });
});
