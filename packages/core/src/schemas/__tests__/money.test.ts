import { describe, expect, it } from 'vitest';

import { BigMoneyJsonSchema, CurrencyCodeSchema, UnscaledValueSchema } from '../money.js';

describe('CurrencyCodeSchema', () => {
  it('accepts three upper-case letters', () => {
    expect(CurrencyCodeSchema.parse('USD')).toBe('USD');
  });

  it('rejects anything else', () => {
    expect(CurrencyCodeSchema.safeParse('usd').success).toBe(false);
    expect(CurrencyCodeSchema.safeParse('USDT').success).toBe(false);
  });
});

describe('UnscaledValueSchema', () => {
  it('normalises strings, numbers and bigints to an integer string', () => {
    expect(UnscaledValueSchema.parse(' -1234 ')).toBe('-1234');
    expect(UnscaledValueSchema.parse(42)).toBe('42');
    expect(UnscaledValueSchema.parse(12345678901234567890n)).toBe('12345678901234567890');
  });

  it('rejects fractions', () => {
    expect(UnscaledValueSchema.safeParse('1.5').success).toBe(false);
    expect(UnscaledValueSchema.safeParse(1.5).success).toBe(false);
  });
});

describe('BigMoneyJsonSchema', () => {
  it('parses the primitive fields', () => {
    expect(BigMoneyJsonSchema.parse({ currency: 'EUR', scale: 2, unscaledValue: '995' })).toEqual({
      currency: 'EUR',
      scale: 2,
      unscaledValue: '995',
    });
  });

  it('rejects a negative scale', () => {
    const result = BigMoneyJsonSchema.safeParse({ currency: 'EUR', scale: -1, unscaledValue: '1' });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.path).toEqual(['scale']);
  });
});
