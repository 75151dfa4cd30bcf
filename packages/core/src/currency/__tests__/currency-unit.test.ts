import { describe, expect, it } from 'vitest';

import { InvalidArgumentError, UnknownCurrencyError } from '../../errors/index.js';
import { CurrencyDataFileSchema, loadCurrencyData } from '../currency-data.js';
import { CurrencyUnit } from '../currency-unit.js';

describe('CurrencyUnit', () => {
  describe('lookup', () => {
    it('returns registered currencies by code', () => {
      const usd = CurrencyUnit.of('USD');

      expect(usd.code).toBe('USD');
      expect(usd.numericCode).toBe(840);
      expect(usd.numeric3Code).toBe('840');
      expect(usd.decimalPlaces).toBe(2);
      expect(usd.isPseudoCurrency()).toBe(false);
      expect(CurrencyUnit.of('USD')).toBe(usd);
    });

    it('pads numeric codes to three digits', () => {
      expect(CurrencyUnit.of('ALL').numeric3Code).toBe('008');
      expect(CurrencyUnit.of('ALL').numericCode).toBe(8);
    });

    it('knows currencies without minor units and pseudo currencies', () => {
      expect(CurrencyUnit.of('JPY').decimalPlaces).toBe(0);
      expect(CurrencyUnit.of('BHD').decimalPlaces).toBe(3);

      const gold = CurrencyUnit.of('XAU');
      expect(gold.isPseudoCurrency()).toBe(true);
      expect(gold.decimalPlaces).toBe(0);
    });

    it('returns an error result for unknown codes', () => {
      const result = CurrencyUnit.lookup('ZZZ');

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toBeInstanceOf(UnknownCurrencyError);
        expect(result.error.requested).toBe('ZZZ');
        expect(result.error.message).toBe("Unknown currency 'ZZZ'");
      }
    });

    it('is case sensitive', () => {
      expect(() => CurrencyUnit.of('usd')).toThrow(UnknownCurrencyError);
    });

    it('finds currencies by numeric code', () => {
      expect(CurrencyUnit.ofNumericCode(978).code).toBe('EUR');
      expect(CurrencyUnit.ofNumericCode('008').code).toBe('ALL');
      expect(CurrencyUnit.lookupByNumericCode(1000).isErr()).toBe(true);
      expect(CurrencyUnit.lookupByNumericCode('12a').isErr()).toBe(true);
    });
  });

  describe('register', () => {
    it('adds a currency without a numeric code', () => {
      const btc = CurrencyUnit.register('BTC', -1, 8);

      expect(btc.decimalPlaces).toBe(8);
      expect(btc.numericCode).toBe(-1);
      expect(btc.numeric3Code).toBe('');
      expect(CurrencyUnit.of('BTC')).toBe(btc);
      expect(CurrencyUnit.register('BTC', -1, 8)).toBe(btc);
    });

    it('rejects conflicting or malformed registrations', () => {
      CurrencyUnit.register('ETH', -1, 18);

      expect(() => CurrencyUnit.register('ETH', -1, 6)).toThrow(InvalidArgumentError);
      expect(() => CurrencyUnit.register('usd', 1, 2)).toThrow(InvalidArgumentError);
      expect(() => CurrencyUnit.register('ABC', 840, 2)).toThrow('Numeric code already registered: 840');
      expect(() => CurrencyUnit.register('ABD', 1, -2)).toThrow(InvalidArgumentError);
    });
  });

  it('lists registered currencies sorted by code', () => {
    const codes = CurrencyUnit.registeredCurrencies().map((unit) => unit.code);

    expect(codes[0]).toBe('AED');
    expect(codes).toEqual([...codes].sort());
  });

  describe('getSymbol', () => {
    it('uses the locale symbol', () => {
      expect(CurrencyUnit.of('USD').getSymbol('en-US')).toBe('$');
      expect(CurrencyUnit.of('GBP').getSymbol('en-US')).toBe('£');
      expect(CurrencyUnit.of('EUR').getSymbol('de-DE')).toBe('€');
    });

    it('falls back to the code for an invalid locale', () => {
      expect(CurrencyUnit.of('USD').getSymbol('not a locale!')).toBe('USD');
    });
  });

  it('serializes as its code', () => {
    expect(JSON.stringify({ currency: CurrencyUnit.of('CHF') })).toBe('{"currency":"CHF"}');
    expect(String(CurrencyUnit.of('CHF'))).toBe('CHF');
    expect(CurrencyUnit.of('CHF').equals(CurrencyUnit.of('CHF'))).toBe(true);
  });
});

describe('currency data', () => {
  it('loads the bundled ISO 4217 list', () => {
    const data = loadCurrencyData();

    expect(data).toHaveLength(161);
    expect(data.find((entry) => entry.code === 'KWD')).toEqual({ code: 'KWD', numericCode: 414, decimalPlaces: 3 });
  });

  it('rejects duplicate codes', () => {
    const result = CurrencyDataFileSchema.safeParse([
      { code: 'AAA', numericCode: 1, decimalPlaces: 2 },
      { code: 'AAA', numericCode: 2, decimalPlaces: 2 },
    ]);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Duplicate currency code AAA');
  });

  it('rejects malformed entries', () => {
    const result = CurrencyDataFileSchema.safeParse([{ code: 'AA', numericCode: 1, decimalPlaces: 2 }]);

    expect(result.success).toBe(false);
    expect(result.error?.issues[0]?.message).toBe('Currency code must be three upper-case letters');
  });
});
