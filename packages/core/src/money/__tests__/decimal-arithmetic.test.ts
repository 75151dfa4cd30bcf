import { describe, expect, it } from 'vitest';

import { InvalidArgumentError, RoundingRequiredError } from '../../errors/index.js';
import {
  compareScaled,
  divideAndRound,
  pow10,
  rescale,
  stripTrailingZeros,
  toPlainString,
  toScaledDecimal,
} from '../decimal-arithmetic.js';
import { RoundingMode } from '../rounding-mode.js';

describe('divideAndRound', () => {
  // value × 10 → expected integer per mode: UP, DOWN, CEILING, FLOOR, HALF_UP, HALF_DOWN, HALF_EVEN
  const table: [bigint, bigint[]][] = [
    [55n, [6n, 5n, 6n, 5n, 6n, 5n, 6n]],
    [25n, [3n, 2n, 3n, 2n, 3n, 2n, 2n]],
    [16n, [2n, 1n, 2n, 1n, 2n, 2n, 2n]],
    [11n, [2n, 1n, 2n, 1n, 1n, 1n, 1n]],
    [-11n, [-2n, -1n, -1n, -2n, -1n, -1n, -1n]],
    [-16n, [-2n, -1n, -1n, -2n, -2n, -2n, -2n]],
    [-25n, [-3n, -2n, -2n, -3n, -3n, -2n, -2n]],
    [-55n, [-6n, -5n, -5n, -6n, -6n, -5n, -6n]],
  ];
  const modes = [
    RoundingMode.UP,
    RoundingMode.DOWN,
    RoundingMode.CEILING,
    RoundingMode.FLOOR,
    RoundingMode.HALF_UP,
    RoundingMode.HALF_DOWN,
    RoundingMode.HALF_EVEN,
  ];

  for (const [tenths, expected] of table) {
    it(`rounds ${String(tenths)}/10 in every mode`, () => {
      const actual = modes.map((mode) => divideAndRound(tenths, 10n, mode));
      expect(actual).toEqual(expected);
    });
  }

  it('returns exact quotients for every mode including UNNECESSARY', () => {
    expect(divideAndRound(30n, 10n, RoundingMode.UNNECESSARY)).toBe(3n);
    expect(divideAndRound(-30n, 10n, RoundingMode.UP)).toBe(-3n);
  });

  it('fails with UNNECESSARY when digits would be dropped', () => {
    expect(() => divideAndRound(31n, 10n, RoundingMode.UNNECESSARY)).toThrow(RoundingRequiredError);
  });

  it('handles a negative denominator', () => {
    expect(divideAndRound(5n, -2n, RoundingMode.FLOOR)).toBe(-3n);
    expect(divideAndRound(5n, -2n, RoundingMode.CEILING)).toBe(-2n);
  });

  it('rejects division by zero', () => {
    expect(() => divideAndRound(1n, 0n, RoundingMode.DOWN)).toThrow(InvalidArgumentError);
  });
});

describe('rescale', () => {
  it('pads with zeros when widening', () => {
    expect(rescale(1234n, 2, 4, RoundingMode.UNNECESSARY)).toBe(123400n);
  });

  it('rounds when narrowing', () => {
    expect(rescale(1235n, 2, 1, RoundingMode.HALF_EVEN)).toBe(124n);
    expect(rescale(1245n, 2, 1, RoundingMode.HALF_EVEN)).toBe(124n);
  });
});

describe('pow10', () => {
  it('computes small and large powers', () => {
    expect(pow10(0)).toBe(1n);
    expect(pow10(3)).toBe(1000n);
    expect(pow10(70)).toBe(10n ** 70n);
  });

  it('rejects negative exponents', () => {
    expect(() => pow10(-1)).toThrow(InvalidArgumentError);
  });
});

describe('toScaledDecimal', () => {
  it('keeps the written scale of plain strings', () => {
    expect(toScaledDecimal('12.50')).toEqual({ unscaled: 1250n, scale: 2 });
    expect(toScaledDecimal('-0.05')).toEqual({ unscaled: -5n, scale: 2 });
    expect(toScaledDecimal('+7')).toEqual({ unscaled: 7n, scale: 0 });
    expect(toScaledDecimal('.5')).toEqual({ unscaled: 5n, scale: 1 });
    expect(toScaledDecimal('12.')).toEqual({ unscaled: 12n, scale: 0 });
  });

  it('uses the shortest exact form for numbers', () => {
    expect(toScaledDecimal(12.5)).toEqual({ unscaled: 125n, scale: 1 });
    expect(toScaledDecimal(3)).toEqual({ unscaled: 3n, scale: 0 });
  });

  it('expands exponent notation', () => {
    expect(toScaledDecimal('1e3')).toEqual({ unscaled: 1000n, scale: 0 });
    expect(toScaledDecimal('1.5e-3')).toEqual({ unscaled: 15n, scale: 4 });
  });

  it('rejects malformed and non-finite values', () => {
    expect(() => toScaledDecimal('abc')).toThrow(InvalidArgumentError);
    expect(() => toScaledDecimal(Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => toScaledDecimal('Infinity')).toThrow(InvalidArgumentError);
  });
});

describe('toPlainString', () => {
  it('renders without exponent notation', () => {
    expect(toPlainString({ unscaled: -5n, scale: 2 })).toBe('-0.05');
    expect(toPlainString({ unscaled: 1234567n, scale: 0 })).toBe('1234567');
    expect(toPlainString({ unscaled: 0n, scale: 3 })).toBe('0.000');
    expect(toPlainString({ unscaled: 123456789n, scale: 2 })).toBe('1234567.89');
  });
});

describe('compareScaled', () => {
  it('compares across scales without loss', () => {
    expect(compareScaled({ unscaled: 100n, scale: 2 }, { unscaled: 1n, scale: 0 })).toBe(0);
    expect(compareScaled({ unscaled: 101n, scale: 2 }, { unscaled: 10n, scale: 1 })).toBe(1);
    expect(compareScaled({ unscaled: -1n, scale: 0 }, { unscaled: -999n, scale: 3 })).toBe(-1);
  });
});

describe('stripTrailingZeros', () => {
  it('drops trailing fraction zeros only', () => {
    expect(stripTrailingZeros({ unscaled: 1200n, scale: 3 })).toEqual({ unscaled: 12n, scale: 1 });
    expect(stripTrailingZeros({ unscaled: 1000n, scale: 0 })).toEqual({ unscaled: 1000n, scale: 0 });
    expect(stripTrailingZeros({ unscaled: 0n, scale: 5 })).toEqual({ unscaled: 0n, scale: 0 });
  });
});
