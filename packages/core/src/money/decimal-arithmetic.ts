import { Decimal } from 'decimal.js';

import { InvalidArgumentError, RoundingRequiredError } from '../errors/index.js';

import { RoundingMode } from './rounding-mode.js';

/**
 * A decimal number as an exact (unscaled integer, scale) pair:
 * value = unscaled × 10^-scale
 */
export interface ScaledDecimal {
  readonly unscaled: bigint;
  readonly scale: number;
}

const PLAIN_DECIMAL = /^([+-]?)(\d+)(?:\.(\d*))?$|^([+-]?)\.(\d+)$/;

const powersOfTen: bigint[] = [1n];

/**
 * 10^exponent as a bigint. Small powers are memoised.
 */
export function pow10(exponent: number): bigint {
  if (!Number.isSafeInteger(exponent) || exponent < 0) {
    throw new InvalidArgumentError(`Invalid power of ten: ${String(exponent)}`);
  }
  if (exponent < 64) {
    for (let i = powersOfTen.length; i <= exponent; i++) {
      powersOfTen.push((powersOfTen[i - 1] ?? 1n) * 10n);
    }
    return powersOfTen[exponent] ?? 10n ** BigInt(exponent);
  }
  return 10n ** BigInt(exponent);
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Divides `numerator` by `denominator` to an integer, rounding the discarded
 * fraction according to `mode`.
 */
export function divideAndRound(numerator: bigint, denominator: bigint, mode: RoundingMode): bigint {
  if (denominator === 0n) {
    throw new InvalidArgumentError('Division by zero');
  }

  const quotient = numerator / denominator;
  const remainder = numerator % denominator;
  if (remainder === 0n) {
    return quotient;
  }

  // Sign of the exact quotient; the truncated quotient may be zero
  const sign = numerator < 0n !== denominator < 0n ? -1n : 1n;
  const twiceRemainder = abs(remainder) * 2n;
  const divisor = abs(denominator);
  const half = twiceRemainder === divisor ? 0 : twiceRemainder > divisor ? 1 : -1;

  switch (mode) {
    case RoundingMode.UP:
      return quotient + sign;
    case RoundingMode.DOWN:
      return quotient;
    case RoundingMode.CEILING:
      return sign > 0n ? quotient + 1n : quotient;
    case RoundingMode.FLOOR:
      return sign < 0n ? quotient - 1n : quotient;
    case RoundingMode.HALF_UP:
      return half >= 0 ? quotient + sign : quotient;
    case RoundingMode.HALF_DOWN:
      return half > 0 ? quotient + sign : quotient;
    case RoundingMode.HALF_EVEN:
      if (half > 0) return quotient + sign;
      if (half < 0) return quotient;
      return quotient % 2n === 0n ? quotient : quotient + sign;
    case RoundingMode.UNNECESSARY:
      throw new RoundingRequiredError();
  }
}

/**
 * Re-expresses an unscaled value at a different scale.
 */
export function rescale(unscaled: bigint, fromScale: number, toScale: number, mode: RoundingMode): bigint {
  if (toScale >= fromScale) {
    return unscaled * pow10(toScale - fromScale);
  }
  return divideAndRound(unscaled, pow10(fromScale - toScale), mode);
}

/**
 * Compares two scaled decimals numerically, padding the narrower one with zeros.
 */
export function compareScaled(a: ScaledDecimal, b: ScaledDecimal): -1 | 0 | 1 {
  const scale = Math.max(a.scale, b.scale);
  const left = a.unscaled * pow10(scale - a.scale);
  const right = b.unscaled * pow10(scale - b.scale);
  return left === right ? 0 : left < right ? -1 : 1;
}

/**
 * Removes trailing zero digits from the fraction, never going below scale 0.
 */
export function stripTrailingZeros(value: ScaledDecimal): ScaledDecimal {
  let { unscaled, scale } = value;
  if (unscaled === 0n) {
    return { unscaled: 0n, scale: 0 };
  }
  while (scale > 0 && unscaled % 10n === 0n) {
    unscaled /= 10n;
    scale--;
  }
  return { unscaled, scale };
}

function fromDigits(sign: string, integerDigits: string, fractionDigits: string): ScaledDecimal {
  const magnitude = BigInt(`${integerDigits}${fractionDigits}` || '0');
  return { unscaled: sign === '-' ? -magnitude : magnitude, scale: fractionDigits.length };
}

/**
 * Converts a string, number or Decimal to an exact scaled decimal.
 *
 * Plain decimal strings keep the scale they were written with ('12.50' has scale 2).
 * Anything else goes through decimal.js and takes its shortest exact form.
 */
export function toScaledDecimal(value: Decimal.Value): ScaledDecimal {
  if (typeof value === 'string') {
    const match = PLAIN_DECIMAL.exec(value.trim());
    if (match) {
      if (match[2] !== undefined) {
        return fromDigits(match[1] ?? '', match[2], match[3] ?? '');
      }
      return fromDigits(match[4] ?? '', '', match[5] ?? '');
    }
  }

  let decimal: Decimal;
  try {
    decimal = new Decimal(value);
  } catch (error) {
    throw new InvalidArgumentError(`Invalid decimal value: ${String(value)}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (!decimal.isFinite()) {
    throw new InvalidArgumentError(`Decimal value must be finite: ${String(value)}`);
  }

  const scale = Math.max(decimal.decimalPlaces(), 0);
  const plain = decimal.toFixed(scale);
  const match = PLAIN_DECIMAL.exec(plain);
  if (!match || match[2] === undefined) {
    throw new InvalidArgumentError(`Invalid decimal value: ${String(value)}`);
  }
  return fromDigits(match[1] ?? '', match[2], match[3] ?? '');
}

/**
 * Renders a scaled decimal without exponent notation, e.g. (-5n, 2) → '-0.05'.
 */
export function toPlainString(value: ScaledDecimal): string {
  const negative = value.unscaled < 0n;
  const digits = abs(value.unscaled).toString();
  if (value.scale === 0) {
    return negative ? `-${digits}` : digits;
  }
  const padded = digits.padStart(value.scale + 1, '0');
  const point = padded.length - value.scale;
  const text = `${padded.slice(0, point)}.${padded.slice(point)}`;
  return negative ? `-${text}` : text;
}

/**
 * Converts a scaled decimal to a decimal.js instance without loss.
 */
export function toDecimal(value: ScaledDecimal): Decimal {
  return new Decimal(toPlainString(value));
}
