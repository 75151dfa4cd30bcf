import type { Decimal } from 'decimal.js';

import { CurrencyUnit } from '../currency/currency-unit.js';
import { CurrencyMismatchError, InvalidArgumentError } from '../errors/index.js';
import { BigMoneyJsonSchema } from '../schemas/money.js';

import type { BigMoneyProvider } from './big-money-provider.js';
import {
  compareScaled,
  divideAndRound,
  pow10,
  rescale,
  stripTrailingZeros,
  toDecimal,
  toPlainString,
  toScaledDecimal,
  type ScaledDecimal,
} from './decimal-arithmetic.js';
import { RoundingMode } from './rounding-mode.js';

const PLAIN_AMOUNT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;

function checkScale(scale: number): void {
  if (!Number.isSafeInteger(scale) || scale < 0) {
    throw new InvalidArgumentError(`Scale must be a non-negative integer: ${String(scale)}`, { scale });
  }
}

function toBigInt(value: bigint | number, label: string): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`${label} must be an integer: ${String(value)}`);
  }
  return BigInt(value);
}

/**
 * An amount of money with arbitrary precision: `unscaledValue × 10^-scale` in `currency`.
 *
 * Unlike `Money`, the scale is not tied to the currency, so `USD 12.3456` is valid.
 * Instances are immutable and every operation returns a new value. Arithmetic is
 * exact; operations that have to drop digits take an explicit `RoundingMode`.
 */
export class BigMoney implements BigMoneyProvider {
  /**
   * Builds an amount from its three primitive fields.
   */
  static ofScale(currency: CurrencyUnit, unscaledValue: bigint | number, scale: number): BigMoney {
    checkScale(scale);
    return new BigMoney(currency, toBigInt(unscaledValue, 'Unscaled value'), scale);
  }

  /**
   * Builds an amount from a decimal value. A plain decimal string keeps its written
   * scale, so `'12.50'` has scale 2.
   */
  static of(currency: CurrencyUnit, amount: Decimal.Value): BigMoney {
    return BigMoney.fromScaled(currency, toScaledDecimal(amount));
  }

  /**
   * A whole number of major units, e.g. 25 dollars, at scale 0.
   */
  static ofMajor(currency: CurrencyUnit, amountMajor: bigint | number): BigMoney {
    return new BigMoney(currency, toBigInt(amountMajor, 'Major amount'), 0);
  }

  /**
   * An amount in minor units, e.g. 2595 cents, at the currency scale.
   */
  static ofMinor(currency: CurrencyUnit, amountMinor: bigint | number): BigMoney {
    return new BigMoney(currency, toBigInt(amountMinor, 'Minor amount'), currency.decimalPlaces);
  }

  static zero(currency: CurrencyUnit, scale = 0): BigMoney {
    checkScale(scale);
    return new BigMoney(currency, 0n, scale);
  }

  /**
   * Sums one or more amounts of the same currency.
   * @throws CurrencyMismatchError if the currencies differ
   */
  static total(first: BigMoneyProvider, ...rest: BigMoneyProvider[]): BigMoney {
    return rest.reduce<BigMoney>((sum, money) => sum.plus(money), BigMoney.from(first));
  }

  /**
   * Sums any number of amounts, returning zero for an empty list.
   */
  static totalOf(currency: CurrencyUnit, monies: Iterable<BigMoneyProvider>): BigMoney {
    let sum = BigMoney.zero(currency);
    for (const money of monies) {
      sum = sum.plus(money);
    }
    return sum;
  }

  /**
   * Parses the `toString` form, such as `'USD 25.95'`. Spaces between the code and
   * the amount are optional.
   */
  static parse(text: string): BigMoney {
    const match = /^([A-Z]{3}) *(.*)$/.exec(text);
    const code = match?.[1];
    const amount = match?.[2];
    if (code === undefined || amount === undefined || !PLAIN_AMOUNT.test(amount)) {
      throw new InvalidArgumentError(`Money '${text}' cannot be parsed`, { text });
    }
    return BigMoney.of(CurrencyUnit.of(code), amount);
  }

  /**
   * Rebuilds an amount from its `toJSON` form.
   * @throws InvalidArgumentError if the input does not have the expected shape
   */
  static fromJSON(json: unknown): BigMoney {
    const result = BigMoneyJsonSchema.safeParse(json);
    if (!result.success) {
      throw new InvalidArgumentError(
        `Invalid money JSON: ${result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`
      );
    }
    const { currency, scale, unscaledValue } = result.data;
    return new BigMoney(CurrencyUnit.of(currency), BigInt(unscaledValue), scale);
  }

  static from(provider: BigMoneyProvider): BigMoney {
    return provider instanceof BigMoney ? provider : provider.toBigMoney();
  }

  private static fromScaled(currency: CurrencyUnit, value: ScaledDecimal): BigMoney {
    return new BigMoney(currency, value.unscaled, value.scale);
  }

  private constructor(
    readonly currency: CurrencyUnit,
    readonly unscaledValue: bigint,
    readonly scale: number
  ) {}

  toBigMoney(): BigMoney {
    return this;
  }

  // ---------------------------------------------------------------------------
  // Scale

  /**
   * Re-expresses the amount at `scale`, rounding if digits are dropped.
   * @throws RoundingRequiredError with the default mode if rounding is needed
   */
  withScale(scale: number, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): BigMoney {
    checkScale(scale);
    if (scale === this.scale) return this;
    return new BigMoney(this.currency, rescale(this.unscaledValue, this.scale, scale, roundingMode), scale);
  }

  withCurrencyScale(roundingMode: RoundingMode = RoundingMode.UNNECESSARY): BigMoney {
    return this.withScale(this.currency.decimalPlaces, roundingMode);
  }

  isCurrencyScale(): boolean {
    return this.scale === this.currency.decimalPlaces;
  }

  /**
   * Rounds to `scale` decimal places while keeping the current scale, so
   * `USD 45.23` rounded to 1 place is `USD 45.20`. A negative `scale` rounds to
   * tens, hundreds and so on. Scales at or above the current one return this.
   */
  rounded(scale: number, roundingMode: RoundingMode): BigMoney {
    if (!Number.isSafeInteger(scale)) {
      throw new InvalidArgumentError(`Scale must be an integer: ${String(scale)}`, { scale });
    }
    if (scale >= this.scale) return this;
    const step = pow10(this.scale - scale);
    const unscaled = divideAndRound(this.unscaledValue, step, roundingMode) * step;
    return unscaled === this.unscaledValue ? this : new BigMoney(this.currency, unscaled, this.scale);
  }

  stripTrailingZeros(): BigMoney {
    const stripped = stripTrailingZeros(this.toScaled());
    return stripped.scale === this.scale ? this : BigMoney.fromScaled(this.currency, stripped);
  }

  // ---------------------------------------------------------------------------
  // Addition and subtraction

  /**
   * Adds an amount in the same currency. The result has the larger of the two
   * scales and is always exact.
   * @throws CurrencyMismatchError if the currencies differ
   */
  plus(other: BigMoneyProvider): BigMoney {
    const money = this.checkCurrency(other);
    return this.add(money.toScaled());
  }

  plusAmount(amount: Decimal.Value): BigMoney {
    return this.add(toScaledDecimal(amount));
  }

  plusMajor(amountMajor: bigint | number): BigMoney {
    return this.add({ unscaled: toBigInt(amountMajor, 'Major amount'), scale: 0 });
  }

  plusMinor(amountMinor: bigint | number): BigMoney {
    return this.add({ unscaled: toBigInt(amountMinor, 'Minor amount'), scale: this.currency.decimalPlaces });
  }

  /**
   * Subtracts an amount in the same currency, exactly.
   * @throws CurrencyMismatchError if the currencies differ
   */
  minus(other: BigMoneyProvider): BigMoney {
    const money = this.checkCurrency(other);
    return this.add(negate(money.toScaled()));
  }

  minusAmount(amount: Decimal.Value): BigMoney {
    return this.add(negate(toScaledDecimal(amount)));
  }

  minusMajor(amountMajor: bigint | number): BigMoney {
    return this.plusMajor(-toBigInt(amountMajor, 'Major amount'));
  }

  minusMinor(amountMinor: bigint | number): BigMoney {
    return this.plusMinor(-toBigInt(amountMinor, 'Minor amount'));
  }

  // ---------------------------------------------------------------------------
  // Multiplication and division

  /**
   * Multiplies exactly; the result scale is the sum of both scales. With a
   * rounding mode the product is rounded back to this amount's scale instead.
   */
  multipliedBy(factor: Decimal.Value, roundingMode?: RoundingMode): BigMoney {
    const scaled = toScaledDecimal(factor);
    if (scaled.unscaled === 1n && scaled.scale === 0) return this;
    const product = new BigMoney(this.currency, this.unscaledValue * scaled.unscaled, this.scale + scaled.scale);
    return roundingMode === undefined ? product : product.withScale(this.scale, roundingMode);
  }

  /**
   * Multiplies and rounds the product back to this amount's scale.
   */
  multiplyRetainScale(factor: Decimal.Value, roundingMode: RoundingMode): BigMoney {
    return this.multipliedBy(factor, roundingMode);
  }

  /**
   * Divides, keeping this amount's scale. Exact decimal division often does not
   * terminate, so the rounding mode is required.
   * @throws InvalidArgumentError when dividing by zero
   * @throws RoundingRequiredError with UNNECESSARY when the quotient is inexact at this scale
   */
  dividedBy(divisor: Decimal.Value, roundingMode: RoundingMode): BigMoney {
    const scaled = toScaledDecimal(divisor);
    if (scaled.unscaled === 0n) {
      throw new InvalidArgumentError('Cannot divide by zero');
    }
    if (scaled.unscaled === 1n && scaled.scale === 0) return this;

    // this / divisor at this.scale: unscaled × 10^divisorScale / divisorUnscaled
    const unscaled = divideAndRound(this.unscaledValue * pow10(scaled.scale), scaled.unscaled, roundingMode);
    return new BigMoney(this.currency, unscaled, this.scale);
  }

  // ---------------------------------------------------------------------------
  // Conversion

  /**
   * Converts to another currency by multiplying by `conversionRate`, exactly.
   * With a rounding mode the product keeps this amount's scale instead.
   * @throws InvalidArgumentError if the currency is unchanged or the rate is not positive
   */
  convertedTo(currency: CurrencyUnit, conversionRate: Decimal.Value, roundingMode?: RoundingMode): BigMoney {
    const rate = this.checkConversion(currency, conversionRate);
    const product = new BigMoney(currency, this.unscaledValue * rate.unscaled, this.scale + rate.scale);
    return roundingMode === undefined ? product : product.withScale(this.scale, roundingMode);
  }

  /**
   * Converts to another currency, rounding the product to this amount's scale.
   */
  convertRetainScale(currency: CurrencyUnit, conversionRate: Decimal.Value, roundingMode: RoundingMode): BigMoney {
    return this.convertedTo(currency, conversionRate, roundingMode);
  }

  withCurrencyUnit(currency: CurrencyUnit): BigMoney {
    return currency === this.currency ? this : new BigMoney(currency, this.unscaledValue, this.scale);
  }

  withAmount(amount: Decimal.Value): BigMoney {
    return BigMoney.of(this.currency, amount);
  }

  // ---------------------------------------------------------------------------
  // Sign

  negated(): BigMoney {
    return this.isZero() ? this : new BigMoney(this.currency, -this.unscaledValue, this.scale);
  }

  abs(): BigMoney {
    return this.isNegative() ? this.negated() : this;
  }

  isZero(): boolean {
    return this.unscaledValue === 0n;
  }

  isPositive(): boolean {
    return this.unscaledValue > 0n;
  }

  isPositiveOrZero(): boolean {
    return this.unscaledValue >= 0n;
  }

  isNegative(): boolean {
    return this.unscaledValue < 0n;
  }

  isNegativeOrZero(): boolean {
    return this.unscaledValue <= 0n;
  }

  // ---------------------------------------------------------------------------
  // Comparison

  isSameCurrency(other: BigMoneyProvider): boolean {
    return this.currency.equals(BigMoney.from(other).currency);
  }

  /**
   * Numeric comparison ignoring scale, so `USD 1.0` equals `USD 1.00`.
   * @throws CurrencyMismatchError if the currencies differ
   */
  compareTo(other: BigMoneyProvider): -1 | 0 | 1 {
    const money = this.checkCurrency(other);
    return compareScaled(this.toScaled(), money.toScaled());
  }

  isEqual(other: BigMoneyProvider): boolean {
    return this.compareTo(other) === 0;
  }

  isGreaterThan(other: BigMoneyProvider): boolean {
    return this.compareTo(other) > 0;
  }

  isGreaterThanOrEqual(other: BigMoneyProvider): boolean {
    return this.compareTo(other) >= 0;
  }

  isLessThan(other: BigMoneyProvider): boolean {
    return this.compareTo(other) < 0;
  }

  isLessThanOrEqual(other: BigMoneyProvider): boolean {
    return this.compareTo(other) <= 0;
  }

  /**
   * Structural equality: same currency, unscaled value and scale. `USD 1.0` and
   * `USD 1.00` are not equal here; use `isEqual` for numeric equality.
   */
  equals(other: unknown): boolean {
    return (
      other instanceof BigMoney &&
      this.currency.equals(other.currency) &&
      this.unscaledValue === other.unscaledValue &&
      this.scale === other.scale
    );
  }

  // ---------------------------------------------------------------------------
  // Views

  /**
   * Whole major units, truncated towards zero.
   */
  getAmountMajor(): bigint {
    return rescale(this.unscaledValue, this.scale, 0, RoundingMode.DOWN);
  }

  /**
   * The amount in minor units at the currency scale, truncated towards zero.
   */
  getAmountMinor(): bigint {
    return rescale(this.unscaledValue, this.scale, this.currency.decimalPlaces, RoundingMode.DOWN);
  }

  /**
   * The minor part alone, e.g. 95 for `USD 25.95` and -95 for `USD -25.95`.
   */
  getMinorPart(): number {
    return Number(this.getAmountMinor() % pow10(this.currency.decimalPlaces));
  }

  toDecimal(): Decimal {
    return toDecimal(this.toScaled());
  }

  /**
   * The amount without exponent notation, e.g. `'-0.05'`.
   */
  toPlainString(): string {
    return toPlainString(this.toScaled());
  }

  toString(): string {
    return `${this.currency.code} ${this.toPlainString()}`;
  }

  toJSON(): { currency: string; scale: number; unscaledValue: string } {
    return {
      currency: this.currency.code,
      scale: this.scale,
      unscaledValue: this.unscaledValue.toString(),
    };
  }

  private toScaled(): ScaledDecimal {
    return { unscaled: this.unscaledValue, scale: this.scale };
  }

  private add(amount: ScaledDecimal): BigMoney {
    if (amount.unscaled === 0n && amount.scale <= this.scale) return this;
    const scale = Math.max(this.scale, amount.scale);
    const unscaled = this.unscaledValue * pow10(scale - this.scale) + amount.unscaled * pow10(scale - amount.scale);
    return new BigMoney(this.currency, unscaled, scale);
  }

  private checkCurrency(other: BigMoneyProvider): BigMoney {
    const money = BigMoney.from(other);
    if (!this.currency.equals(money.currency)) {
      throw new CurrencyMismatchError(this.currency, money.currency);
    }
    return money;
  }

  private checkConversion(currency: CurrencyUnit, conversionRate: Decimal.Value): ScaledDecimal {
    if (currency.equals(this.currency)) {
      throw new InvalidArgumentError(`Cannot convert to the same currency: ${currency.code}`);
    }
    const rate = toScaledDecimal(conversionRate);
    if (rate.unscaled <= 0n) {
      throw new InvalidArgumentError(`Conversion rate must be positive: ${toPlainString(rate)}`);
    }
    return rate;
  }
}

function negate(value: ScaledDecimal): ScaledDecimal {
  return { unscaled: -value.unscaled, scale: value.scale };
}
