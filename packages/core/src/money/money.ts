import type { Decimal } from 'decimal.js';

import type { CurrencyUnit } from '../currency/currency-unit.js';

import { BigMoney } from './big-money.js';
import type { BigMoneyProvider } from './big-money-provider.js';
import { RoundingMode } from './rounding-mode.js';

/**
 * An amount of money held at its currency's default scale: `USD 12.34`,
 * `JPY 1200`, `BHD 1.250`.
 *
 * Every operation that would produce a different scale rounds back to the
 * currency scale. The rounding mode defaults to `UNNECESSARY`, so an inexact
 * result fails with `RoundingRequiredError` unless the caller chooses a mode.
 */
export class Money implements BigMoneyProvider {
  static of(currency: CurrencyUnit, amount: Decimal.Value, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return new Money(BigMoney.of(currency, amount).withCurrencyScale(roundingMode));
  }

  static ofMajor(currency: CurrencyUnit, amountMajor: bigint | number): Money {
    return new Money(BigMoney.ofMajor(currency, amountMajor).withCurrencyScale());
  }

  static ofMinor(currency: CurrencyUnit, amountMinor: bigint | number): Money {
    return new Money(BigMoney.ofMinor(currency, amountMinor));
  }

  static zero(currency: CurrencyUnit): Money {
    return new Money(BigMoney.zero(currency, currency.decimalPlaces));
  }

  /**
   * Sums one or more amounts of the same currency.
   * @throws CurrencyMismatchError if the currencies differ
   */
  static total(first: Money, ...rest: Money[]): Money {
    return rest.reduce<Money>((sum, money) => sum.plus(money), first);
  }

  static totalOf(currency: CurrencyUnit, monies: Iterable<Money>): Money {
    let sum = Money.zero(currency);
    for (const money of monies) {
      sum = sum.plus(money);
    }
    return sum;
  }

  /**
   * Parses the `toString` form, such as `'USD 25.95'`.
   * @throws RoundingRequiredError if the amount has more digits than the currency allows
   */
  static parse(text: string): Money {
    return Money.from(BigMoney.parse(text));
  }

  static fromJSON(json: unknown, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return Money.from(BigMoney.fromJSON(json), roundingMode);
  }

  /**
   * Converts any provider, rounding to the currency scale.
   */
  static from(provider: BigMoneyProvider, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    if (provider instanceof Money) return provider;
    return new Money(BigMoney.from(provider).withCurrencyScale(roundingMode));
  }

  private constructor(private readonly money: BigMoney) {}

  get currency(): CurrencyUnit {
    return this.money.currency;
  }

  /**
   * The amount in minor units; equal to `getAmountMinor()` since the scale is fixed.
   */
  get unscaledValue(): bigint {
    return this.money.unscaledValue;
  }

  get scale(): number {
    return this.money.scale;
  }

  toBigMoney(): BigMoney {
    return this.money;
  }

  /**
   * Always a no-op: the amount is already at its currency scale.
   */
  withCurrencyScale(_roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this;
  }

  /**
   * Rounds to `scale` decimal places, keeping the currency scale.
   */
  rounded(scale: number, roundingMode: RoundingMode): Money {
    return this.with(this.money.rounded(scale, roundingMode));
  }

  plus(other: Money): Money {
    return this.with(this.money.plus(other));
  }

  plusAmount(amount: Decimal.Value, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this.with(this.money.plusAmount(amount), roundingMode);
  }

  plusMajor(amountMajor: bigint | number): Money {
    return this.with(this.money.plusMajor(amountMajor));
  }

  plusMinor(amountMinor: bigint | number): Money {
    return this.with(this.money.plusMinor(amountMinor));
  }

  minus(other: Money): Money {
    return this.with(this.money.minus(other));
  }

  minusAmount(amount: Decimal.Value, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this.with(this.money.minusAmount(amount), roundingMode);
  }

  minusMajor(amountMajor: bigint | number): Money {
    return this.with(this.money.minusMajor(amountMajor));
  }

  minusMinor(amountMinor: bigint | number): Money {
    return this.with(this.money.minusMinor(amountMinor));
  }

  multipliedBy(factor: Decimal.Value, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this.with(this.money.multiplyRetainScale(factor, roundingMode));
  }

  dividedBy(divisor: Decimal.Value, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this.with(this.money.dividedBy(divisor, roundingMode));
  }

  /**
   * Converts to another currency and rounds to that currency's scale.
   * @throws InvalidArgumentError if the currency is unchanged or the rate is not positive
   */
  convertedTo(
    currency: CurrencyUnit,
    conversionRate: Decimal.Value,
    roundingMode: RoundingMode = RoundingMode.UNNECESSARY
  ): Money {
    return this.with(this.money.convertedTo(currency, conversionRate), roundingMode);
  }

  /**
   * Relabels the amount, rounding if the new currency has fewer fraction digits.
   */
  withCurrencyUnit(currency: CurrencyUnit, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this.with(this.money.withCurrencyUnit(currency), roundingMode);
  }

  withAmount(amount: Decimal.Value, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return this.with(this.money.withAmount(amount), roundingMode);
  }

  negated(): Money {
    return this.with(this.money.negated());
  }

  abs(): Money {
    return this.with(this.money.abs());
  }

  isZero(): boolean {
    return this.money.isZero();
  }

  isPositive(): boolean {
    return this.money.isPositive();
  }

  isPositiveOrZero(): boolean {
    return this.money.isPositiveOrZero();
  }

  isNegative(): boolean {
    return this.money.isNegative();
  }

  isNegativeOrZero(): boolean {
    return this.money.isNegativeOrZero();
  }

  isSameCurrency(other: BigMoneyProvider): boolean {
    return this.money.isSameCurrency(other);
  }

  compareTo(other: BigMoneyProvider): -1 | 0 | 1 {
    return this.money.compareTo(other);
  }

  isEqual(other: BigMoneyProvider): boolean {
    return this.money.isEqual(other);
  }

  isGreaterThan(other: BigMoneyProvider): boolean {
    return this.money.isGreaterThan(other);
  }

  isGreaterThanOrEqual(other: BigMoneyProvider): boolean {
    return this.money.isGreaterThanOrEqual(other);
  }

  isLessThan(other: BigMoneyProvider): boolean {
    return this.money.isLessThan(other);
  }

  isLessThanOrEqual(other: BigMoneyProvider): boolean {
    return this.money.isLessThanOrEqual(other);
  }

  getAmountMajor(): bigint {
    return this.money.getAmountMajor();
  }

  getAmountMinor(): bigint {
    return this.money.unscaledValue;
  }

  getMinorPart(): number {
    return this.money.getMinorPart();
  }

  toDecimal(): Decimal {
    return this.money.toDecimal();
  }

  toPlainString(): string {
    return this.money.toPlainString();
  }

  equals(other: unknown): boolean {
    return other instanceof Money && this.money.equals(other.money);
  }

  toString(): string {
    return this.money.toString();
  }

  toJSON(): { currency: string; scale: number; unscaledValue: string } {
    return this.money.toJSON();
  }

  private with(result: BigMoney, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    if (result === this.money) return this;
    return new Money(result.withCurrencyScale(roundingMode));
  }
}
