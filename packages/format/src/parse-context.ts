import { BigMoney, InvalidArgumentError, type CurrencyUnit, type ScaledDecimal } from '@moneta/core';

import { MoneyFormatError } from './errors.js';

/**
 * Mutable cursor over the text being parsed.
 *
 * Each parse call gets its own context; elements read from `index`, then either
 * advance it or record an error. Only the first error is kept.
 */
export class ParseContext {
  private currentIndex: number;
  private firstErrorIndex = -1;
  private parsedCurrency: CurrencyUnit | undefined;
  private parsedAmount: ScaledDecimal | undefined;

  constructor(
    readonly locale: string,
    readonly text: string,
    index = 0
  ) {
    this.currentIndex = ParseContext.checkIndex(text, index);
  }

  get index(): number {
    return this.currentIndex;
  }

  get errorIndex(): number {
    return this.firstErrorIndex;
  }

  get currency(): CurrencyUnit | undefined {
    return this.parsedCurrency;
  }

  get amount(): ScaledDecimal | undefined {
    return this.parsedAmount;
  }

  get textLength(): number {
    return this.text.length;
  }

  getTextSubstring(start: number, end: number): string {
    return this.text.slice(start, end);
  }

  setIndex(index: number): void {
    this.currentIndex = ParseContext.checkIndex(this.text, index);
  }

  /**
   * Marks the parse as failed at `at`, or at the current index.
   */
  setError(at: number = this.currentIndex): void {
    if (this.firstErrorIndex < 0) {
      this.firstErrorIndex = at;
    }
  }

  setCurrency(currency: CurrencyUnit): void {
    this.parsedCurrency = currency;
  }

  setAmount(amount: ScaledDecimal): void {
    this.parsedAmount = amount;
  }

  isError(): boolean {
    return this.firstErrorIndex >= 0;
  }

  isFullyParsed(): boolean {
    return this.currentIndex === this.text.length;
  }

  /**
   * True once both a currency and an amount have been parsed.
   */
  isComplete(): boolean {
    return this.parsedCurrency !== undefined && this.parsedAmount !== undefined;
  }

  /**
   * @throws MoneyFormatError if no amount or no currency was parsed
   */
  toBigMoney(): BigMoney {
    if (this.parsedAmount === undefined) {
      throw new MoneyFormatError('MISSING_AMOUNT', `Parsing did not find an amount: ${this.text}`, -1, this.text);
    }
    if (this.parsedCurrency === undefined) {
      throw new MoneyFormatError('MISSING_CURRENCY', `Parsing did not find a currency: ${this.text}`, -1, this.text);
    }
    return BigMoney.ofScale(this.parsedCurrency, this.parsedAmount.unscaled, this.parsedAmount.scale);
  }

  private static checkIndex(text: string, index: number): number {
    if (!Number.isInteger(index) || index < 0 || index > text.length) {
      throw new InvalidArgumentError(`Parse index out of range: ${String(index)}`, { length: text.length });
    }
    return index;
  }
}
