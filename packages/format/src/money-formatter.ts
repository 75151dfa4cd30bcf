import { BigMoney, Money, RoundingMode, type BigMoneyProvider } from '@moneta/core';
import { getLogger } from '@moneta/logger';
import { err, ok, type Result } from 'neverthrow';

import { MoneyFormatError } from './errors.js';
import { canonicalizeLocale } from './locale-symbols.js';
import { ParseContext } from './parse-context.js';
import { PrintContext } from './print-context.js';
import { isMoneyParser, isMoneyPrinter, type MoneyFormatElement } from './printer-parsers.js';

const logger = getLogger('money-formatter');

/**
 * Prints and parses money using a fixed sequence of elements and a locale.
 *
 * Formatters are immutable and safe to share. Obtain one from
 * `MoneyFormatterBuilder.toFormatter`.
 */
export class MoneyFormatter {
  readonly locale: string;
  readonly elements: readonly MoneyFormatElement[];

  constructor(locale: string, elements: readonly MoneyFormatElement[]) {
    this.locale = canonicalizeLocale(locale);
    this.elements = Object.freeze([...elements]);
    Object.freeze(this);
  }

  /**
   * Copy of this formatter using another locale.
   */
  withLocale(locale: string): MoneyFormatter {
    return new MoneyFormatter(locale, this.elements);
  }

  isPrinter(): boolean {
    return this.elements.every(isMoneyPrinter);
  }

  isParser(): boolean {
    return this.elements.every(isMoneyParser);
  }

  /**
   * @throws MoneyFormatError if an element cannot print
   */
  print(money: BigMoneyProvider): string {
    const buffer: string[] = [];
    this.printTo(buffer, money);
    return buffer.join('');
  }

  /**
   * Appends the printed parts of `money` to `buffer`. Nothing is appended when
   * the formatter cannot print.
   */
  printTo(buffer: string[], money: BigMoneyProvider): void {
    const printers = this.elements.filter(isMoneyPrinter);
    if (printers.length !== this.elements.length) {
      throw new MoneyFormatError('NOT_A_PRINTER', 'MoneyFormatter has not been configured to be able to print');
    }
    const bigMoney = BigMoney.from(money);
    const context = new PrintContext(this.locale);
    for (const printer of printers) {
      printer.print(context, buffer, bigMoney);
    }
  }

  /**
   * Runs every parser from `startIndex`, stopping at the first error. The returned
   * context tells whether parsing failed, whether all text was consumed, and what
   * was read; it does not throw for unparseable text.
   */
  parse(text: string, startIndex = 0): ParseContext {
    const parsers = this.elements.filter(isMoneyParser);
    if (parsers.length !== this.elements.length) {
      throw new MoneyFormatError('NOT_A_PARSER', 'MoneyFormatter has not been configured to be able to parse');
    }
    const context = new ParseContext(this.locale, text, startIndex);
    for (const parser of parsers) {
      parser.parse(context);
      if (context.isError()) break;
    }
    return context;
  }

  /**
   * Parses the whole of `text` into a `BigMoney`.
   * @throws MoneyFormatError if the text is invalid, not fully consumed, or
   * lacks an amount or a currency
   */
  parseBigMoney(text: string): BigMoney {
    const context = this.parse(text);
    if (context.isError()) {
      logger.debug({ errorIndex: context.errorIndex, text }, 'Money parse failed');
      throw new MoneyFormatError(
        'PARSE_ERROR',
        `Text could not be parsed at index ${String(context.errorIndex)}: ${text}`,
        context.errorIndex,
        text
      );
    }
    if (!context.isFullyParsed()) {
      logger.debug({ index: context.index, text }, 'Money parse left text unconsumed');
      throw new MoneyFormatError(
        'INCOMPLETE_PARSE',
        `Unparsed text found at index ${String(context.index)}: ${text}`,
        context.index,
        text
      );
    }
    return context.toBigMoney();
  }

  /**
   * Parses the whole of `text` into a `Money`, rounding to the currency scale.
   * @throws RoundingRequiredError if the parsed scale needs rounding and `roundingMode` is UNNECESSARY
   */
  parseMoney(text: string, roundingMode: RoundingMode = RoundingMode.UNNECESSARY): Money {
    return Money.from(this.parseBigMoney(text), roundingMode);
  }

  /**
   * Like `parseBigMoney`, returning the failure instead of throwing it.
   */
  tryParseBigMoney(text: string): Result<BigMoney, MoneyFormatError> {
    try {
      return ok(this.parseBigMoney(text));
    } catch (error) {
      if (error instanceof MoneyFormatError) return err(error);
      throw error;
    }
  }

  toString(): string {
    return this.elements.map((element) => String(element)).join('');
  }
}
