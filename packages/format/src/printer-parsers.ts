import { CurrencyUnit, type BigMoney } from '@moneta/core';

import { AmountStyle, type ResolvedAmountStyle } from './amount-style.js';
import type { ParseContext } from './parse-context.js';
import type { PrintContext } from './print-context.js';

/**
 * Appends part of a money value to the output.
 */
export interface MoneyPrinter {
  print(context: PrintContext, buffer: string[], money: BigMoney): void;
}

/**
 * Consumes text at `context.index`, either advancing the index and recording
 * what it read, or recording an error.
 */
export interface MoneyParser {
  parse(context: ParseContext): void;
}

/**
 * One step of a formatter. Built-in elements are both printer and parser, except
 * `LocalizedSymbolElement` which only prints; user supplied ones may be either.
 */
export type MoneyFormatElement = MoneyPrinter | MoneyParser;

export type FormatElementKind = 'amount' | 'currencyCode' | 'literal' | 'localizedSymbol' | 'numeric3Code' | 'numericCode';

export function isMoneyPrinter(element: MoneyFormatElement): element is MoneyPrinter {
  return 'print' in element && typeof element.print === 'function';
}

export function isMoneyParser(element: MoneyFormatElement): element is MoneyParser {
  return 'parse' in element && typeof element.parse === 'function';
}

const ZERO_CODE = '0'.charCodeAt(0);

function isAsciiDigit(ch: string): boolean {
  return ch.length === 1 && ch >= '0' && ch <= '9';
}

function isAsciiUpper(ch: string): boolean {
  return ch.length === 1 && ch >= 'A' && ch <= 'Z';
}

/**
 * Maps ASCII digits onto the run of ten digits starting at `zeroDigit`.
 */
function shiftDigits(digits: string, zeroDigit: string): string {
  if (zeroDigit === '0') return digits;
  const offset = zeroDigit.charCodeAt(0) - ZERO_CODE;
  let shifted = '';
  for (const ch of digits) {
    shifted += String.fromCharCode(ch.charCodeAt(0) + offset);
  }
  return shifted;
}

/**
 * Inserts the grouping character before a digit whenever the number of digits
 * to its right is a positive multiple of the grouping size.
 */
function groupDigits(digits: string, style: ResolvedAmountStyle): string {
  if (!style.grouping) return digits;
  let grouped = '';
  for (let i = 0; i < digits.length; i++) {
    if (i > 0 && (digits.length - i) % style.groupingSize === 0) {
      grouped += style.groupingChar;
    }
    grouped += digits.charAt(i);
  }
  return grouped;
}

/**
 * Fixed text, printed as is and matched exactly when parsing.
 */
export class LiteralElement implements MoneyPrinter, MoneyParser {
  readonly kind = 'literal' satisfies FormatElementKind;

  constructor(readonly literal: string) {
    Object.freeze(this);
  }

  print(_context: PrintContext, buffer: string[]): void {
    buffer.push(this.literal);
  }

  parse(context: ParseContext): void {
    if (context.text.startsWith(this.literal, context.index)) {
      context.setIndex(context.index + this.literal.length);
    } else {
      context.setError();
    }
  }

  toString(): string {
    return `'${this.literal}'`;
  }
}

/**
 * The numeric amount, laid out by an `AmountStyle`.
 */
export class AmountElement implements MoneyPrinter, MoneyParser {
  readonly kind = 'amount' satisfies FormatElementKind;

  constructor(readonly style: AmountStyle = AmountStyle.LOCALIZED_GROUPING) {
    Object.freeze(this);
  }

  print(context: PrintContext, buffer: string[], money: BigMoney): void {
    const style = this.style.localize(context.locale);
    const plain = money.abs().toPlainString();
    const point = plain.indexOf('.');
    const integerDigits = point < 0 ? plain : plain.slice(0, point);
    const fractionDigits = point < 0 ? '' : plain.slice(point + 1);

    let out = money.isNegative() ? '-' : '';
    out += groupDigits(shiftDigits(integerDigits, style.zeroDigit), style);
    if (point >= 0) {
      out += style.decimalPointChar + shiftDigits(fractionDigits, style.zeroDigit);
    } else if (style.forceDecimalPoint) {
      out += style.decimalPointChar;
    }
    buffer.push(out);
  }

  parse(context: ParseContext): void {
    const style = this.style.localize(context.locale);
    const text = context.text;
    const zero = style.zeroDigit.charCodeAt(0);
    const digitAt = (position: number): number => {
      const value = text.charCodeAt(position) - zero;
      return value >= 0 && value <= 9 ? value : -1;
    };

    let position = context.index;
    let negative = false;
    const first = text.charAt(position);
    if (first === '-' || first === '+') {
      negative = first === '-';
      position++;
    }

    let integerDigits = '';
    for (; position < text.length; position++) {
      const digit = digitAt(position);
      if (digit >= 0) {
        integerDigits += String(digit);
      } else if (!(style.grouping && text.charAt(position) === style.groupingChar)) {
        break;
      }
    }

    let fractionDigits = '';
    if (position < text.length && text.charAt(position) === style.decimalPointChar) {
      position++;
      for (; position < text.length; position++) {
        const digit = digitAt(position);
        if (digit < 0) break;
        fractionDigits += String(digit);
      }
    }

    if (integerDigits.length === 0 && fractionDigits.length === 0) {
      context.setError();
      return;
    }

    const magnitude = BigInt(integerDigits + fractionDigits);
    context.setAmount({ scale: fractionDigits.length, unscaled: negative ? -magnitude : magnitude });
    context.setIndex(position);
  }

  toString(): string {
    return '${amount}';
  }
}

/**
 * The three letter currency code, e.g. `GBP`.
 */
export class CurrencyCodeElement implements MoneyPrinter, MoneyParser {
  readonly kind = 'currencyCode' satisfies FormatElementKind;

  print(_context: PrintContext, buffer: string[], money: BigMoney): void {
    buffer.push(money.currency.code);
  }

  parse(context: ParseContext): void {
    const start = context.index;
    let count = 0;
    while (count < 3 && isAsciiUpper(context.text.charAt(start + count))) {
      count++;
    }
    if (count < 3) {
      context.setError(start + count);
      return;
    }
    const code = context.getTextSubstring(start, start + 3);
    CurrencyUnit.lookup(code).match(
      (currency) => {
        context.setCurrency(currency);
        context.setIndex(start + 3);
      },
      () => context.setError(start)
    );
  }

  toString(): string {
    return '${code}';
  }
}

/**
 * The ISO numeric code without padding, e.g. `8` for ALL.
 */
export class NumericCodeElement implements MoneyPrinter, MoneyParser {
  readonly kind = 'numericCode' satisfies FormatElementKind;

  print(_context: PrintContext, buffer: string[], money: BigMoney): void {
    if (money.currency.numericCode >= 0) {
      buffer.push(String(money.currency.numericCode));
    }
  }

  parse(context: ParseContext): void {
    const start = context.index;
    let count = 0;
    while (count < 3 && isAsciiDigit(context.text.charAt(start + count))) {
      count++;
    }
    if (count === 0) {
      context.setError(start);
      return;
    }
    CurrencyUnit.lookupByNumericCode(Number(context.text.slice(start, start + count))).match(
      (currency) => {
        context.setCurrency(currency);
        context.setIndex(start + count);
      },
      () => context.setError(start)
    );
  }

  toString(): string {
    return '${numericCode}';
  }
}

/**
 * The ISO numeric code zero-padded to three digits, e.g. `008` for ALL.
 */
export class Numeric3CodeElement implements MoneyPrinter, MoneyParser {
  readonly kind = 'numeric3Code' satisfies FormatElementKind;

  print(_context: PrintContext, buffer: string[], money: BigMoney): void {
    buffer.push(money.currency.numeric3Code);
  }

  parse(context: ParseContext): void {
    const start = context.index;
    let count = 0;
    while (count < 3 && isAsciiDigit(context.text.charAt(start + count))) {
      count++;
    }
    if (count < 3) {
      context.setError(start + count);
      return;
    }
    CurrencyUnit.lookupByNumericCode(Number(context.text.slice(start, start + 3))).match(
      (currency) => {
        context.setCurrency(currency);
        context.setIndex(start + 3);
      },
      () => context.setError(start)
    );
  }

  toString(): string {
    return '${numeric3Code}';
  }
}

/**
 * The currency symbol for the formatter's locale, e.g. `$`. Print only: symbols
 * are ambiguous across currencies.
 */
export class LocalizedSymbolElement implements MoneyPrinter {
  readonly kind = 'localizedSymbol' satisfies FormatElementKind;

  print(context: PrintContext, buffer: string[], money: BigMoney): void {
    buffer.push(money.currency.getSymbol(context.locale));
  }

  toString(): string {
    return '${symbolLocalized}';
  }
}
