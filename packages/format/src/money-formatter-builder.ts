import { getDefaultLocale } from '@moneta/env';
import { getLogger } from '@moneta/logger';

import { AmountStyle } from './amount-style.js';
import { MoneyFormatter } from './money-formatter.js';
import {
  AmountElement,
  CurrencyCodeElement,
  LiteralElement,
  LocalizedSymbolElement,
  Numeric3CodeElement,
  NumericCodeElement,
  type MoneyFormatElement,
} from './printer-parsers.js';

const logger = getLogger('money-formatter');

/**
 * Accumulates elements, then produces an immutable `MoneyFormatter`.
 *
 * @example
 * const formatter = new MoneyFormatterBuilder()
 *   .appendCurrencyCode()
 *   .appendLiteral(' ')
 *   .appendAmount(AmountStyle.ASCII_DECIMAL_POINT_GROUP3_COMMA)
 *   .toFormatter();
 * formatter.print(Money.parse('USD 1234.5')); // 'USD 1,234.50'
 */
export class MoneyFormatterBuilder {
  private readonly elements: MoneyFormatElement[] = [];

  append(element: MoneyFormatElement): this {
    this.elements.push(element);
    return this;
  }

  appendAmount(style: AmountStyle = AmountStyle.LOCALIZED_GROUPING): this {
    return this.append(new AmountElement(style));
  }

  /**
   * Appends fixed text. Empty text is ignored.
   */
  appendLiteral(literal: string | null | undefined): this {
    if (literal === null || literal === undefined || literal.length === 0) return this;
    return this.append(new LiteralElement(literal));
  }

  appendCurrencyCode(): this {
    return this.append(new CurrencyCodeElement());
  }

  appendCurrencyNumericCode(): this {
    return this.append(new NumericCodeElement());
  }

  appendCurrencyNumeric3Code(): this {
    return this.append(new Numeric3CodeElement());
  }

  appendCurrencySymbolLocalized(): this {
    return this.append(new LocalizedSymbolElement());
  }

  /**
   * Appends every element of another formatter; its locale is not carried over.
   */
  appendFormatter(formatter: MoneyFormatter): this {
    this.elements.push(...formatter.elements);
    return this;
  }

  /**
   * Builds a formatter from the elements appended so far. The builder can keep
   * being used without affecting it.
   */
  toFormatter(locale: string = getDefaultLocale()): MoneyFormatter {
    const formatter = new MoneyFormatter(locale, this.elements);
    logger.trace({ format: formatter.toString(), locale: formatter.locale }, 'Built money formatter');
    return formatter;
  }
}
