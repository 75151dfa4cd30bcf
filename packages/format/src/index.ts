export {
  AmountStyle,
  AmountStyleOptionsSchema,
  type AmountStyleOptions,
  type ResolvedAmountStyle,
} from './amount-style.js';
export { MoneyFormatError, type MoneyFormatFailure } from './errors.js';
export { canonicalizeLocale, getLocaleNumberSymbols, type LocaleNumberSymbols } from './locale-symbols.js';
export { MoneyFormatter } from './money-formatter.js';
export { MoneyFormatterBuilder } from './money-formatter-builder.js';
export { ParseContext } from './parse-context.js';
export { PrintContext } from './print-context.js';
export {
  AmountElement,
  CurrencyCodeElement,
  isMoneyParser,
  isMoneyPrinter,
  LiteralElement,
  LocalizedSymbolElement,
  Numeric3CodeElement,
  NumericCodeElement,
  type FormatElementKind,
  type MoneyFormatElement,
  type MoneyParser,
  type MoneyPrinter,
} from './printer-parsers.js';
