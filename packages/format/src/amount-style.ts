import { InvalidArgumentError } from '@moneta/core';
import { z } from 'zod';

import { getLocaleNumberSymbols } from './locale-symbols.js';

const singleChar = z.string().length(1, { message: 'Must be a single character' });

export const AmountStyleOptionsSchema = z
  .object({
    decimalPointChar: singleChar.optional(),
    forceDecimalPoint: z.boolean().optional(),
    grouping: z.boolean().optional(),
    groupingChar: singleChar.optional(),
    groupingSize: z.number().int().positive().optional(),
    zeroDigit: singleChar.optional(),
  })
  .strict()
  .refine(
    (options) =>
      options.decimalPointChar === undefined ||
      options.groupingChar === undefined ||
      options.decimalPointChar !== options.groupingChar,
    { message: 'Decimal point and grouping characters must differ', path: ['groupingChar'] }
  );

/**
 * Options for an amount style. Characters and the grouping size left undefined
 * are taken from the formatter's locale when printing or parsing.
 */
export type AmountStyleOptions = z.input<typeof AmountStyleOptionsSchema>;

/**
 * An amount style with every field known, ready for printing or parsing.
 */
export interface ResolvedAmountStyle {
  readonly decimalPointChar: string;
  readonly forceDecimalPoint: boolean;
  readonly grouping: boolean;
  readonly groupingChar: string;
  readonly groupingSize: number;
  readonly zeroDigit: string;
}

/**
 * Controls how the numeric part of an amount is printed and parsed.
 *
 * Styles are immutable. A style with unset characters is "localized": each print
 * or parse call resolves it against the locale of that call with `localize`,
 * which returns a new object and never changes the style itself.
 */
export class AmountStyle {
  /** `1,234,567.89` */
  static readonly ASCII_DECIMAL_POINT_GROUP3_COMMA = new AmountStyle({
    decimalPointChar: '.',
    grouping: true,
    groupingChar: ',',
    groupingSize: 3,
    zeroDigit: '0',
  });

  /** `1 234 567.89` */
  static readonly ASCII_DECIMAL_POINT_GROUP3_SPACE = new AmountStyle({
    decimalPointChar: '.',
    grouping: true,
    groupingChar: ' ',
    groupingSize: 3,
    zeroDigit: '0',
  });

  /** `1234567.89` */
  static readonly ASCII_DECIMAL_POINT_NO_GROUPING = new AmountStyle({
    decimalPointChar: '.',
    grouping: false,
    groupingChar: ',',
    groupingSize: 3,
    zeroDigit: '0',
  });

  /** `1.234.567,89` */
  static readonly ASCII_DECIMAL_COMMA_GROUP3_DOT = new AmountStyle({
    decimalPointChar: ',',
    grouping: true,
    groupingChar: '.',
    groupingSize: 3,
    zeroDigit: '0',
  });

  /** `1 234 567,89` */
  static readonly ASCII_DECIMAL_COMMA_GROUP3_SPACE = new AmountStyle({
    decimalPointChar: ',',
    grouping: true,
    groupingChar: ' ',
    groupingSize: 3,
    zeroDigit: '0',
  });

  /** `1234567,89` */
  static readonly ASCII_DECIMAL_COMMA_NO_GROUPING = new AmountStyle({
    decimalPointChar: ',',
    grouping: false,
    groupingChar: '.',
    groupingSize: 3,
    zeroDigit: '0',
  });

  /** Grouped, with every character taken from the locale */
  static readonly LOCALIZED_GROUPING = new AmountStyle({ grouping: true });

  /** Ungrouped, with every character taken from the locale */
  static readonly LOCALIZED_NO_GROUPING = new AmountStyle({ grouping: false });

  /**
   * @throws InvalidArgumentError if a character is not exactly one character long,
   * the grouping size is not a positive integer, or the decimal point and grouping
   * characters are the same
   */
  static of(options: AmountStyleOptions): AmountStyle {
    const result = AmountStyleOptionsSchema.safeParse(options);
    if (!result.success) {
      const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new InvalidArgumentError(`Invalid amount style: ${problems}`);
    }
    return new AmountStyle(result.data);
  }

  readonly decimalPointChar: string | undefined;
  readonly forceDecimalPoint: boolean;
  readonly grouping: boolean;
  readonly groupingChar: string | undefined;
  readonly groupingSize: number | undefined;
  readonly zeroDigit: string | undefined;

  // Set only when nothing depends on the locale
  private readonly resolved: ResolvedAmountStyle | undefined;

  private constructor(options: AmountStyleOptions) {
    this.decimalPointChar = options.decimalPointChar;
    this.forceDecimalPoint = options.forceDecimalPoint ?? false;
    this.grouping = options.grouping ?? true;
    this.groupingChar = options.groupingChar;
    this.groupingSize = options.groupingSize;
    this.zeroDigit = options.zeroDigit;

    if (
      this.decimalPointChar !== undefined &&
      this.groupingChar !== undefined &&
      this.groupingSize !== undefined &&
      this.zeroDigit !== undefined
    ) {
      this.resolved = Object.freeze({
        decimalPointChar: this.decimalPointChar,
        forceDecimalPoint: this.forceDecimalPoint,
        grouping: this.grouping,
        groupingChar: this.groupingChar,
        groupingSize: this.groupingSize,
        zeroDigit: this.zeroDigit,
      });
    } else {
      this.resolved = undefined;
    }
    Object.freeze(this);
  }

  /**
   * True if any character or the grouping size comes from the locale.
   */
  isLocalized(): boolean {
    return this.resolved === undefined;
  }

  /**
   * Fills every unset field from the locale. Pure: the result is a new frozen
   * object and this style is left untouched.
   * @throws InvalidArgumentError if the decimal point and grouping characters
   * resolve to the same character
   */
  localize(locale: string): ResolvedAmountStyle {
    if (this.resolved) return this.resolved;

    const symbols = getLocaleNumberSymbols(locale);
    const decimalPointChar = this.decimalPointChar ?? symbols.decimalPointChar;
    const groupingChar = this.groupingChar ?? symbols.groupingChar;
    if (decimalPointChar === groupingChar) {
      throw new InvalidArgumentError(
        `Decimal point and grouping characters must differ: '${decimalPointChar}' in locale ${locale}`
      );
    }

    return Object.freeze({
      decimalPointChar,
      forceDecimalPoint: this.forceDecimalPoint,
      grouping: this.grouping,
      groupingChar,
      groupingSize: this.groupingSize ?? symbols.groupingSize,
      zeroDigit: this.zeroDigit ?? symbols.zeroDigit,
    });
  }

  withZeroDigit(zeroDigit: string | undefined): AmountStyle {
    return AmountStyle.of({ ...this.toOptions(), zeroDigit });
  }

  withDecimalPointChar(decimalPointChar: string | undefined): AmountStyle {
    return AmountStyle.of({ ...this.toOptions(), decimalPointChar });
  }

  withGroupingChar(groupingChar: string | undefined): AmountStyle {
    return AmountStyle.of({ ...this.toOptions(), groupingChar });
  }

  withGroupingSize(groupingSize: number | undefined): AmountStyle {
    return AmountStyle.of({ ...this.toOptions(), groupingSize });
  }

  withGrouping(grouping: boolean): AmountStyle {
    return AmountStyle.of({ ...this.toOptions(), grouping });
  }

  withForcedDecimalPoint(forceDecimalPoint: boolean): AmountStyle {
    return AmountStyle.of({ ...this.toOptions(), forceDecimalPoint });
  }

  equals(other: unknown): boolean {
    return (
      other instanceof AmountStyle &&
      this.decimalPointChar === other.decimalPointChar &&
      this.forceDecimalPoint === other.forceDecimalPoint &&
      this.grouping === other.grouping &&
      this.groupingChar === other.groupingChar &&
      this.groupingSize === other.groupingSize &&
      this.zeroDigit === other.zeroDigit
    );
  }

  toString(): string {
    const show = (value: string | number | undefined) => (value === undefined ? 'localized' : `'${String(value)}'`);
    return (
      `AmountStyle[zero=${show(this.zeroDigit)},decimalPoint=${show(this.decimalPointChar)},` +
      `grouping=${String(this.grouping)},groupingChar=${show(this.groupingChar)},` +
      `groupingSize=${show(this.groupingSize)},forceDecimalPoint=${String(this.forceDecimalPoint)}]`
    );
  }

  private toOptions(): AmountStyleOptions {
    return {
      decimalPointChar: this.decimalPointChar,
      forceDecimalPoint: this.forceDecimalPoint,
      grouping: this.grouping,
      groupingChar: this.groupingChar,
      groupingSize: this.groupingSize,
      zeroDigit: this.zeroDigit,
    };
  }
}
