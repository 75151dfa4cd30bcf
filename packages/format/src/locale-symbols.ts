import { InvalidArgumentError } from '@moneta/core';

/**
 * Number symbols a locale uses for plain decimal numbers.
 */
export interface LocaleNumberSymbols {
  readonly decimalPointChar: string;
  readonly groupingChar: string;
  readonly groupingSize: number;
  readonly zeroDigit: string;
}

// Frozen snapshots keyed by canonical locale; entries are never modified once stored
const symbolsByLocale = new Map<string, LocaleNumberSymbols>();

/**
 * Canonicalises a BCP 47 tag, e.g. 'EN-us' → 'en-US'.
 * @throws InvalidArgumentError for malformed tags
 */
export function canonicalizeLocale(locale: string): string {
  let canonical: string | undefined;
  try {
    canonical = Intl.getCanonicalLocales(locale)[0];
  } catch (error) {
    throw new InvalidArgumentError(`Invalid locale: ${locale}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (canonical === undefined) {
    throw new InvalidArgumentError(`Invalid locale: ${locale}`);
  }
  return canonical;
}

function singleChar(value: string | undefined, fallback: string): string {
  return value !== undefined && value.length === 1 ? value : fallback;
}

/**
 * Reads the decimal point, grouping separator, grouping size and zero digit a
 * locale uses, via `Intl.NumberFormat`.
 */
export function getLocaleNumberSymbols(locale: string): LocaleNumberSymbols {
  const key = canonicalizeLocale(locale);
  const cached = symbolsByLocale.get(key);
  if (cached) return cached;

  const parts = new Intl.NumberFormat(key, { minimumFractionDigits: 1, useGrouping: true }).formatToParts(1234567.5);
  const integerGroups = parts.filter((part) => part.type === 'integer');
  const lastGroup = integerGroups[integerGroups.length - 1]?.value;

  const symbols: LocaleNumberSymbols = Object.freeze({
    decimalPointChar: singleChar(parts.find((part) => part.type === 'decimal')?.value, '.'),
    groupingChar: singleChar(parts.find((part) => part.type === 'group')?.value, ','),
    groupingSize: integerGroups.length > 1 && lastGroup !== undefined ? lastGroup.length : 3,
    zeroDigit: singleChar(new Intl.NumberFormat(key, { useGrouping: false }).format(0), '0'),
  });

  symbolsByLocale.set(key, symbols);
  return symbols;
}
