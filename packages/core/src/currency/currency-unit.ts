import { getLogger } from '@moneta/logger';
import { err, ok, type Result } from 'neverthrow';

import { InvalidArgumentError, UnknownCurrencyError } from '../errors/index.js';

import { CurrencyDataSchema, loadCurrencyData } from './currency-data.js';

const logger = getLogger('currency-registry');

const unitsByCode = new Map<string, CurrencyUnit>();
const unitsByNumericCode = new Map<number, CurrencyUnit>();
let loaded = false;

/**
 * A currency as identified by ISO 4217.
 *
 * Instances come from the registry only and are never mutated, so they can be
 * compared by reference or with `equals`.
 */
export class CurrencyUnit {
  /**
   * Obtains a currency by its three letter code.
   * @throws UnknownCurrencyError if the code is not registered
   */
  static of(code: string): CurrencyUnit {
    const result = CurrencyUnit.lookup(code);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * Obtains a currency by its numeric code.
   * @throws UnknownCurrencyError if the numeric code is not registered
   */
  static ofNumericCode(numericCode: number | string): CurrencyUnit {
    const result = CurrencyUnit.lookupByNumericCode(numericCode);
    if (result.isErr()) {
      throw result.error;
    }
    return result.value;
  }

  static lookup(code: string): Result<CurrencyUnit, UnknownCurrencyError> {
    CurrencyUnit.ensureLoaded();
    const unit = unitsByCode.get(code);
    return unit ? ok(unit) : err(new UnknownCurrencyError(code));
  }

  static lookupByNumericCode(numericCode: number | string): Result<CurrencyUnit, UnknownCurrencyError> {
    CurrencyUnit.ensureLoaded();
    const requested = String(numericCode);
    if (!/^\d{1,3}$/.test(requested)) {
      return err(new UnknownCurrencyError(requested));
    }
    const unit = unitsByNumericCode.get(Number.parseInt(requested, 10));
    return unit ? ok(unit) : err(new UnknownCurrencyError(requested));
  }

  /**
   * Registers an additional currency, e.g. a crypto asset or an in-house unit.
   *
   * Registering an identical currency again returns the existing instance.
   * @param numericCode the numeric code, -1 for none
   * @param decimalPlaces the default fraction digits, -1 for a pseudo currency
   * @throws InvalidArgumentError if the data is malformed or clashes with a registered currency
   */
  static register(code: string, numericCode: number, decimalPlaces: number): CurrencyUnit {
    CurrencyUnit.ensureLoaded();
    const parsed = CurrencyDataSchema.safeParse({ code, numericCode, decimalPlaces });
    if (!parsed.success) {
      throw new InvalidArgumentError(
        `Invalid currency ${code}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`
      );
    }

    const existing = unitsByCode.get(code);
    if (existing) {
      if (existing.numericCode === numericCode && existing.rawDecimalPlaces === decimalPlaces) {
        return existing;
      }
      throw new InvalidArgumentError(`Currency already registered: ${code}`);
    }
    if (numericCode >= 0 && unitsByNumericCode.has(numericCode)) {
      throw new InvalidArgumentError(`Numeric code already registered: ${String(numericCode)}`);
    }

    const unit = CurrencyUnit.add(code, numericCode, decimalPlaces);
    logger.debug({ code, decimalPlaces, numericCode }, 'Registered currency');
    return unit;
  }

  /**
   * All registered currencies, sorted by code.
   */
  static registeredCurrencies(): CurrencyUnit[] {
    CurrencyUnit.ensureLoaded();
    return [...unitsByCode.values()].sort((a, b) => a.compareTo(b));
  }

  private constructor(
    readonly code: string,
    readonly numericCode: number,
    private readonly rawDecimalPlaces: number
  ) {
    Object.freeze(this);
  }

  /**
   * Default number of fraction digits; 0 for pseudo currencies.
   */
  get decimalPlaces(): number {
    return this.rawDecimalPlaces < 0 ? 0 : this.rawDecimalPlaces;
  }

  /**
   * Numeric code zero-padded to three digits, or '' when the currency has none.
   */
  get numeric3Code(): string {
    return this.numericCode < 0 ? '' : String(this.numericCode).padStart(3, '0');
  }

  /**
   * True for units such as XAU or XXX that have no fraction digits of their own.
   */
  isPseudoCurrency(): boolean {
    return this.rawDecimalPlaces < 0;
  }

  /**
   * Symbol used for this currency in the given locale, or the code when the
   * locale has none.
   */
  getSymbol(locale: string): string {
    try {
      const parts = new Intl.NumberFormat(locale, {
        currency: this.code,
        currencyDisplay: 'symbol',
        style: 'currency',
      }).formatToParts(0);
      return parts.find((part) => part.type === 'currency')?.value ?? this.code;
    } catch (error) {
      logger.debug({ code: this.code, error, locale }, 'No localized symbol, using currency code');
      return this.code;
    }
  }

  equals(other: CurrencyUnit): boolean {
    return this.code === other.code;
  }

  compareTo(other: CurrencyUnit): number {
    return this.code < other.code ? -1 : this.code > other.code ? 1 : 0;
  }

  toString(): string {
    return this.code;
  }

  toJSON(): string {
    return this.code;
  }

  private static add(code: string, numericCode: number, decimalPlaces: number): CurrencyUnit {
    const unit = new CurrencyUnit(code, numericCode, decimalPlaces);
    unitsByCode.set(code, unit);
    if (numericCode >= 0) {
      unitsByNumericCode.set(numericCode, unit);
    }
    return unit;
  }

  private static ensureLoaded(): void {
    if (loaded) return;
    const entries = loadCurrencyData();
    for (const entry of entries) {
      CurrencyUnit.add(entry.code, entry.numericCode, entry.decimalPlaces);
    }
    loaded = true;
    logger.debug({ count: entries.length }, 'Loaded currency data');
  }
}
