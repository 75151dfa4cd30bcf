/**
 * Error hierarchy for monetary arithmetic and currency lookup.
 *
 * Every failure carries a stable `code` and optional structured context
 * so callers can branch on the kind of failure without parsing messages.
 */

import type { CurrencyUnit } from '../currency/currency-unit.js';

/**
 * Base error for the money domain
 */
export abstract class MoneyError extends Error {
  abstract readonly code: string;

  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Two amounts of different currencies were combined or compared
 */
export class CurrencyMismatchError extends MoneyError {
  readonly code = 'CURRENCY_MISMATCH';

  constructor(
    public readonly firstCurrency: CurrencyUnit,
    public readonly secondCurrency: CurrencyUnit
  ) {
    super(`Currencies differ: ${firstCurrency.code}/${secondCurrency.code}`, {
      firstCurrency: firstCurrency.code,
      secondCurrency: secondCurrency.code,
    });
  }
}

/**
 * Reducing the scale would discard nonzero digits and the rounding mode forbids it
 */
export class RoundingRequiredError extends MoneyError {
  readonly code = 'ROUNDING_REQUIRED';

  constructor(message = 'Rounding necessary') {
    super(message);
  }
}

/**
 * Malformed input to a factory or operation
 */
export class InvalidArgumentError extends MoneyError {
  readonly code = 'INVALID_ARGUMENT';
}

/**
 * The currency registry has no entry for the requested code
 */
export class UnknownCurrencyError extends MoneyError {
  readonly code = 'UNKNOWN_CURRENCY';

  constructor(public readonly requested: string) {
    super(`Unknown currency '${requested}'`, { requested });
  }
}
