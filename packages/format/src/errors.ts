import { MoneyError } from '@moneta/core';

export type MoneyFormatFailure =
  | 'INCOMPLETE_PARSE'
  | 'MISSING_AMOUNT'
  | 'MISSING_CURRENCY'
  | 'NOT_A_PARSER'
  | 'NOT_A_PRINTER'
  | 'PARSE_ERROR';

/**
 * Printing or parsing with a `MoneyFormatter` failed.
 *
 * `errorIndex` is the position in `text` where parsing stopped, or -1 when the
 * failure is not tied to a position.
 */
export class MoneyFormatError extends MoneyError {
  readonly code = 'MONEY_FORMAT';

  constructor(
    public readonly failure: MoneyFormatFailure,
    message: string,
    public readonly errorIndex = -1,
    public readonly text?: string
  ) {
    super(message, { errorIndex, failure, text });
  }
}
