import type { BigMoney } from './big-money.js';

/**
 * Anything that can be viewed as a `BigMoney`.
 *
 * Methods taking a provider convert it once with `BigMoney.from` and work on the
 * result, so a provider that changes between calls cannot corrupt an operation.
 */
export interface BigMoneyProvider {
  toBigMoney(): BigMoney;
}
