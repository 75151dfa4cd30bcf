export * from './errors/index.js';
export { CurrencyUnit } from './currency/currency-unit.js';
export {
  CurrencyDataFileSchema,
  CurrencyDataSchema,
  DEFAULT_CURRENCY_DATA_URL,
  loadCurrencyData,
  type CurrencyData,
} from './currency/currency-data.js';
export { RoundingMode } from './money/rounding-mode.js';
export type { BigMoneyProvider } from './money/big-money-provider.js';
export { BigMoney } from './money/big-money.js';
export { Money } from './money/money.js';
export {
  compareScaled,
  divideAndRound,
  pow10,
  rescale,
  toPlainString,
  toScaledDecimal,
  type ScaledDecimal,
} from './money/decimal-arithmetic.js';
export { BigMoneyJsonSchema, CurrencyCodeSchema, UnscaledValueSchema, type BigMoneyJson } from './schemas/money.js';
