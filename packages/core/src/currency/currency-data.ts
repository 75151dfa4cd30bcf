import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { InvalidArgumentError } from '../errors/index.js';

export const CurrencyDataSchema = z.object({
  code: z.string().regex(/^[A-Z]{3}$/, { message: 'Currency code must be three upper-case letters' }),
  // -1 marks a currency without a numeric code
  numericCode: z.number().int().min(-1).max(999),
  // -1 marks a pseudo currency without fraction digits
  decimalPlaces: z.number().int().min(-1).max(30),
});

export type CurrencyData = z.infer<typeof CurrencyDataSchema>;

export const CurrencyDataFileSchema = z.array(CurrencyDataSchema).superRefine((entries, ctx) => {
  const codes = new Set<string>();
  const numericCodes = new Set<number>();
  entries.forEach((entry, index) => {
    if (codes.has(entry.code)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate currency code ${entry.code}`, path: [index] });
    }
    if (entry.numericCode >= 0 && numericCodes.has(entry.numericCode)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate numeric code ${String(entry.numericCode)}`,
        path: [index],
      });
    }
    codes.add(entry.code);
    numericCodes.add(entry.numericCode);
  });
});

export const DEFAULT_CURRENCY_DATA_URL = new URL('../../data/currencies.json', import.meta.url);

/**
 * Reads and validates a currency data file.
 * @throws InvalidArgumentError if the file is not a valid currency list
 */
export function loadCurrencyData(location: URL | string = DEFAULT_CURRENCY_DATA_URL): CurrencyData[] {
  const raw: unknown = JSON.parse(readFileSync(location, 'utf8'));
  const result = CurrencyDataFileSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - [${e.path.join('.')}] ${e.message}`).join('\n');
    throw new InvalidArgumentError(`Invalid currency data in ${String(location)}:\n${errors}`);
  }
  return result.data;
}
