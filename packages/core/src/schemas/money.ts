import { z } from 'zod';

// Three upper-case letters; whether the code is registered is checked on lookup
export const CurrencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, { message: 'Must be a three letter currency code' });

// Integer digits with an optional sign, kept as a string so no precision is lost in JSON
export const UnscaledValueSchema = z
  .union([z.string(), z.number().int(), z.bigint()])
  .transform((val) => (typeof val === 'string' ? val.trim() : val.toString()))
  .refine((val) => /^-?\d+$/.test(val), { message: 'Must be an integer' });

// Primitive fields a BigMoney is rebuilt from
export const BigMoneyJsonSchema = z.object({
  currency: CurrencyCodeSchema,
  scale: z.number().int().min(0),
  unscaledValue: UnscaledValueSchema,
});

export type BigMoneyJson = z.input<typeof BigMoneyJsonSchema>;
