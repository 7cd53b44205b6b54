import { z } from 'zod';

import { parseAmount } from '../utils/decimal-utils.js';

export const MAX_CLIENT_ID = 65_535;
export const MAX_TRANSACTION_ID = 4_294_967_295;

/**
 * Non-negative integer carried as a decimal string (CSV cell), bounded by `max`.
 */
function boundedIntegerString(label: string, max: number) {
  return z
    .string()
    .trim()
    .regex(/^\d+$/, `${label} must be a non-negative integer`)
    .transform((val) => Number(val))
    .pipe(z.number().max(max, `${label} must be at most ${max}`));
}

/** Client identifier, unsigned 16-bit range */
export const ClientIdSchema = boundedIntegerString('client', MAX_CLIENT_ID);

/** Transaction identifier, unsigned 32-bit range */
export const TransactionIdSchema = boundedIntegerString('tx', MAX_TRANSACTION_ID);

/** Fixed-point amount string transformed to a Decimal */
export const AmountSchema = z.string().transform((val, ctx) => {
  const parsed = parseAmount(val);
  if (parsed.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error.message });
    return z.NEVER;
  }
  return parsed.value;
});
