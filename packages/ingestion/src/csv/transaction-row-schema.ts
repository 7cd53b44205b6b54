import { AmountSchema, ClientIdSchema, TransactionIdSchema } from '@ledgerline/core';
import type { DisputeAction, TransactionRecord, ValueMovingKind } from '@ledgerline/engine';
import { z } from 'zod';

/** Columns every input file must declare in its header */
export const TRANSACTION_CSV_COLUMNS = ['type', 'client', 'tx', 'amount'] as const;

const RequiredAmountSchema = z
  .string({ required_error: 'amount is required' })
  .trim()
  .min(1, 'amount is required')
  .pipe(AmountSchema);

// A blank cell counts as absent
const ForbiddenAmountSchema = z.string().trim().max(0, 'amount is not allowed on this record').optional();

function valueMovingRow<T extends ValueMovingKind>(type: T) {
  return z.object({
    amount: RequiredAmountSchema,
    client: ClientIdSchema,
    tx: TransactionIdSchema,
    type: z.literal(type),
  });
}

function disputeLifecycleRow<T extends DisputeAction>(type: T) {
  return z.object({
    amount: ForbiddenAmountSchema,
    client: ClientIdSchema,
    tx: TransactionIdSchema,
    type: z.literal(type),
  });
}

/**
 * One CSV data row keyed by header name, after csv-parse has trimmed every cell.
 */
export const TransactionRowSchema = z.discriminatedUnion('type', [
  valueMovingRow('deposit'),
  valueMovingRow('withdrawal'),
  disputeLifecycleRow('dispute'),
  disputeLifecycleRow('resolve'),
  disputeLifecycleRow('chargeback'),
]);

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

export function toTransactionRecord(row: TransactionRow): TransactionRecord {
  switch (row.type) {
    case 'deposit':
    case 'withdrawal':
      return { amount: row.amount, client: row.client, tx: row.tx, type: row.type };
    case 'dispute':
    case 'resolve':
    case 'chargeback':
      return { client: row.client, tx: row.tx, type: row.type };
    default: {
      const _exhaustive: never = row;
      return _exhaustive;
    }
  }
}
