import type { Decimal } from 'decimal.js';

/** Client identifier, unsigned 16-bit */
export type ClientId = number;

/** Transaction identifier, unsigned 32-bit, unique across a run */
export type TransactionId = number;

export const TRANSACTION_KINDS = ['deposit', 'withdrawal', 'dispute', 'resolve', 'chargeback'] as const;
export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/** Kinds that move funds and are kept in the ledger */
export type ValueMovingKind = Extract<TransactionKind, 'deposit' | 'withdrawal'>;

/** Kinds that drive the dispute lifecycle of a ledger entry */
export type DisputeAction = Extract<TransactionKind, 'dispute' | 'resolve' | 'chargeback'>;

interface RecordBase {
  client: ClientId;
  tx: TransactionId;
}

export interface DepositRecord extends RecordBase {
  type: 'deposit';
  amount: Decimal;
}

export interface WithdrawalRecord extends RecordBase {
  type: 'withdrawal';
  amount: Decimal;
}

export interface DisputeRecord extends RecordBase {
  type: 'dispute';
}

export interface ResolveRecord extends RecordBase {
  type: 'resolve';
}

export interface ChargebackRecord extends RecordBase {
  type: 'chargeback';
}

export type ValueMovingRecord = DepositRecord | WithdrawalRecord;
export type DisputeLifecycleRecord = DisputeRecord | ResolveRecord | ChargebackRecord;

/**
 * One parsed input line. `tx` on a dispute/resolve/chargeback references
 * an earlier deposit or withdrawal.
 */
export type TransactionRecord = ValueMovingRecord | DisputeLifecycleRecord;

export function isValueMovingRecord(record: TransactionRecord): record is ValueMovingRecord {
  return record.type === 'deposit' || record.type === 'withdrawal';
}
