import type { Decimal } from 'decimal.js';

import type { ClientId, TransactionId, ValueMovingKind } from '../types.js';

import type { DisputeStatus } from './dispute-status.js';

/**
 * Facts of an applied deposit or withdrawal. Only `status` changes after insertion.
 */
export interface LedgerEntry {
  readonly amount: Decimal;
  readonly client: ClientId;
  readonly kind: ValueMovingKind;
  status: DisputeStatus;
  readonly tx: TransactionId;
}

export type NewLedgerEntry = Omit<LedgerEntry, 'status'>;

/**
 * Every applied deposit and withdrawal of the run, keyed by transaction id.
 *
 * Entries are never evicted: any of them may be disputed later on.
 */
export class Ledger {
  private readonly entries = new Map<TransactionId, LedgerEntry>();

  get size(): number {
    return this.entries.size;
  }

  has(tx: TransactionId): boolean {
    return this.entries.has(tx);
  }

  get(tx: TransactionId): Readonly<LedgerEntry> | undefined {
    return this.entries.get(tx);
  }

  /**
   * Insert a new entry in `normal` state. The caller checks uniqueness first.
   */
  insert(entry: NewLedgerEntry): Readonly<LedgerEntry> {
    if (this.entries.has(entry.tx)) {
      throw new Error(`Ledger already holds transaction ${entry.tx}`);
    }

    const stored: LedgerEntry = { ...entry, status: 'normal' };
    this.entries.set(entry.tx, stored);
    return stored;
  }

  setStatus(tx: TransactionId, status: DisputeStatus): void {
    const entry = this.entries.get(tx);
    if (!entry) {
      throw new Error(`Ledger has no transaction ${tx}`);
    }
    entry.status = status;
  }

  values(): IterableIterator<Readonly<LedgerEntry>> {
    return this.entries.values();
  }
}
