import { getLogger } from '@ledgerline/logger';
import { err, ok, type Result } from 'neverthrow';

import type { Account, AccountRejection, AccountView } from '../account/account.js';
import { AccountStore } from '../account/account-store.js';
import {
  accountLocked,
  cannotDisputeTarget,
  clientMismatch,
  duplicateTransaction,
  type EngineError,
  type EngineErrorCode,
  insufficientFunds,
  invalidDisputeState,
  LedgerInvariantError,
  negativeAmount,
  unknownTransaction,
} from '../errors.js';
import { transitionDisputeStatus } from '../ledger/dispute-status.js';
import { Ledger, type LedgerEntry } from '../ledger/ledger.js';
import { type AccountSnapshotRow, buildAccountSnapshot } from '../snapshot/account-snapshot.js';
import type {
  ChargebackRecord,
  ClientId,
  DisputeLifecycleRecord,
  DisputeRecord,
  ResolveRecord,
  TransactionId,
  TransactionKind,
  TransactionRecord,
  ValueMovingKind,
  ValueMovingRecord,
} from '../types.js';

const logger = getLogger('TransactionEngine');

export interface TransactionEngineOptions {
  /**
   * Ledger entry kinds a dispute may target. Defaults to deposits only;
   * include 'withdrawal' to let withdrawals be disputed as well.
   */
  disputableKinds?: readonly ValueMovingKind[] | undefined;
}

export interface EngineStats {
  applied: Record<TransactionKind, number>;
  rejected: Partial<Record<EngineErrorCode, number>>;
}

function emptyKindCounts(): Record<TransactionKind, number> {
  return { chargeback: 0, deposit: 0, dispute: 0, resolve: 0, withdrawal: 0 };
}

function fromAccountRejection(rejection: AccountRejection, tx: TransactionId, client: ClientId): EngineError {
  switch (rejection.type) {
    case 'negative_amount':
      return negativeAmount(tx, client, rejection.amount);
    case 'locked':
      return accountLocked(tx, client);
    case 'insufficient_funds':
      return insufficientFunds(tx, client, rejection.requested, rejection.available);
    default: {
      const _exhaustive: never = rejection;
      return _exhaustive;
    }
  }
}

/**
 * Applies transaction records to client accounts, strictly in the order given.
 *
 * Owns the account store and the ledger for the lifetime of one run. Each
 * record is applied completely or rejected with no state change at all.
 */
export class TransactionEngine {
  private readonly accountStore = new AccountStore();
  private readonly ledger = new Ledger();
  private readonly disputableKinds: ReadonlySet<ValueMovingKind>;
  private readonly counters: EngineStats = { applied: emptyKindCounts(), rejected: {} };

  constructor(options: TransactionEngineOptions = {}) {
    this.disputableKinds = new Set<ValueMovingKind>(options.disputableKinds ?? ['deposit']);
  }

  apply(record: TransactionRecord): Result<void, EngineError> {
    const result = this.dispatch(record);

    if (result.isOk()) {
      this.counters.applied[record.type] += 1;
    } else {
      const code = result.error.code;
      this.counters.rejected[code] = (this.counters.rejected[code] ?? 0) + 1;
      logger.debug({ code, tx: record.tx, client: record.client, type: record.type }, result.error.message);
    }

    return result;
  }

  // Queries hand out frozen copies: accounts and ledger entries change only through apply()

  getAccount(client: ClientId): AccountView | undefined {
    return this.accountStore.get(client)?.toView();
  }

  getLedgerEntry(tx: TransactionId): Readonly<LedgerEntry> | undefined {
    const entry = this.ledger.get(tx);
    return entry ? Object.freeze({ ...entry }) : undefined;
  }

  /** Accounts in the order they were created */
  accounts(): AccountView[] {
    return Array.from(this.accountStore.values(), (account) => account.toView());
  }

  ledgerEntries(): Readonly<LedgerEntry>[] {
    return Array.from(this.ledger.values(), (entry) => Object.freeze({ ...entry }));
  }

  snapshot(): AccountSnapshotRow[] {
    return buildAccountSnapshot(this.accountStore.values());
  }

  stats(): EngineStats {
    return {
      applied: { ...this.counters.applied },
      rejected: { ...this.counters.rejected },
    };
  }

  private dispatch(record: TransactionRecord): Result<void, EngineError> {
    switch (record.type) {
      case 'deposit':
      case 'withdrawal':
        return this.applyValueMovement(record);
      case 'dispute':
        return this.applyDispute(record);
      case 'resolve':
      case 'chargeback':
        return this.applyDisputeOutcome(record);
      default: {
        const _exhaustive: never = record;
        return _exhaustive;
      }
    }
  }

  private applyValueMovement(record: ValueMovingRecord): Result<void, EngineError> {
    const { amount, client, tx } = record;

    if (amount.lessThan(0)) {
      return err(negativeAmount(tx, client, amount));
    }
    if (this.ledger.has(tx)) {
      return err(duplicateTransaction(tx, client));
    }

    const { account, isNew } = this.accountStore.getOrDraft(client);
    const mutation = record.type === 'deposit' ? account.creditAvailable(amount) : account.debitAvailable(amount);
    if (mutation.isErr()) {
      return err(fromAccountRejection(mutation.error, tx, client));
    }

    if (isNew) {
      this.accountStore.add(account);
      logger.debug({ client }, 'Created account');
    }
    this.ledger.insert({ amount, client, kind: record.type, tx });

    return ok();
  }

  private applyDispute(record: DisputeRecord): Result<void, EngineError> {
    const { client, tx } = record;

    const target = this.resolveTarget(record);
    if (target.isErr()) {
      return err(target.error);
    }
    const { account, entry } = target.value;

    if (!this.disputableKinds.has(entry.kind)) {
      return err(cannotDisputeTarget(tx, client, entry.kind));
    }

    const next = transitionDisputeStatus(entry.status, 'dispute');
    if (next.isErr()) {
      return err(invalidDisputeState(tx, client, 'dispute', next.error.from));
    }

    const held = account.hold(entry.amount);
    if (held.isErr()) {
      return err(fromAccountRejection(held.error, tx, client));
    }

    this.ledger.setStatus(tx, next.value);
    return ok();
  }

  private applyDisputeOutcome(record: ChargebackRecord | ResolveRecord): Result<void, EngineError> {
    const { client, tx } = record;

    const target = this.resolveTarget(record);
    if (target.isErr()) {
      return err(target.error);
    }
    const { account, entry } = target.value;

    const next = transitionDisputeStatus(entry.status, record.type);
    if (next.isErr()) {
      return err(invalidDisputeState(tx, client, record.type, next.error.from));
    }

    if (record.type === 'resolve') {
      account.release(entry.amount);
    } else {
      account.chargeback(entry.amount);
    }

    this.ledger.setStatus(tx, next.value);
    return ok();
  }

  /**
   * Ledger entry a dispute-lifecycle record points at, with its owning account.
   */
  private resolveTarget(
    record: DisputeLifecycleRecord
  ): Result<{ account: Account; entry: Readonly<LedgerEntry> }, EngineError> {
    const { client, tx } = record;

    const entry = this.ledger.get(tx);
    if (!entry) {
      return err(unknownTransaction(tx, client, record.type));
    }
    if (entry.client !== client) {
      return err(clientMismatch(tx, client, entry.client, record.type));
    }

    const account = this.accountStore.get(client);
    if (!account) {
      throw new LedgerInvariantError(`Ledger entry ${tx} has no account for client ${client}`);
    }

    return ok({ account, entry });
  }
}
