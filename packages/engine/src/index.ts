export * from './types.js';
export * from './errors.js';
export type { AccountRejection, AccountView } from './account/account.js';
export {
  DISPUTE_STATUSES,
  transitionDisputeStatus,
  type DisputeStatus,
  type InvalidDisputeTransition,
} from './ledger/dispute-status.js';
export type { LedgerEntry } from './ledger/ledger.js';
export { buildAccountSnapshot, toSnapshotRow, type AccountSnapshotRow } from './snapshot/account-snapshot.js';
export {
  TransactionEngine,
  type EngineStats,
  type TransactionEngineOptions,
} from './engine/transaction-engine.js';
