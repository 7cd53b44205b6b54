import type { Decimal } from 'decimal.js';

import type { ClientId, DisputeAction, TransactionId, ValueMovingKind } from './types.js';

/**
 * Rejection kinds. None of them is fatal to a run: the record is skipped
 * and state is left untouched.
 */
export const ENGINE_ERROR_CODES = [
  'ParseError',
  'NegativeAmount',
  'DuplicateTransactionId',
  'AccountLocked',
  'InsufficientFunds',
  'UnknownTransaction',
  'ClientMismatch',
  'CannotDisputeTarget',
  'InvalidDisputeState',
] as const;

export type EngineErrorCode = (typeof ENGINE_ERROR_CODES)[number];

export interface EngineErrorDetails {
  action?: DisputeAction | undefined;
  amount?: string | undefined;
  available?: string | undefined;
  client?: ClientId | undefined;
  expectedClient?: ClientId | undefined;
  kind?: ValueMovingKind | undefined;
  line?: number | undefined;
  status?: string | undefined;
  tx?: TransactionId | undefined;
}

/**
 * A transaction rejected by validation or by the account state.
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly details: EngineErrorDetails = {}
  ) {
    super(message);
    this.name = 'EngineError';
  }

  toJSON() {
    return {
      code: this.code,
      details: this.details,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Internal-consistency fault: the dispute state machine guarantees held funds
 * cover every release and chargeback, so reaching this is a bug, not bad input.
 */
export class LedgerInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LedgerInvariantError';
  }
}

export function parseError(message: string, details: EngineErrorDetails = {}): EngineError {
  const prefix = details.line !== undefined ? `line ${details.line}: ` : '';
  return new EngineError(`${prefix}${message}`, 'ParseError', details);
}

export function negativeAmount(tx: TransactionId, client: ClientId, amount: Decimal): EngineError {
  return new EngineError(`tx ${tx}: negative amount ${amount.toFixed()} not allowed`, 'NegativeAmount', {
    amount: amount.toFixed(),
    client,
    tx,
  });
}

export function duplicateTransaction(tx: TransactionId, client: ClientId): EngineError {
  return new EngineError(`tx ${tx}: duplicate transaction id`, 'DuplicateTransactionId', { client, tx });
}

export function accountLocked(tx: TransactionId, client: ClientId): EngineError {
  return new EngineError(`tx ${tx}: account ${client} is locked`, 'AccountLocked', { client, tx });
}

export function insufficientFunds(
  tx: TransactionId,
  client: ClientId,
  requested: Decimal,
  available: Decimal
): EngineError {
  return new EngineError(
    `tx ${tx}: insufficient funds (requested ${requested.toFixed()}, available ${available.toFixed()})`,
    'InsufficientFunds',
    { amount: requested.toFixed(), available: available.toFixed(), client, tx }
  );
}

export function unknownTransaction(tx: TransactionId, client: ClientId, action: DisputeAction): EngineError {
  return new EngineError(`tx ${tx}: ${action} references an unknown transaction`, 'UnknownTransaction', {
    action,
    client,
    tx,
  });
}

export function clientMismatch(
  tx: TransactionId,
  client: ClientId,
  expectedClient: ClientId,
  action: DisputeAction
): EngineError {
  return new EngineError(
    `tx ${tx}: ${action} from client ${client} but transaction belongs to client ${expectedClient}`,
    'ClientMismatch',
    { action, client, expectedClient, tx }
  );
}

export function cannotDisputeTarget(tx: TransactionId, client: ClientId, kind: ValueMovingKind): EngineError {
  return new EngineError(`tx ${tx}: a ${kind} cannot be disputed`, 'CannotDisputeTarget', { client, kind, tx });
}

export function invalidDisputeState(
  tx: TransactionId,
  client: ClientId,
  action: DisputeAction,
  status: string
): EngineError {
  return new EngineError(`tx ${tx}: cannot ${action} a transaction in state ${status}`, 'InvalidDisputeState', {
    action,
    client,
    status,
    tx,
  });
}
