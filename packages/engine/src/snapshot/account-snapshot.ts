import { formatFixed } from '@ledgerline/core';

import type { AccountView } from '../account/account.js';
import type { ClientId } from '../types.js';

/**
 * One output row. Amounts are rendered with exactly four fractional digits.
 */
export interface AccountSnapshotRow {
  available: string;
  client: ClientId;
  held: string;
  locked: boolean;
  total: string;
}

export function toSnapshotRow(account: AccountView): AccountSnapshotRow {
  return {
    available: formatFixed(account.available),
    client: account.client,
    held: formatFixed(account.held),
    locked: account.locked,
    total: formatFixed(account.total),
  };
}

/**
 * Final state of every account that appeared in the run, ascending by client id.
 */
export function buildAccountSnapshot(accounts: Iterable<AccountView>): AccountSnapshotRow[] {
  return Array.from(accounts, toSnapshotRow).sort((a, b) => a.client - b.client);
}
