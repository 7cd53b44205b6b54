import type { ClientId } from '../types.js';

import { Account } from './account.js';

/**
 * Accounts keyed by client id. Accounts are never removed during a run.
 */
export class AccountStore {
  private readonly accounts = new Map<ClientId, Account>();

  get size(): number {
    return this.accounts.size;
  }

  get(client: ClientId): Account | undefined {
    return this.accounts.get(client);
  }

  has(client: ClientId): boolean {
    return this.accounts.has(client);
  }

  /**
   * Existing account, or a fresh zero-balance one that is NOT yet stored.
   * Callers add it with {@link add} once the mutation on it succeeded.
   */
  getOrDraft(client: ClientId): { account: Account; isNew: boolean } {
    const existing = this.accounts.get(client);
    if (existing) {
      return { account: existing, isNew: false };
    }
    return { account: new Account(client), isNew: true };
  }

  add(account: Account): void {
    if (this.accounts.has(account.client)) {
      throw new Error(`Account for client ${account.client} already exists`);
    }
    this.accounts.set(account.client, account);
  }

  values(): IterableIterator<Account> {
    return this.accounts.values();
  }
}
