import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { LedgerInvariantError } from '../errors.js';
import type { ClientId } from '../types.js';

/**
 * Why an account refused a mutation.
 * Discriminated union so the engine can attach transaction context.
 */
export type AccountRejection =
  | { amount: Decimal; type: 'negative_amount' }
  | { type: 'locked' }
  | { available: Decimal; requested: Decimal; type: 'insufficient_funds' };

const negativeAmount = (amount: Decimal): AccountRejection => ({ amount, type: 'negative_amount' });
const locked = (): AccountRejection => ({ type: 'locked' });
const insufficientFunds = (requested: Decimal, available: Decimal): AccountRejection => ({
  available,
  requested,
  type: 'insufficient_funds',
});

/**
 * Balances of one client as seen from outside the engine, copied when taken.
 */
export interface AccountView {
  readonly available: Decimal;
  readonly client: ClientId;
  readonly held: Decimal;
  readonly locked: boolean;
  readonly total: Decimal;
}

/**
 * Balances of one client.
 *
 * `total` is derived from `available + held` and never stored. Every mutator
 * validates before it writes, so a rejected call leaves the account untouched.
 */
export class Account {
  private availableFunds = new Decimal(0);
  private heldFunds = new Decimal(0);
  private isLocked = false;

  constructor(readonly client: ClientId) {}

  get available(): Decimal {
    return this.availableFunds;
  }

  get held(): Decimal {
    return this.heldFunds;
  }

  get total(): Decimal {
    return this.availableFunds.plus(this.heldFunds);
  }

  get locked(): boolean {
    return this.isLocked;
  }

  toView(): AccountView {
    return Object.freeze({
      available: this.availableFunds,
      client: this.client,
      held: this.heldFunds,
      locked: this.isLocked,
      total: this.total,
    });
  }

  creditAvailable(amount: Decimal): Result<void, AccountRejection> {
    if (amount.lessThan(0)) {
      return err(negativeAmount(amount));
    }
    if (this.isLocked) {
      return err(locked());
    }

    this.availableFunds = this.availableFunds.plus(amount);
    return ok();
  }

  debitAvailable(amount: Decimal): Result<void, AccountRejection> {
    if (amount.lessThan(0)) {
      return err(negativeAmount(amount));
    }
    if (this.isLocked) {
      return err(locked());
    }
    if (this.availableFunds.lessThan(amount)) {
      return err(insufficientFunds(amount, this.availableFunds));
    }

    this.availableFunds = this.availableFunds.minus(amount);
    return ok();
  }

  /**
   * Freeze funds for a dispute. Allowed on locked accounts.
   */
  hold(amount: Decimal): Result<void, AccountRejection> {
    if (this.availableFunds.lessThan(amount)) {
      return err(insufficientFunds(amount, this.availableFunds));
    }

    this.availableFunds = this.availableFunds.minus(amount);
    this.heldFunds = this.heldFunds.plus(amount);
    return ok();
  }

  /**
   * Return held funds to available when a dispute is resolved.
   */
  release(amount: Decimal): void {
    this.assertHeldCovers(amount, 'release');

    this.heldFunds = this.heldFunds.minus(amount);
    this.availableFunds = this.availableFunds.plus(amount);
  }

  /**
   * Remove held funds for good and lock the account.
   */
  chargeback(amount: Decimal): void {
    this.assertHeldCovers(amount, 'chargeback');

    this.heldFunds = this.heldFunds.minus(amount);
    this.isLocked = true;
  }

  private assertHeldCovers(amount: Decimal, operation: 'chargeback' | 'release'): void {
    if (this.heldFunds.lessThan(amount)) {
      throw new LedgerInvariantError(
        `Cannot ${operation} ${amount.toFixed()} for client ${this.client}: only ${this.heldFunds.toFixed()} held`
      );
    }
  }
}
