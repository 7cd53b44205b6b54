import type { ClientId, DepositRecord, TransactionRecord } from '@ledgerline/engine';
import { Decimal } from 'decimal.js';
import { type RandomGenerator, unsafeUniformIntDistribution, xoroshiro128plus } from 'pure-rand';

import type { GeneratorConfig } from './generator-config.js';

const FLOAT_STEPS = 2 ** 30;

/**
 * Deterministic random source, reproducible from its seed.
 */
export class SeededRandom {
  private readonly generator: RandomGenerator;

  constructor(readonly seed: number) {
    this.generator = xoroshiro128plus(seed);
  }

  /** Uniform integer in [min, max] */
  int(min: number, max: number): number {
    return unsafeUniformIntDistribution(min, max, this.generator);
  }

  /** Uniform float in [0, 1) */
  next(): number {
    return this.int(0, FLOAT_STEPS - 1) / FLOAT_STEPS;
  }

  /** Shuffled copy of `items` */
  shuffle<T>(items: readonly T[]): T[] {
    return items
      .map((item) => ({ item, key: this.next() }))
      .sort((a, b) => a.key - b.key)
      .map(({ item }) => item);
  }
}

/**
 * Uniform amount in [min, max] with `precision` fractional digits.
 * Falls back to `min` rounded when no step of that precision fits in the range.
 */
export function randomAmount(random: SeededRandom, min: Decimal.Value, max: Decimal.Value, precision: number): Decimal {
  const scale = new Decimal(10).pow(precision);
  const low = new Decimal(min).times(scale).ceil();
  const high = new Decimal(max).times(scale).floor();

  if (low.greaterThan(high)) {
    return new Decimal(min).toDecimalPlaces(precision);
  }
  return new Decimal(random.int(low.toNumber(), high.toNumber())).dividedBy(scale);
}

/**
 * Build a plausible transaction history.
 *
 * Deposits and withdrawals are interleaved across accounts, with transaction
 * ids assigned in order. Withdrawals stay within the running balance unless
 * an overdraw is drawn. A random subset of deposits is then disputed, and
 * every dispute is followed by a resolve or a chargeback.
 */
export function generateTransactions(config: GeneratorConfig, random: SeededRandom): TransactionRecord[] {
  const { accounts, amounts, disputes, transactions, withdrawals } = config;

  const records: TransactionRecord[] = [];
  const remaining = new Map<ClientId, number>();
  const balances = new Map<ClientId, Decimal>();
  const disputable: DepositRecord[] = [];

  for (let client = 1; client <= accounts.count; client++) {
    remaining.set(client, random.int(transactions.minPerAccount, transactions.maxPerAccount));
  }

  const active = Array.from(remaining.keys()).filter((client) => (remaining.get(client) ?? 0) > 0);
  let nextTx = 1;

  while (active.length > 0) {
    const index = random.int(0, active.length - 1);
    const client = active[index];
    if (client === undefined) break;

    const balance = balances.get(client) ?? new Decimal(0);

    if (random.next() < withdrawals.probability) {
      let amount: Decimal;
      if (balance.lessThanOrEqualTo(0) || random.next() < withdrawals.overdrawProbability) {
        amount = randomAmount(random, amounts.min, amounts.max, amounts.precision);
      } else {
        const ceiling = Decimal.min(balance, amounts.max);
        amount = randomAmount(random, Decimal.min(amounts.min, ceiling), ceiling, amounts.precision);
      }

      records.push({ amount, client, tx: nextTx, type: 'withdrawal' });
      if (amount.lessThanOrEqualTo(balance)) {
        balances.set(client, balance.minus(amount));
      }
    } else {
      const deposit: DepositRecord = {
        amount: randomAmount(random, amounts.min, amounts.max, amounts.precision),
        client,
        tx: nextTx,
        type: 'deposit',
      };

      records.push(deposit);
      balances.set(client, balance.plus(deposit.amount));
      if (random.next() < disputes.probability) {
        disputable.push(deposit);
      }
    }

    nextTx += 1;
    const left = (remaining.get(client) ?? 1) - 1;
    remaining.set(client, left);
    if (left <= 0) {
      active.splice(index, 1);
    }
  }

  const disputed = random.shuffle(disputable);
  for (const { client, tx } of disputed) {
    records.push({ client, tx, type: 'dispute' });
  }
  for (const { client, tx } of disputed) {
    records.push({ client, tx, type: random.next() < disputes.resolutionProbability ? 'resolve' : 'chargeback' });
  }

  return records;
}

/**
 * One CSV row in the input format. Amount cells are written with `precision` digits
 * and left empty for dispute, resolve and chargeback rows.
 */
export function formatTransactionRow(record: TransactionRecord, precision: number): string {
  switch (record.type) {
    case 'deposit':
    case 'withdrawal':
      return `${record.type},${record.client},${record.tx},${record.amount.toFixed(precision)}`;
    case 'dispute':
    case 'resolve':
    case 'chargeback':
      return `${record.type},${record.client},${record.tx},`;
    default: {
      const _exhaustive: never = record;
      return _exhaustive;
    }
  }
}

export function renderTransactionsCsv(records: readonly TransactionRecord[], precision: number): string {
  const rows = records.map((record) => formatTransactionRow(record, precision));
  return ['type,client,tx,amount', ...rows].join('\n') + '\n';
}
