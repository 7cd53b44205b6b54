import { toError } from '@ledgerline/core';
import {
  TransactionEngine,
  type AccountSnapshotRow,
  type EngineStats,
  type TransactionEngineOptions,
} from '@ledgerline/engine';
import { getLogger } from '@ledgerline/logger';
import { err, ok, type Result } from 'neverthrow';

import { readTransactionRecords, type TransactionSource } from '../csv/transaction-csv-reader.js';
import { DeferredRejectionSink, DiscardingRejectionSink, type RejectionSink } from '../rejections/rejection-log.js';

const logger = getLogger('process-transactions');

export interface ProcessTransactionsOptions {
  source: TransactionSource;
  /**
   * Opens the destination for malformed or rejected records. Called once the
   * input is known to be readable; the sink is closed when the run ends.
   * Rejections are discarded when omitted.
   */
  openSink?: (() => RejectionSink) | undefined;
  engineOptions?: TransactionEngineOptions | undefined;
}

export interface ProcessSummary {
  /** Final balances, ascending by client id */
  accounts: AccountSnapshotRow[];
  /** Data rows read, including malformed ones */
  records: number;
  /** Rows that failed to parse */
  parseErrors: number;
  /** Rows the engine rejected */
  rejected: number;
  stats: EngineStats;
}

/**
 * Run one input through a fresh engine.
 *
 * Records are applied one at a time in input order. A bad record goes to the
 * sink and the run continues; only failing to read the input is an error.
 */
export async function processTransactions(
  options: ProcessTransactionsOptions
): Promise<Result<ProcessSummary, Error>> {
  const engine = new TransactionEngine(options.engineOptions);
  const sink = new DeferredRejectionSink(options.openSink ?? (() => new DiscardingRejectionSink()));

  let records = 0;
  let parseErrors = 0;
  let rejected = 0;

  try {
    for await (const { line, result } of readTransactionRecords(options.source)) {
      records += 1;

      if (result.isErr()) {
        parseErrors += 1;
        sink.record(line, result.error);
        continue;
      }

      const applied = engine.apply(result.value);
      if (applied.isErr()) {
        rejected += 1;
        sink.record(line, applied.error);
      }
    }
    // A clean run still replaces the previous log
    sink.open();
  } catch (error) {
    return err(toError(error));
  } finally {
    sink.close();
  }

  const summary: ProcessSummary = {
    accounts: engine.snapshot(),
    parseErrors,
    records,
    rejected,
    stats: engine.stats(),
  };

  logger.info(
    { accounts: summary.accounts.length, parseErrors, records, rejected },
    'Finished processing transactions'
  );

  return ok(summary);
}
