import type { ValueMovingKind } from '@ledgerline/engine';
import {
  formatAccountsCsv,
  openRejectionLog,
  processTransactions,
  type ProcessSummary,
  type RejectionSink,
  type TransactionSource,
} from '@ledgerline/ingestion';
import { getLogger } from '@ledgerline/logger';
import type { Result } from 'neverthrow';

const logger = getLogger('ProcessHandler');

/**
 * Result of the process operation.
 */
export interface ProcessResult {
  /** Account report, header first */
  csv: string;

  summary: ProcessSummary;
}

/**
 * Process handler parameters
 */
export interface ProcessHandlerParams {
  /** Transactions CSV path or stream */
  input: TransactionSource;

  /** Rejection log path */
  errorsLog: string;

  /** Let disputes target withdrawals as well as deposits */
  allowWithdrawalDisputes?: boolean | undefined;
}

/**
 * Process handler - encapsulates all process business logic.
 * Reusable by both CLI command and tests.
 */
export class ProcessHandler {
  constructor(private readonly openSink: (path: string) => RejectionSink = openRejectionLog) {}

  /**
   * Execute the process operation. The rejection log is only replaced once
   * the input has been read.
   */
  async execute(params: ProcessHandlerParams): Promise<Result<ProcessResult, Error>> {
    const disputableKinds: ValueMovingKind[] = params.allowWithdrawalDisputes ? ['deposit', 'withdrawal'] : ['deposit'];

    const result = await processTransactions({
      engineOptions: { disputableKinds },
      openSink: () => this.openSink(params.errorsLog),
      source: params.input,
    });

    return result.map((summary) => {
      if (summary.parseErrors + summary.rejected > 0) {
        logger.info(
          { errorsLog: params.errorsLog, rejected: summary.parseErrors + summary.rejected },
          'Some records were rejected'
        );
      }
      return { csv: formatAccountsCsv(summary.accounts), summary };
    });
  }
}
