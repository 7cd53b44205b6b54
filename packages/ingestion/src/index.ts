export { ACCOUNTS_CSV_HEADER, formatAccountsCsv } from './csv/accounts-csv.js';
export {
  MissingColumnsError,
  readTransactionRecords,
  type ParsedTransactionRow,
  type TransactionSource,
} from './csv/transaction-csv-reader.js';
export {
  TRANSACTION_CSV_COLUMNS,
  TransactionRowSchema,
  toTransactionRecord,
  type TransactionRow,
} from './csv/transaction-row-schema.js';
export {
  DeferredRejectionSink,
  DiscardingRejectionSink,
  FileRejectionSink,
  formatRejection,
  MemoryRejectionSink,
  openRejectionLog,
  type RejectionSink,
} from './rejections/rejection-log.js';
export {
  processTransactions,
  type ProcessSummary,
  type ProcessTransactionsOptions,
} from './pipeline/process-transactions.js';
