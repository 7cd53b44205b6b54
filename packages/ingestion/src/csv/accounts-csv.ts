import type { AccountSnapshotRow } from '@ledgerline/engine';

export const ACCOUNTS_CSV_HEADER = 'client,available,held,total,locked';

/**
 * Render the final account snapshot as CSV, header first, newline-terminated.
 * Rows are written in the order given.
 */
export function formatAccountsCsv(rows: readonly AccountSnapshotRow[]): string {
  const lines = rows.map((row) => [row.client, row.available, row.held, row.total, row.locked].join(','));
  return [ACCOUNTS_CSV_HEADER, ...lines].join('\n') + '\n';
}
