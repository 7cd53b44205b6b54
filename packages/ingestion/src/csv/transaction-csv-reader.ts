import { createReadStream } from 'node:fs';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';

import { formatZodIssues, getErrorMessage, toError } from '@ledgerline/core';
import { parseError, type EngineError, type TransactionRecord } from '@ledgerline/engine';
import { getLogger } from '@ledgerline/logger';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { TRANSACTION_CSV_COLUMNS, toTransactionRecord, TransactionRowSchema } from './transaction-row-schema.js';

const logger = getLogger('transaction-csv-reader');

/** A file path or an already open byte stream */
export type TransactionSource = string | Readable;

/**
 * One data row of the input, tagged with its 1-based line number.
 */
export interface ParsedTransactionRow {
  line: number;
  result: Result<TransactionRecord, EngineError>;
}

/**
 * The header lacks a required column. The whole input is unusable.
 */
export class MissingColumnsError extends Error {
  constructor(public readonly missing: readonly string[]) {
    super(`Input header is missing required column(s): ${missing.join(', ')}`);
    this.name = 'MissingColumnsError';
  }
}

const HeaderCellsSchema = z.array(z.array(z.string()));
const DataRecordsSchema = z.array(z.record(z.string().optional()));

function parseHeader(line: string): string[] {
  const rows = HeaderCellsSchema.parse(parse(line, { bom: true, trim: true }));
  const header = rows[0] ?? [];

  const missing = TRANSACTION_CSV_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnsError(missing);
  }
  return header;
}

function parseRow(header: string[], line: string): Result<TransactionRecord, EngineError> {
  let records: z.infer<typeof DataRecordsSchema>;
  try {
    records = DataRecordsSchema.parse(parse(line, { columns: header, relax_column_count: true, trim: true }));
  } catch (error) {
    const message = getErrorMessage(error);
    logger.debug({ message }, 'Malformed CSV record');
    return err(parseError(message));
  }

  const parsed = TransactionRowSchema.safeParse(records[0] ?? {});
  if (!parsed.success) {
    return err(parseError(formatZodIssues(parsed.error)));
  }
  return ok(toTransactionRecord(parsed.data));
}

/**
 * Stream transaction records from a CSV source, strictly in input order.
 *
 * Each physical line is one record, so a row csv-parse cannot tokenize only
 * costs that row. Cells are trimmed, blank lines skipped and extra columns
 * ignored. A row that fails tokenizing or validation is yielded as a
 * ParseError and reading continues. Unreadable input and a header without
 * the required columns throw.
 */
export async function* readTransactionRecords(source: TransactionSource): AsyncGenerator<ParsedTransactionRow> {
  const input = typeof source === 'string' ? createReadStream(source) : source;
  const lines = createInterface({ crlfDelay: Infinity, input });

  let inputError: unknown;
  input.on('error', (error: Error) => {
    inputError = error;
    lines.close();
  });

  let header: string[] | undefined;
  let lineNumber = 0;

  try {
    for await (const line of lines) {
      lineNumber += 1;
      if (line.trim() === '') continue;

      if (!header) {
        header = parseHeader(line);
        continue;
      }

      yield { line: lineNumber, result: parseRow(header, line) };
    }
  } finally {
    lines.close();
    if (typeof source === 'string') input.destroy();
  }

  if (inputError !== undefined) {
    throw toError(inputError);
  }
}
