import { formatZodIssues } from '@ledgerline/core';
import { configureLogger } from '@ledgerline/logger';
import type { Command } from 'commander';
import type { z } from 'zod';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { ProcessCommandOptionsSchema } from '../shared/schemas.js';

import { ProcessHandler } from './process-handler.js';

/**
 * Process command options validated by Zod at CLI boundary
 */
export type ProcessCommandOptions = z.infer<typeof ProcessCommandOptionsSchema>;

/**
 * Register the process command. It is also the default command, so
 * `ledgerline transactions.csv` works as well.
 */
export function registerProcessCommand(program: Command): void {
  program
    .command('process', { isDefault: true })
    .description('Apply a transactions CSV and print the final account balances as CSV')
    .argument('<input>', 'path to the transactions CSV')
    .option('--errors-log <path>', 'file receiving malformed and rejected records', 'errors.log')
    .option('--allow-withdrawal-disputes', 'let disputes target withdrawals as well as deposits')
    .option('--verbose', 'debug logging on stderr')
    .action(async (input: string, rawOptions: object) => {
      await executeProcessCommand({ ...rawOptions, input });
    });
}

/**
 * Execute the process command.
 */
async function executeProcessCommand(rawOptions: unknown): Promise<void> {
  // Validate options at CLI boundary with Zod
  const validationResult = ProcessCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    displayCliError(new Error(formatZodIssues(validationResult.error)), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  if (options.verbose) {
    configureLogger({ level: 'debug' });
  }

  try {
    const handler = new ProcessHandler();
    const result = await handler.execute({
      allowWithdrawalDisputes: options.allowWithdrawalDisputes,
      errorsLog: options.errorsLog,
      input: options.input,
    });

    if (result.isErr()) {
      displayCliError(result.error, ExitCodes.GENERAL_ERROR);
    }

    process.stdout.write(result.value.csv);
  } catch (error) {
    displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
  }
}
