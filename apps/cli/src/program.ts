import { Command } from 'commander';

import { registerGenerateCommand } from './features/generate/generate.js';
import { registerProcessCommand } from './features/process/process.js';
import { ExitCodes, exitWithCode } from './features/shared/exit-codes.js';

/**
 * Build the CLI. Commander usage errors exit with INVALID_ARGS,
 * help and version output with SUCCESS.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('ledgerline')
    .description('Apply client transactions and report final account balances')
    .version('0.1.0')
    .exitOverride((error) => {
      exitWithCode(error.exitCode === 0 ? ExitCodes.SUCCESS : ExitCodes.INVALID_ARGS);
    });

  // Process command - the default: CSV in, balances CSV out
  registerProcessCommand(program);

  // Generate command - synthetic inputs for testing
  registerGenerateCommand(program);

  return program;
}
