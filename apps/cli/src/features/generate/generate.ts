import { formatZodIssues } from '@ledgerline/core';
import { configureLogger } from '@ledgerline/logger';
import type { Command } from 'commander';

import { displayCliError } from '../shared/cli-error.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { GenerateCommandOptionsSchema } from '../shared/schemas.js';

import { GenerateHandler } from './generate-handler.js';
import { GeneratorConfigError } from './generator-config.js';

/**
 * Register the generate command.
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate')
    .description('Write a synthetic transactions CSV for testing and benchmarking')
    .argument('[config]', 'generator configuration JSON file', 'generator-params.json')
    .option('--verbose', 'debug logging on stderr')
    .action(async (config: string, rawOptions: object) => {
      await executeGenerateCommand({ ...rawOptions, config });
    });
}

async function executeGenerateCommand(rawOptions: unknown): Promise<void> {
  const validationResult = GenerateCommandOptionsSchema.safeParse(rawOptions);
  if (!validationResult.success) {
    displayCliError(new Error(formatZodIssues(validationResult.error)), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  if (options.verbose) {
    configureLogger({ level: 'debug' });
  }

  const result = await new GenerateHandler().execute({ configPath: options.config });
  if (result.isErr()) {
    const exitCode = result.error instanceof GeneratorConfigError ? ExitCodes.CONFIG_ERROR : ExitCodes.GENERAL_ERROR;
    displayCliError(result.error, exitCode);
  }

  // Summary goes to stderr: stdout may carry the CSV itself
  process.stderr.write(
    `Generated ${result.value.transactions} transactions for ${result.value.accounts} accounts (seed ${result.value.seed})\n`
  );
}
