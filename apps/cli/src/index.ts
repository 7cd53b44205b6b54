#!/usr/bin/env node
import { getLogger } from '@ledgerline/logger';

import { displayCliError } from './features/shared/cli-error.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { createProgram } from './program.js';

const logger = getLogger('CLI');

async function main() {
  await createProgram().parseAsync(process.argv);
}

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
  logger.error({ reason: String(reason) }, 'Unhandled rejection');
  displayCliError(new Error(`Unhandled rejection: ${String(reason)}`), ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  displayCliError(error instanceof Error ? error : new Error(String(error)), ExitCodes.GENERAL_ERROR);
});
