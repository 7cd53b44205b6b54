import pc from 'picocolors';

import { type ExitCode, ExitCodes, exitWithCode } from './exit-codes.js';

/**
 * Tips shown after error messages, keyed by exit code.
 */
const ERROR_TIPS: Partial<Record<ExitCode, string>> = {
  [ExitCodes.INVALID_ARGS]: 'Check your command arguments and try again. Run with --help for usage information.',
  [ExitCodes.CONFIG_ERROR]: 'Check the generator configuration file against the documented keys and ranges.',
};

/**
 * Render an error the way it is written to stderr, tip included.
 */
export function formatCliError(error: Error, exitCode: ExitCode): string {
  let text = `${pc.red('Error:')} ${error.message}\n`;

  const tip = ERROR_TIPS[exitCode];
  if (tip) {
    text += `${pc.dim(tip)}\n`;
  }

  // In development, show full stack trace
  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    text += `\n${pc.dim(error.stack)}\n`;
  }

  return text;
}

/**
 * Display a CLI error on stderr and exit.
 */
export function displayCliError(error: Error, exitCode: ExitCode): never {
  process.stderr.write(formatCliError(error, exitCode));
  exitWithCode(exitCode);
}
