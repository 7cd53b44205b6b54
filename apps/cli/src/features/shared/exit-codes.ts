/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  /** Successful execution, including runs where records were rejected */
  SUCCESS: 0,

  /** General error (catch-all), including unreadable input */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code. Every exit of the CLI goes through here.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
