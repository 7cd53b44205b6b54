import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

import { displayCliError, formatCliError } from '../cli-error.js';
import { ExitCodes } from '../exit-codes.js';

// picocolors only colors when the terminal supports it
function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, '');
}

describe('cli-error', () => {
  describe('formatCliError', () => {
    it('should print the message after an Error prefix', () => {
      expect(stripAnsi(formatCliError(new Error('ENOENT: no such file'), ExitCodes.GENERAL_ERROR))).toBe(
        'Error: ENOENT: no such file\n'
      );
    });

    it('should add a tip for invalid arguments', () => {
      expect(stripAnsi(formatCliError(new Error('input: Required'), ExitCodes.INVALID_ARGS))).toBe(
        'Error: input: Required\nCheck your command arguments and try again. Run with --help for usage information.\n'
      );
    });
  });

  describe('displayCliError', () => {
    let exitSpy: MockInstance<typeof process.exit>;
    let stderrSpy: MockInstance<typeof process.stderr.write>;

    beforeEach(() => {
      exitSpy = vi.spyOn(process, 'exit').mockImplementation((): never => {
        throw new Error('process.exit called');
      });
      stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
      exitSpy.mockRestore();
      stderrSpy.mockRestore();
    });

    it('should write to stderr and exit with the given code', () => {
      expect(() => displayCliError(new Error('bad config'), ExitCodes.CONFIG_ERROR)).toThrow('process.exit called');

      expect(stderrSpy).toHaveBeenCalledTimes(1);
      expect(exitSpy).toHaveBeenCalledWith(11);
    });
  });
});
