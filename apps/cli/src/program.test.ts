import { describe, expect, it, vi } from 'vitest';

import { createProgram } from './program.js';

describe('createProgram', () => {
  it('should register the process and generate commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('ledgerline');
    expect(program.commands.map((command) => command.name())).toEqual(['process', 'generate']);
  });

  it('should expose the process options with their defaults', () => {
    const processCommand = createProgram().commands.find((command) => command.name() === 'process');

    expect(processCommand?.options.map((option) => option.long)).toEqual([
      '--errors-log',
      '--allow-withdrawal-disputes',
      '--verbose',
    ]);
    expect(processCommand?.options[0]?.defaultValue).toBe('errors.log');
  });

  it('should exit with the invalid arguments code on an unknown option', async () => {
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    const program = createProgram();
    for (const command of program.commands) {
      command.configureOutput({ writeErr: () => undefined });
    }

    await expect(program.parseAsync(['node', 'ledgerline', 'process', 'input.csv', '--bogus'])).rejects.toThrow(
      'process.exit called'
    );
    expect(exitSpy).toHaveBeenCalledWith(2);

    exitSpy.mockRestore();
  });
});
