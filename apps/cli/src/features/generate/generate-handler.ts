import { randomInt } from 'node:crypto';
import { writeFile } from 'node:fs/promises';

import { wrapError } from '@ledgerline/core';
import { getLogger } from '@ledgerline/logger';
import { err, ok, type Result } from 'neverthrow';

import { generateTransactions, renderTransactionsCsv, SeededRandom } from './generate-utils.js';
import { loadGeneratorConfig } from './generator-config.js';

const logger = getLogger('GenerateHandler');

/**
 * Result of the generate operation.
 */
export interface GenerateResult {
  accounts: number;
  /** `-` when written to stdout */
  output: string;
  /** Seed actually used, to replay the same output */
  seed: number;
  transactions: number;
}

export interface GenerateHandlerParams {
  configPath: string;
}

/**
 * Generate handler - writes a synthetic transactions CSV described by a config file.
 */
export class GenerateHandler {
  constructor(private readonly writeStdout: (text: string) => void = (text) => process.stdout.write(text)) {}

  async execute(params: GenerateHandlerParams): Promise<Result<GenerateResult, Error>> {
    const configResult = await loadGeneratorConfig(params.configPath);
    if (configResult.isErr()) {
      return err(configResult.error);
    }
    const config = configResult.value;

    const seed = config.output.seed ?? randomInt(0, 0xffff_ffff);
    const records = generateTransactions(config, new SeededRandom(seed));
    const csv = renderTransactionsCsv(records, config.amounts.precision);

    if (config.output.file === '-') {
      this.writeStdout(csv);
    } else {
      try {
        await writeFile(config.output.file, csv, 'utf8');
      } catch (error) {
        return wrapError(error, `Failed to write '${config.output.file}'`);
      }
    }

    logger.debug(
      { accounts: config.accounts.count, output: config.output.file, seed, transactions: records.length },
      'Generated transactions'
    );

    return ok({
      accounts: config.accounts.count,
      output: config.output.file,
      seed,
      transactions: records.length,
    });
  }
}
