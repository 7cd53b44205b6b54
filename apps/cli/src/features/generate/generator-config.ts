import { readFile } from 'node:fs/promises';

import { formatZodIssues, fromZod, getErrorMessage } from '@ledgerline/core';
import { err, type Result } from 'neverthrow';
import { z } from 'zod';

const ProbabilitySchema = z.number().min(0, 'must be between 0 and 1').max(1, 'must be between 0 and 1');

/**
 * Synthetic transaction generator settings, read from a JSON file.
 */
export const GeneratorConfigSchema = z.object({
  accounts: z.object({
    count: z.number().int().min(1, 'must be > 0').max(65_535, 'must be at most 65535'),
  }),
  amounts: z
    .object({
      max: z.number(),
      min: z.number().min(0, 'must be >= 0'),
      precision: z.number().int().min(0).max(4, 'must be <= 4'),
    })
    .refine((amounts) => amounts.min <= amounts.max, { message: 'min must be <= max', path: ['min'] }),
  disputes: z.object({
    probability: ProbabilitySchema,
    resolutionProbability: ProbabilitySchema,
  }),
  output: z
    .object({
      /** Target path, `-` for stdout */
      file: z.string().min(1).default('-'),
      /** Fixed seed for reproducible output */
      seed: z.number().int().min(0).max(0xffff_ffff).optional(),
    })
    .default({}),
  transactions: z
    .object({
      maxPerAccount: z.number().int().min(0),
      minPerAccount: z.number().int().min(0),
    })
    .refine((transactions) => transactions.minPerAccount <= transactions.maxPerAccount, {
      message: 'minPerAccount must be <= maxPerAccount',
      path: ['minPerAccount'],
    }),
  withdrawals: z.object({
    overdrawProbability: ProbabilitySchema,
    probability: ProbabilitySchema,
  }),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

/**
 * The generator configuration file is missing, unreadable or invalid.
 */
export class GeneratorConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GeneratorConfigError';
  }
}

/**
 * Read and validate a generator configuration file.
 */
export async function loadGeneratorConfig(configPath: string): Promise<Result<GeneratorConfig, GeneratorConfigError>> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf8');
  } catch (error) {
    return err(new GeneratorConfigError(`Failed to read '${configPath}': ${getErrorMessage(error)}`));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return err(new GeneratorConfigError(`Failed to parse config: ${getErrorMessage(error)}`));
  }

  return fromZod(GeneratorConfigSchema, raw).mapErr(
    (error) => new GeneratorConfigError(`Invalid config: ${formatZodIssues(error)}`)
  );
}
