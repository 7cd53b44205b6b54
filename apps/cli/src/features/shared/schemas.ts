import { z } from 'zod';

export const VerboseFlagSchema = z.object({
  verbose: z.boolean().optional(),
});

/**
 * Process command options (argument plus flags)
 */
export const ProcessCommandOptionsSchema = z
  .object({
    allowWithdrawalDisputes: z.boolean().optional(),
    errorsLog: z.string().trim().min(1, '--errors-log must not be empty').default('errors.log'),
    input: z.string().trim().min(1, 'Input file path is required'),
  })
  .extend(VerboseFlagSchema.shape);

/**
 * Generate command options
 */
export const GenerateCommandOptionsSchema = z
  .object({
    config: z.string().trim().min(1).default('generator-params.json'),
  })
  .extend(VerboseFlagSchema.shape);
