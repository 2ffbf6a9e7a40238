/**
 * Helper functions for the check command.
 */
import { z } from 'zod';
import { ContextOverrideSchema, ValidationScopeSchema } from '../../core/config/schema.js';
import type { BatchResult, SeverityCounts } from '../../core/validation/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import { CompactFormatter, HumanFormatter, JsonFormatter, type FormatOptions, type IFormatter } from '../formatters/index.js';

export const LanguageSchema = z.enum(['python', 'xml', 'csv', 'po', 'manifest']);

const countString = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform((value) => Number.parseInt(value, 10));

/**
 * Options as commander hands them over (camel-cased flag names, strings for values).
 */
export const CheckOptionsSchema = z.object({
  format: z.enum(['human', 'json', 'compact']).default('human'),
  config: z.string().optional(),
  scope: ValidationScopeSchema.optional(),
  context: ContextOverrideSchema.optional(),
  baseBranch: z.string().min(1).optional(),
  only: LanguageSchema.optional(),
  metrics: z.boolean().default(false),
  report: z.string().min(1).optional(),
  maxMessages: countString.optional(),
  errorsOnly: z.boolean().default(false),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type CheckOptions = z.infer<typeof CheckOptionsSchema>;

/**
 * @throws ConfigError for an unknown value
 */
export function parseCheckOptions(raw: unknown): CheckOptions {
  const result = CheckOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(ErrorCodes.INVALID_OPTION, `Invalid option: ${formatZodError(result.error)}`, {
      errors: result.error.issues,
    });
  }
  return result.data;
}

export function createFormatter(options: FormatOptions): IFormatter {
  switch (options.format) {
    case 'json':
      return new JsonFormatter(options);
    case 'compact':
      return new CompactFormatter(options);
    case 'human':
      return new HumanFormatter(options);
  }
}

/** Batch summary in the shape the coverage report takes. */
export function issueCounts(batch: BatchResult): SeverityCounts {
  return { error: batch.summary.errors, warning: batch.summary.warnings, info: batch.summary.info };
}

export function getExitCode(batch: BatchResult): number {
  return batch.blocking ? 1 : 0;
}
