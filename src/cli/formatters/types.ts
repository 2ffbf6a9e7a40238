/**
 * Formatter type definitions.
 */
import type { AddonResult, BatchResult } from '../../core/validation/types.js';

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  format: OutputFormat;
  /** Use colors in output */
  colors: boolean;
  /** Also list add-ons without findings */
  verbose: boolean;
  /** Only show errors (every check still runs) */
  errorsOnly: boolean;
  /** Most findings shown per kind and add-on; null for all */
  maxMessages: number | null;
  /** Paths are shown relative to this directory */
  cwd: string;
}

export interface IFormatter {
  formatAddon(result: AddonResult): string;

  formatBatch(batch: BatchResult): string;
}
