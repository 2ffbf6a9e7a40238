/**
 * Source fact extractor interface.
 */

import type { Facts, Language, SourceUnit } from '../core/facts/types.js';

export interface ExtractionInput {
  /** Resolved absolute path */
  path: string;
  /** Path relative to the add-on root */
  relativePath: string;
  content: string;
  /** Manifest section for data files (`data`, `demo`, ...) */
  dataSection?: string;
}

/**
 * Turns one source unit into facts or a parse failure.
 * Implementations never throw for malformed input; the failure is returned on the unit.
 */
export interface IFactExtractor<F extends Facts = Facts> {
  readonly language: Language;

  /** File extensions this extractor handles */
  readonly supportedExtensions: string[];

  extract(input: ExtractionInput): SourceUnit<F>;

  /**
   * Release resources.
   */
  dispose(): void;
}
