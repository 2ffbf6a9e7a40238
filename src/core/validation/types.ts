/**
 * Lint result type definitions.
 */
import type { ValidationScope } from '../config/schema.js';
import type { DiagnosticKind, Severity } from '../diagnostics/kinds.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { Language } from '../facts/types.js';
import type { ExecutionContext } from '../scope/context.js';
import type { AddonFacts } from '../rules/types.js';

export type SeverityCounts = Record<Severity, number>;

/**
 * Diagnostics of one kind.
 */
export interface KindGroup {
  kind: DiagnosticKind;
  diagnostics: Diagnostic[];
}

/**
 * Diagnostics of one severity, by kind.
 */
export interface SeverityGroup {
  severity: Severity;
  kinds: KindGroup[];
}

/**
 * Retained diagnostics of one file.
 */
export interface UnitResult {
  file: string;
  relativePath: string;
  diagnostics: Diagnostic[];
  blocking: boolean;
}

/**
 * Result of checking one add-on.
 */
export interface AddonResult {
  name: string;
  path: string;
  status: 'checked' | 'skipped';
  /** Why the add-on was skipped */
  skipReason?: string;
  /** Files with retained diagnostics, by path */
  units: UnitResult[];
  counts: SeverityCounts;
  blocking: boolean;
}

/**
 * Result of checking several add-ons.
 */
export interface BatchResult {
  scope: ValidationScope;
  context: ExecutionContext | null;
  addons: AddonResult[];
  summary: {
    addons: number;
    addonsWithIssues: number;
    errors: number;
    warnings: number;
    info: number;
  };
  blocking: boolean;
}

/**
 * A batch result and the facts it was computed from.
 */
export interface LintRun {
  result: BatchResult;
  /** Facts of every checked add-on, regardless of scope */
  addons: AddonFacts[];
}

export interface LintOptions {
  /** Only extract and check these languages */
  languages?: ReadonlySet<Language>;
}
