/**
 * Restricts diagnostics to changed files.
 */
import type { ValidationScope } from '../config/schema.js';
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';

/** Findings about the add-on as a whole; kept whatever changed. */
export const ADDON_LEVEL_KINDS: ReadonlySet<DiagnosticKind> = new Set<DiagnosticKind>([
  'manifest_syntax_error',
  'missing_readme',
]);

export class ScopeFilter {
  /**
   * @param changed - resolved paths of changed files; ignored in `full` scope
   */
  constructor(
    readonly scope: ValidationScope,
    private readonly changed: ReadonlySet<string> = new Set()
  ) {}

  static full(): ScopeFilter {
    return new ScopeFilter('full');
  }

  /** With an empty changed set nothing is in scope. */
  inScope(file: string): boolean {
    return this.scope === 'full' || this.changed.has(file);
  }

  apply<D extends RawDiagnostic>(diagnostics: readonly D[]): D[] {
    return diagnostics.filter((d) => ADDON_LEVEL_KINDS.has(d.kind) || this.inScope(d.file));
  }
}
