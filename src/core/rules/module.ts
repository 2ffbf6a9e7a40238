/**
 * Checks over the add-on as a whole.
 */
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import { BaseRule } from './base.js';
import type { RuleContext } from './types.js';

/** Reported against the manifest file when no README sits at the add-on root. */
export class MissingReadmeRule extends BaseRule {
  readonly name = 'missing-readme';
  readonly language = 'manifest';
  readonly kinds: readonly DiagnosticKind[] = ['missing_readme'];

  check(context: RuleContext): RawDiagnostic[] {
    const { addon } = context;
    if (addon.readme !== null) return [];
    return [this.createDiagnostic('missing_readme', addon.manifest.path, null, `${addon.path} missing README`)];
  }
}
