import type { Diagnostic } from '../../core/diagnostics/types.js';

/**
 * Diagnostics to show: everything, or only errors.
 */
export function visibleDiagnostics(diagnostics: readonly Diagnostic[], errorsOnly: boolean): Diagnostic[] {
  return errorsOnly ? diagnostics.filter((d) => d.severity === 'error') : [...diagnostics];
}
