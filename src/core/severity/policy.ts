/**
 * Severity and blocking status per diagnostic kind.
 */
import type { LintConfig } from '../config/loader.js';
import {
  DEFAULT_SEVERITY,
  FALLBACK_SEVERITY,
  PARSE_ERROR_KINDS,
  type DiagnosticKind,
  type Severity,
} from '../diagnostics/kinds.js';
import type { Diagnostic, RawDiagnostic } from '../diagnostics/types.js';

export type PolicyConfig = Pick<LintConfig, 'severityOverrides' | 'blockingSeverities' | 'disabledChecks'>;

export class SeverityPolicy {
  constructor(private readonly config: PolicyConfig) {}

  severityOf(kind: DiagnosticKind): Severity {
    return this.config.severityOverrides.get(kind) ?? DEFAULT_SEVERITY[kind] ?? FALLBACK_SEVERITY;
  }

  /** Parse errors are never disabled. */
  isDisabled(kind: DiagnosticKind): boolean {
    return !PARSE_ERROR_KINDS.has(kind) && this.config.disabledChecks.has(kind);
  }

  isBlocking(severity: Severity): boolean {
    return this.config.blockingSeverities.has(severity);
  }

  /**
   * Drop disabled kinds and attach severity and blocking status to the rest.
   */
  apply(diagnostics: readonly RawDiagnostic[]): Diagnostic[] {
    const result: Diagnostic[] = [];
    for (const diagnostic of diagnostics) {
      if (this.isDisabled(diagnostic.kind)) continue;
      const severity = this.severityOf(diagnostic.kind);
      result.push({ ...diagnostic, severity, blocking: this.isBlocking(severity) });
    }
    return result;
  }
}
