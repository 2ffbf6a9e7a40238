import type { DiagnosticKind, Severity } from './kinds.js';

/**
 * A rule finding before the severity policy has run.
 * `file` is the resolved absolute path of the unit it belongs to.
 */
export interface RawDiagnostic {
  kind: DiagnosticKind;
  file: string;
  /** 1-based; null for file-level findings */
  line: number | null;
  message: string;
  snippet?: string;
}

/**
 * A finding with its effective severity.
 */
export interface Diagnostic extends RawDiagnostic {
  severity: Severity;
  blocking: boolean;
}
