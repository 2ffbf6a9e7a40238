/**
 * Compact output formatter for CI/pre-commit hooks.
 * One line per finding for easy parsing.
 */
import * as path from 'node:path';
import type { Severity } from '../../core/diagnostics/kinds.js';
import type { Diagnostic } from '../../core/diagnostics/types.js';
import type { AddonResult, BatchResult } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';
import { visibleDiagnostics } from './filter.js';

const SEVERITY_LABEL: Readonly<Record<Severity, string>> = {
  error: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
};

/**
 * Format: file:line: SEVERITY [kind] message
 */
export class CompactFormatter implements IFormatter {
  private errorsOnly: boolean;
  private cwd: string;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
    this.cwd = options.cwd ?? process.cwd();
  }

  formatAddon(result: AddonResult): string {
    const lines: string[] = [];
    for (const unit of result.units) {
      for (const diagnostic of visibleDiagnostics(unit.diagnostics, this.errorsOnly)) {
        lines.push(this.formatDiagnostic(diagnostic));
      }
    }
    return lines.join('\n');
  }

  formatBatch(batch: BatchResult): string {
    const lines: string[] = [];

    for (const addon of batch.addons) {
      const formatted = this.formatAddon(addon);
      if (formatted) {
        lines.push(formatted);
      }
    }

    lines.push('');
    lines.push(this.formatSummary(batch));

    return lines.join('\n');
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const file = path.relative(this.cwd, diagnostic.file) || diagnostic.file;
    const line = diagnostic.line ?? 0;
    return `${file}:${line}: ${SEVERITY_LABEL[diagnostic.severity]} [${diagnostic.kind}] ${diagnostic.message}`;
  }

  private formatSummary(batch: BatchResult): string {
    const { summary } = batch;
    const parts: string[] = [];

    if (summary.errors > 0) {
      parts.push(`${summary.errors} error${summary.errors !== 1 ? 's' : ''}`);
    }
    if (summary.warnings > 0 && !this.errorsOnly) {
      parts.push(`${summary.warnings} warning${summary.warnings !== 1 ? 's' : ''}`);
    }
    if (summary.info > 0 && !this.errorsOnly) {
      parts.push(`${summary.info} info`);
    }
    if (parts.length === 0) {
      parts.push('0 issues');
    }

    return `SUMMARY: ${parts.join(', ')} (${summary.addons} add-on${summary.addons !== 1 ? 's' : ''} checked)`;
  }
}
