import chalk from 'chalk';
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
 * Human-readable output: findings grouped by add-on and file, then a summary.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      format: 'human',
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      errorsOnly: options.errorsOnly ?? false,
      maxMessages: options.maxMessages ?? null,
      cwd: options.cwd ?? process.cwd(),
    };
  }

  formatAddon(result: AddonResult): string {
    const lines: string[] = [];

    if (result.status === 'skipped') {
      lines.push(`${this.colorize('-', 'dim')} ${result.name} ${this.colorize(`(skipped: ${result.skipReason ?? 'unknown'})`, 'dim')}`);
      return lines.join('\n');
    }

    const total = result.units.reduce(
      (sum, unit) => sum + visibleDiagnostics(unit.diagnostics, this.options.errorsOnly).length,
      0
    );
    if (total === 0) {
      lines.push(`${this.colorize('✓', 'green')} ${result.name}`);
      return lines.join('\n');
    }

    const icon = result.blocking ? this.colorize('✗', 'red') : this.colorize('⚠', 'yellow');
    lines.push(`${icon} ${result.name} (${total} issue${total !== 1 ? 's' : ''})`);

    const shownPerKind = new Map<string, number>();
    const hiddenPerKind = new Map<string, number>();
    for (const unit of result.units) {
      const shown: Diagnostic[] = [];
      for (const diagnostic of visibleDiagnostics(unit.diagnostics, this.options.errorsOnly)) {
        const count = shownPerKind.get(diagnostic.kind) ?? 0;
        if (this.options.maxMessages !== null && count >= this.options.maxMessages) {
          hiddenPerKind.set(diagnostic.kind, (hiddenPerKind.get(diagnostic.kind) ?? 0) + 1);
          continue;
        }
        shownPerKind.set(diagnostic.kind, count + 1);
        shown.push(diagnostic);
      }
      if (shown.length === 0) continue;

      lines.push(`   ${this.colorize(unit.relativePath, 'bold')}`);
      for (const diagnostic of shown) {
        lines.push(`      ${this.formatDiagnostic(diagnostic)}`);
      }
    }

    for (const [kind, hidden] of hiddenPerKind) {
      lines.push(`   ${this.colorize(`... ${hidden} more [${kind}]`, 'dim')}`);
    }
    return lines.join('\n');
  }

  formatBatch(batch: BatchResult): string {
    const lines: string[] = [];

    for (const addon of batch.addons) {
      const visible = addon.units.some(
        (unit) => visibleDiagnostics(unit.diagnostics, this.options.errorsOnly).length > 0
      );
      if (!visible && !this.options.verbose) continue;
      lines.push(this.formatAddon(addon));
      lines.push('');
    }

    lines.push(this.formatSummary(batch));
    return lines.join('\n');
  }

  private formatDiagnostic(diagnostic: Diagnostic): string {
    const location = diagnostic.line !== null ? `Line ${diagnostic.line}` : 'File';
    const label = SEVERITY_LABEL[diagnostic.severity];
    const severity = this.colorize(label.padEnd(5), this.severityColor(diagnostic.severity));
    return `${location}: ${severity} [${diagnostic.kind}] ${diagnostic.message}`;
  }

  private formatSummary(batch: BatchResult): string {
    const { summary } = batch;
    const lines: string[] = [];

    lines.push('═'.repeat(60));

    const errorsText = this.colorize(`${summary.errors} error${summary.errors !== 1 ? 's' : ''}`, 'red');
    const warningsText = this.colorize(`${summary.warnings} warning${summary.warnings !== 1 ? 's' : ''}`, 'yellow');
    const infoText = this.colorize(`${summary.info} info`, 'blue');
    lines.push(`SUMMARY: ${errorsText}, ${warningsText}, ${infoText}`);

    const skipped = batch.addons.filter((addon) => addon.status === 'skipped').length;
    lines.push(`Add-ons checked: ${summary.addons} (${summary.addonsWithIssues} with issues, ${skipped} skipped)`);

    const scope = batch.scope === 'changed' ? 'changed files only' : 'full';
    lines.push(`Scope: ${scope}${batch.context ? ` (${batch.context})` : ''}`);

    if (batch.blocking) {
      lines.push(this.colorize('Blocking issues found', 'red'));
    }
    return lines.join('\n');
  }

  private severityColor(severity: Severity): 'red' | 'yellow' | 'blue' {
    switch (severity) {
      case 'error':
        return 'red';
      case 'warning':
        return 'yellow';
      case 'info':
        return 'blue';
    }
  }

  private colorize(
    text: string,
    color: 'red' | 'green' | 'yellow' | 'blue' | 'dim' | 'bold'
  ): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'blue':
        return chalk.blue(text);
      case 'dim':
        return chalk.dim(text);
      case 'bold':
        return chalk.bold(text);
    }
  }
}
