import type { Diagnostic } from '../../core/diagnostics/types.js';
import type { AddonResult, BatchResult } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';
import { visibleDiagnostics } from './filter.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  private transformDiagnostic(d: Diagnostic): Record<string, unknown> {
    const result: Record<string, unknown> = {
      kind: d.kind,
      severity: d.severity,
      blocking: d.blocking,
      file: d.file,
      line: d.line,
      message: d.message,
    };
    if (d.snippet !== undefined) {
      result.snippet = d.snippet;
    }
    return result;
  }

  private transformAddon(result: AddonResult): Record<string, unknown> {
    return {
      name: result.name,
      path: result.path,
      status: result.status,
      skip_reason: result.skipReason,
      blocking: result.blocking,
      counts: result.counts,
      units: result.units
        .map((unit) => ({
          file: unit.file,
          relative_path: unit.relativePath,
          blocking: unit.blocking,
          diagnostics: visibleDiagnostics(unit.diagnostics, this.errorsOnly).map((d) =>
            this.transformDiagnostic(d)
          ),
        }))
        .filter((unit) => unit.diagnostics.length > 0),
    };
  }

  formatAddon(result: AddonResult): string {
    return JSON.stringify(this.transformAddon(result), null, 2);
  }

  formatBatch(batch: BatchResult): string {
    return JSON.stringify(
      {
        scope: batch.scope,
        context: batch.context,
        blocking: batch.blocking,
        summary: {
          addons: batch.summary.addons,
          addons_with_issues: batch.summary.addonsWithIssues,
          errors: batch.summary.errors,
          warnings: batch.summary.warnings,
          info: batch.summary.info,
        },
        addons: batch.addons.map((addon) => this.transformAddon(addon)),
      },
      null,
      2
    );
  }
}
