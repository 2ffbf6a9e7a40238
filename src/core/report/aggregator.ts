/**
 * Merges diagnostics into per-unit, per-add-on and per-batch results.
 */
import type { ValidationScope } from '../config/schema.js';
import { SEVERITIES, SEVERITY_RANK, type Severity } from '../diagnostics/kinds.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { ExecutionContext } from '../scope/context.js';
import type {
  AddonResult,
  BatchResult,
  SeverityCounts,
  SeverityGroup,
  UnitResult,
} from '../validation/types.js';

/**
 * Order by severity (error first), then kind, file and line.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.kind.localeCompare(b.kind) ||
    a.file.localeCompare(b.file) ||
    (a.line ?? 0) - (b.line ?? 0)
  );
}

export function countBySeverity(diagnostics: Iterable<Diagnostic>): SeverityCounts {
  const counts: SeverityCounts = { error: 0, warning: 0, info: 0 };
  for (const diagnostic of diagnostics) counts[diagnostic.severity] += 1;
  return counts;
}

/**
 * Group by severity, then by kind. Empty groups are left out.
 */
export function groupDiagnostics(diagnostics: readonly Diagnostic[]): SeverityGroup[] {
  const sorted = [...diagnostics].sort(compareDiagnostics);
  const groups: SeverityGroup[] = [];
  for (const severity of SEVERITIES) {
    const ofSeverity = sorted.filter((d) => d.severity === severity);
    if (ofSeverity.length === 0) continue;
    const group: SeverityGroup = { severity, kinds: [] };
    for (const diagnostic of ofSeverity) {
      const last = group.kinds[group.kinds.length - 1];
      if (last && last.kind === diagnostic.kind) last.diagnostics.push(diagnostic);
      else group.kinds.push({ kind: diagnostic.kind, diagnostics: [diagnostic] });
    }
    groups.push(group);
  }
  return groups;
}

/**
 * One result per file, sorted by path; diagnostics within a file by line.
 * @param relativeOf - display path of a file
 */
export function aggregateUnits(
  diagnostics: readonly Diagnostic[],
  relativeOf: (file: string) => string
): UnitResult[] {
  const byFile = new Map<string, Diagnostic[]>();
  for (const diagnostic of diagnostics) {
    const list = byFile.get(diagnostic.file);
    if (list) list.push(diagnostic);
    else byFile.set(diagnostic.file, [diagnostic]);
  }

  return [...byFile.keys()].sort().map((file) => {
    const unitDiagnostics = (byFile.get(file) ?? []).sort(
      (a, b) => (a.line ?? 0) - (b.line ?? 0) || compareDiagnostics(a, b)
    );
    return {
      file,
      relativePath: relativeOf(file),
      diagnostics: unitDiagnostics,
      blocking: unitDiagnostics.some((d) => d.blocking),
    };
  });
}

export function aggregateAddon(
  name: string,
  addonPath: string,
  diagnostics: readonly Diagnostic[],
  relativeOf: (file: string) => string
): AddonResult {
  const units = aggregateUnits(diagnostics, relativeOf);
  return {
    name,
    path: addonPath,
    status: 'checked',
    units,
    counts: countBySeverity(diagnostics),
    blocking: units.some((unit) => unit.blocking),
  };
}

export function skippedAddon(name: string, addonPath: string, reason: string): AddonResult {
  return {
    name,
    path: addonPath,
    status: 'skipped',
    skipReason: reason,
    units: [],
    counts: { error: 0, warning: 0, info: 0 },
    blocking: false,
  };
}

/** All retained diagnostics of an add-on. */
export function addonDiagnostics(addon: AddonResult): Diagnostic[] {
  return addon.units.flatMap((unit) => unit.diagnostics);
}

export function aggregateBatch(
  addons: AddonResult[],
  scope: ValidationScope,
  context: ExecutionContext | null
): BatchResult {
  const total = (severity: Severity): number =>
    addons.reduce((sum, addon) => sum + addon.counts[severity], 0);
  return {
    scope,
    context,
    addons,
    summary: {
      addons: addons.length,
      addonsWithIssues: addons.filter((addon) => addon.units.length > 0).length,
      errors: total('error'),
      warnings: total('warning'),
      info: total('info'),
    },
    blocking: addons.some((addon) => addon.blocking),
  };
}
