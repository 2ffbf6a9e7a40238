/**
 * Checks over CSV data files.
 */
import type { DiagnosticKind } from '../diagnostics/kinds.js';
import type { RawDiagnostic } from '../diagnostics/types.js';
import type { CsvFacts, CsvRow } from '../facts/types.js';
import { BaseRule, groupBy, hasFacts, type ParsedUnit } from './base.js';
import type { RuleContext } from './types.js';

interface CsvRecord {
  key: string;
  unit: ParsedUnit<CsvFacts>;
  row: CsvRow;
}

/**
 * Values of the `id` column repeated within a data section, across every CSV file of the add-on.
 * Files without an `id` column and rows with an empty id are ignored.
 */
export class CsvDuplicateRecordIdRule extends BaseRule {
  readonly name = 'csv-duplicate-record-id';
  readonly language = 'csv';
  readonly kinds: readonly DiagnosticKind[] = ['csv_duplicate_record_id'];

  check(context: RuleContext): RawDiagnostic[] {
    const records: CsvRecord[] = [];
    for (const unit of context.addon.csv) {
      if (!hasFacts(unit) || !unit.facts.columns.includes('id')) continue;
      for (const row of unit.facts.rows) {
        const id = row.values.id;
        if (!id) continue;
        records.push({ key: `${unit.facts.dataSection}/${id}`, unit, row });
      }
    }

    const diagnostics: RawDiagnostic[] = [];
    for (const [key, group] of groupBy(records, (r) => r.key)) {
      if (group.length < 2) continue;
      const [first, ...others] = group;
      const where = others.map((r) => `${r.unit.relativePath}:${r.row.line}`).join(', ');
      diagnostics.push(
        this.createDiagnostic(
          'csv_duplicate_record_id',
          first.unit.path,
          first.row.line,
          `Duplicate CSV record id "${key}" in ${where}`
        )
      );
    }
    return diagnostics;
  }
}
