/**
 * CSV extractor: header-keyed rows with the line each row ends on.
 */
import * as path from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { IFactExtractor, ExtractionInput } from './interface.types.js';
import type { CsvFacts, CsvRow, SourceUnit } from '../core/facts/types.js';
import { errorMessage } from '../utils/errors.js';

const ParsedRecordsSchema = z.array(
  z.object({
    record: z.record(z.string(), z.string()),
    info: z.object({ lines: z.number() }),
  })
);

function readHeader(content: string): string[] {
  const rows: unknown = parse(content, { to_line: 1, bom: true, relax_column_count: true });
  const header = z.array(z.array(z.string())).safeParse(rows);
  return header.success && header.data.length > 0 ? header.data[0] : [];
}

export class CsvExtractor implements IFactExtractor<CsvFacts> {
  readonly language = 'csv' as const;
  readonly supportedExtensions = ['.csv'];

  extract(input: ExtractionInput): SourceUnit<CsvFacts> {
    const facts: CsvFacts = {
      language: 'csv',
      file: input.path,
      dataSection: input.dataSection ?? 'data',
      model: path.basename(input.path, path.extname(input.path)),
      columns: [],
      rows: [],
    };
    const unit: SourceUnit<CsvFacts> = {
      path: input.path,
      relativePath: input.relativePath,
      facts,
      error: null,
    };

    try {
      facts.columns = readHeader(input.content);
      const records: unknown = parse(input.content, {
        columns: true,
        info: true,
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      });
      const parsed = ParsedRecordsSchema.safeParse(records);
      if (!parsed.success) {
        unit.error = { message: 'unexpected record shape', line: null };
        return unit;
      }
      facts.rows = parsed.data.map(
        (entry): CsvRow => ({ line: entry.info.lines, values: entry.record })
      );
    } catch (error) {
      const line = error instanceof Error && 'lines' in error && typeof error.lines === 'number' ? error.lines : null;
      unit.error = { message: errorMessage(error), line };
    }
    return unit;
  }

  dispose(): void {
    // Nothing held between files
  }
}
