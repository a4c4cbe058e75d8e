/**
 * CSV Source Loader
 * Reads a raw CSV source into a table, skipping rows that do not parse
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { MalformedSourceError, SourceUnavailableError, errorMessage } from '../errors.js';
import type { CellValue, LoadedSource, Row, SkippedRow, SourceDescriptor, Table } from './types.js';

const ParsedRecordSchema = z.object({
  record: z.array(z.string()),
  info: z.object({ lines: z.number() }),
});

const SkipContextSchema = z.object({ lines: z.number() });

async function readSource(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SourceUnavailableError(path, { cause: error });
    }
    throw error;
  }
}

/** Cells read as missing, alongside empty ones */
const NA_TOKENS = new Set([
  '#N/A', '#N/A N/A', '#NA', '-1.#IND', '-1.#QNAN', '-NaN', '-nan', '1.#IND', '1.#QNAN',
  '<NA>', 'N/A', 'NA', 'NULL', 'NaN', 'None', 'n/a', 'nan', 'null',
]);

function isMissing(value: string): boolean {
  const trimmed = value.trim();
  return trimmed === '' || NA_TOKENS.has(trimmed);
}

function parseNumber(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * A column is numeric when every non-missing cell parses as a number.
 */
function inferNumericColumns(columns: string[], records: string[][]): Set<string> {
  const numeric = new Set<string>();

  columns.forEach((column, index) => {
    const allNumeric = records.every(record => {
      const cell = record[index];
      return isMissing(cell) || parseNumber(cell) !== null;
    });
    if (allNumeric) numeric.add(column);
  });

  return numeric;
}

function toCell(value: string, numeric: boolean): CellValue {
  if (isMissing(value)) return null;
  return numeric ? parseNumber(value) : value;
}

/**
 * Load one CSV source. A missing file throws SourceUnavailableError; a missing
 * header or required column throws MalformedSourceError; individual bad rows
 * are skipped and reported.
 */
export async function loadCsvSource(source: SourceDescriptor): Promise<LoadedSource> {
  console.log(`\n📥 [Loader: ${source.id}] Reading ${source.path}...`);
  const text = await readSource(source.path);
  const skipped: SkippedRow[] = [];

  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      info: true,
      relax_column_count: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      on_skip: (err) => {
        const context = SkipContextSchema.safeParse(err);
        skipped.push({
          line: context.success ? context.data.lines : 0,
          reason: err ? err.message : 'Unparseable row',
        });
      },
    });
  } catch (error) {
    throw new MalformedSourceError(source.path, errorMessage(error));
  }

  const entries = z.array(ParsedRecordSchema).parse(parsed);
  if (entries.length === 0) {
    throw new MalformedSourceError(source.path, 'no header row');
  }

  const renames = source.renameColumns ?? {};
  const columns = entries[0].record.map(name => {
    const trimmed = name.trim();
    return renames[trimmed] ?? trimmed;
  });

  const missing = source.requiredColumns.filter(column => !columns.includes(column));
  if (missing.length > 0) {
    throw new MalformedSourceError(source.path, `missing required column(s): ${missing.join(', ')}`);
  }

  const dataEntries = entries.slice(1);
  const records: string[][] = [];
  for (const entry of dataEntries) {
    if (entry.record.length !== columns.length) {
      skipped.push({
        line: entry.info.lines,
        reason: `expected ${columns.length} fields, saw ${entry.record.length}`,
      });
      continue;
    }
    records.push(entry.record);
  }

  const numericColumns = inferNumericColumns(columns, records);
  const rows: Row[] = records.map(record => {
    const row: Row = {};
    columns.forEach((column, index) => {
      row[column] = toCell(record[index], numericColumns.has(column));
    });
    return row;
  });

  const table: Table = { columns, rows };
  skipped.sort((a, b) => a.line - b.line);

  if (skipped.length > 0) {
    console.warn(`  ⚠️ Skipped ${skipped.length} malformed row(s) in ${source.path}:`);
    for (const row of skipped.slice(0, 10)) {
      console.warn(`    line ${row.line}: ${row.reason}`);
    }
  }
  if (rows.length === 0) {
    console.warn(`  ⚠️ Source ${source.id} loaded but contains no data rows`);
  } else {
    console.log(`  ✓ Loaded ${rows.length} rows, ${columns.length} columns`);
  }

  return {
    id: source.id,
    path: source.path,
    table,
    rawRowCount: records.length + skipped.length,
    skipped,
  };
}
