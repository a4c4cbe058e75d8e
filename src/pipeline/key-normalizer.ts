/**
 * Key Normalizer
 * Canonical State/District/Year representations so the same place and year
 * compare equal across sources
 */

import type { CellValue, Row, Table } from './types.js';

export interface NormalizeResult {
  table: Table;
  droppedRows: number;
}

/**
 * Trim, then title-case: the first letter of every run of letters is upper-case,
 * the rest lower-case ("  andhra PRADESH " -> "Andhra Pradesh").
 */
export function normalizePlaceName(value: CellValue): string | null {
  if (value === null) return null;
  const trimmed = String(value).trim();
  if (trimmed === '') return null;

  return trimmed
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

export function normalizeYear(value: CellValue): number | null {
  if (value === null) return null;
  if (typeof value === 'string' && value.trim() === '') return null;
  const numeric = typeof value === 'number' ? value : Number(value.trim());
  return Number.isFinite(numeric) ? Math.trunc(numeric) : null;
}

/**
 * Normalize State and District on every table that has them, and Year when
 * `includeYear` is set; rows whose Year does not coerce are dropped.
 */
export function normalizeKeys(table: Table, options: { includeYear?: boolean } = {}): NormalizeResult {
  const includeYear = (options.includeYear ?? true) && table.columns.includes('Year');
  const hasState = table.columns.includes('State');
  const hasDistrict = table.columns.includes('District');

  const rows: Row[] = [];
  let droppedRows = 0;

  for (const row of table.rows) {
    const normalized: Row = { ...row };

    if (hasState) normalized.State = normalizePlaceName(row.State);
    if (hasDistrict) normalized.District = normalizePlaceName(row.District);
    if (includeYear) {
      const year = normalizeYear(row.Year);
      if (year === null) {
        droppedRows++;
        continue;
      }
      normalized.Year = year;
    }

    rows.push(normalized);
  }

  return { table: { columns: [...table.columns], rows }, droppedRows };
}
