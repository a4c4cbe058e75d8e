/**
 * Temporal Aggregator
 * Collapses a daily-resolution source to one row per (Year, State, District)
 */

import { normalizeYear } from './key-normalizer.js';
import type { CellValue, Row, Table } from './types.js';

export type ReducerName = 'sum' | 'mean';

/** Reducers receive a non-empty group sorted ascending. */
export const REDUCERS: Record<ReducerName, (values: number[]) => number> = {
  sum: values => values.reduce((total, value) => total + value, 0),
  mean: values => values.reduce((total, value) => total + value, 0) / values.length,
};

export interface AggregateOptions {
  measureColumn: string;
  outputColumn: string;
  reducer: ReducerName;
  dateColumn?: string;
  yearColumn?: string;
}

export interface AggregateResult {
  table: Table;
  /** Rows with neither a parseable date nor a usable year */
  unusableYearRows: number;
  /** Rows whose measure is empty or not numeric */
  missingMeasureRows: number;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isValidDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Year of a date cell, or null when it does not parse. Accepts ISO dates
 * (with or without a time part), DD-MM-YYYY and DD/MM/YYYY. Other text is
 * accepted when `Date.parse` reads it and it names exactly one four-digit
 * year; the year is read from the text, not from the local-time instant.
 */
export function parseDateYear(value: CellValue): number | null {
  if (value === null || typeof value === 'number') return null;
  const text = value.trim();
  if (text === '') return null;

  const isoMatch = text.match(/^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:$|[T\s])/);
  if (isoMatch) {
    const year = Number(isoMatch[1]);
    return isValidDate(year, Number(isoMatch[2]), Number(isoMatch[3])) ? year : null;
  }

  const dayFirstMatch = text.match(/^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/);
  if (dayFirstMatch) {
    const year = Number(dayFirstMatch[3]);
    return isValidDate(year, Number(dayFirstMatch[2]), Number(dayFirstMatch[1])) ? year : null;
  }

  if (Number.isNaN(Date.parse(text))) return null;
  const years = text.match(/(?<!\d)\d{4}(?!\d)/g);
  return years !== null && years.length === 1 ? Number(years[0]) : null;
}

function toMeasure(value: CellValue): number | null {
  if (value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value.trim() === '') return null;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

interface Group {
  year: number;
  state: CellValue;
  district: CellValue;
  values: number[];
}

/**
 * Group by (derived year, State, District) and reduce the measure. The year
 * comes from the date column, falling back to the row's year column. Keys with
 * no usable rows never appear in the output.
 */
export function aggregateDaily(table: Table, options: AggregateOptions): AggregateResult {
  const dateColumn = options.dateColumn ?? 'Date';
  const yearColumn = options.yearColumn ?? 'Year';
  const reduce = REDUCERS[options.reducer];

  const groups = new Map<string, Group>();
  let unusableYearRows = 0;
  let missingMeasureRows = 0;

  for (const row of table.rows) {
    const year = parseDateYear(row[dateColumn] ?? null) ?? normalizeYear(row[yearColumn] ?? null);
    if (year === null) {
      unusableYearRows++;
      continue;
    }

    const measure = toMeasure(row[options.measureColumn] ?? null);
    if (measure === null) {
      missingMeasureRows++;
      continue;
    }

    const state = row.State ?? null;
    const district = row.District ?? null;
    const key = JSON.stringify([year, state, district]);
    const group = groups.get(key);
    if (group) {
      group.values.push(measure);
    } else {
      groups.set(key, { year, state, district, values: [measure] });
    }
  }

  const ordered = [...groups.values()].sort(compareGroups);
  const rows: Row[] = ordered.map(group => ({
    Year: group.year,
    State: group.state,
    District: group.district,
    // Sorting first makes the floating-point result independent of input row order
    [options.outputColumn]: reduce([...group.values].sort((a, b) => a - b)),
  }));

  return {
    table: { columns: ['Year', 'State', 'District', options.outputColumn], rows },
    unusableYearRows,
    missingMeasureRows,
  };
}

function compareText(a: CellValue, b: CellValue): number {
  return String(a ?? '').localeCompare(String(b ?? ''));
}

function compareGroups(a: Group, b: Group): number {
  return a.year - b.year || compareText(a.state, b.state) || compareText(a.district, b.district);
}
