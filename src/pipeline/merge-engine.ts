/**
 * Merge Engine
 * Left-joins the annual weather aggregates onto the crop table
 */

import { KEY_COLUMNS, type CellValue, type Row, type Table } from './types.js';

export interface MergeResult {
  table: Table;
  columns: string[];
  rowCount: number;
}

function joinKey(row: Row): string {
  return JSON.stringify(KEY_COLUMNS.map(column => row[column] ?? null));
}

/**
 * Left join on (Year, State, District). Every left row is kept exactly once;
 * right-hand value columns are null when there is no match. The right table
 * must be unique per key.
 */
export function leftJoin(left: Table, right: Table): Table {
  const valueColumns = right.columns.filter(column => !KEY_COLUMNS.some(key => key === column));
  const index = new Map<string, Row>();

  for (const row of right.rows) {
    const key = joinKey(row);
    if (index.has(key)) {
      throw new Error(`Right-hand table has more than one row for key ${key}`);
    }
    index.set(key, row);
  }

  const rows = left.rows.map(row => {
    const match = index.get(joinKey(row));
    const merged: Row = { ...row };
    for (const column of valueColumns) {
      const value: CellValue = match ? match[column] ?? null : null;
      merged[column] = value;
    }
    return merged;
  });

  return {
    columns: [...left.columns, ...valueColumns.filter(column => !left.columns.includes(column))],
    rows,
  };
}

/**
 * Crop ⟕ rainfall aggregate ⟕ soil aggregate. All inputs must already be
 * key-normalized.
 */
export function mergeSources(crop: Table, rainfall: Table, soil: Table): MergeResult {
  console.log('\n🔗 [Merge] Joining rainfall and soil aggregates onto crop statistics...');
  const withRainfall = leftJoin(crop, rainfall);
  const master = leftJoin(withRainfall, soil);

  console.log(`  ✓ Master table has ${master.rows.length} rows, ${master.columns.length} columns`);
  return {
    table: master,
    columns: master.columns,
    rowCount: master.rows.length,
  };
}
