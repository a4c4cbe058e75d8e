/**
 * Schema Tool
 * Describes the master table for the code-generation prompt
 */

import { QUERY_TABLE_NAME, quoteIdentifier } from './sql-executor-tool.js';
import type { Table } from '../pipeline/types.js';

export type ColumnType = 'INTEGER' | 'REAL' | 'TEXT' | 'NULL';

export interface SchemaColumn {
  name: string;
  type: ColumnType;
  nullable: boolean;
  sample_values: string[];
}

export interface TableSchema {
  table: string;
  row_count: number;
  columns: SchemaColumn[];
}

const SAMPLE_SIZE = 3;

function inferColumnType(values: unknown[]): ColumnType {
  const present = values.filter(value => value !== null);
  if (present.length === 0) return 'NULL';
  if (present.every(value => typeof value === 'number')) {
    return present.every(value => Number.isInteger(value)) ? 'INTEGER' : 'REAL';
  }
  return 'TEXT';
}

export function getTableSchema(table: Table): TableSchema {
  const columns = table.columns.map((name): SchemaColumn => {
    const values = table.rows.map(row => row[name] ?? null);
    const type = inferColumnType(values);

    // Sample values for text columns show the model the exact casing of places
    const sample_values: string[] = [];
    if (type === 'TEXT') {
      for (const value of values) {
        if (typeof value !== 'string' || sample_values.includes(value)) continue;
        sample_values.push(value);
        if (sample_values.length >= SAMPLE_SIZE) break;
      }
    }

    return {
      name,
      type,
      nullable: values.some(value => value === null),
      sample_values,
    };
  });

  return { table: QUERY_TABLE_NAME, row_count: table.rows.length, columns };
}

/**
 * Format schema for LLM prompt
 */
export function formatSchemaForPrompt(schema: TableSchema): string {
  let output = `## Table: ${schema.table} (${schema.row_count} rows)\n`;
  output += 'Columns:\n';

  for (const col of schema.columns) {
    const nullMarker = col.nullable ? '' : ' NOT NULL';
    const sampleValues = col.sample_values.length > 0
      ? ` (e.g., ${col.sample_values.map(v => `"${v}"`).join(', ')})`
      : '';
    output += `  - ${quoteIdentifier(col.name)}: ${col.type}${nullMarker}${sampleValues}\n`;
  }

  return output;
}
