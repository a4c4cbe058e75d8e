/**
 * SQL Executor Tool
 * Runs one read-only query against a private in-memory copy of the master table
 */

import Database from 'better-sqlite3';
import { z } from 'zod';
import { errorMessage } from '../errors.js';
import type { CellValue, Row, Table } from '../pipeline/types.js';
import type { TableSchema } from './schema-tool.js';

/** Name the generated queries address the master table by */
export const QUERY_TABLE_NAME = 'df';

const SQLExecutorOutputSchema = z.object({
  success: z.boolean(),
  result: z.array(z.record(z.union([z.string(), z.number(), z.null()]))).optional(),
  columns: z.array(z.string()).optional(),
  error: z.string().optional(),
  row_count: z.number().optional(),
  execution_time_ms: z.number().optional(),
});

export type SQLExecutorOutput = z.infer<typeof SQLExecutorOutputSchema>;

const ResultRowsSchema = z.array(z.record(z.unknown()));

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Serialize a table into a SQLite database image holding it as `df`, each
 * column declared with its schema type. Each query opens its own database
 * from this image.
 */
export function createTableImage(table: Table, schema: TableSchema): Buffer {
  const declaredTypes = new Map(schema.columns.map(column => [column.name, column.type]));
  const db = new Database(':memory:');
  try {
    const columnList = table.columns.map(quoteIdentifier).join(', ');
    const definitions = table.columns.map(column => {
      const type = declaredTypes.get(column);
      // All-null columns stay untyped
      return type === undefined || type === 'NULL' ? quoteIdentifier(column) : `${quoteIdentifier(column)} ${type}`;
    });
    db.exec(`CREATE TABLE ${QUERY_TABLE_NAME} (${definitions.join(', ')});`);

    const placeholders = table.columns.map(() => '?').join(', ');
    const insert = db.prepare(`INSERT INTO ${QUERY_TABLE_NAME} (${columnList}) VALUES (${placeholders});`);
    const insertAll = db.transaction((rows: Row[]) => {
      for (const row of rows) {
        insert.run(...table.columns.map(column => row[column] ?? null));
      }
    });
    insertAll(table.rows);

    return db.serialize();
  } finally {
    db.close();
  }
}

/**
 * Open a writable, private copy of a table image. The caller closes it.
 */
export function openTableCopy(image: Buffer): Database.Database {
  return new Database(image);
}

function toCellValue(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return value.toString();
  if (Buffer.isBuffer(value)) return value.toString('utf-8');
  return String(value);
}

/**
 * Execute a single SELECT statement. Failures never throw: they come back as
 * `{ success: false, error }` so the caller can explain them.
 */
export function executeSQL(sql: string, image: Buffer): SQLExecutorOutput {
  const startTime = Date.now();
  const cleanedSQL = sql.trim();

  if (!cleanedSQL) {
    return {
      success: false,
      error: 'Empty SQL query after cleaning',
      execution_time_ms: 0,
    };
  }

  const db = openTableCopy(image);
  try {
    const statement = db.prepare(cleanedSQL);

    if (!statement.reader) {
      return {
        success: false,
        error: 'Only SELECT queries that return rows are allowed',
        execution_time_ms: Date.now() - startTime,
      };
    }
    if (!statement.readonly) {
      return {
        success: false,
        error: 'Query attempts to modify data; only read-only queries are allowed',
        execution_time_ms: Date.now() - startTime,
      };
    }

    const columns = statement.columns().map(column => column.name);
    const rows = ResultRowsSchema.parse(statement.all()).map(row => {
      const converted: Record<string, CellValue> = {};
      for (const [key, value] of Object.entries(row)) {
        converted[key] = toCellValue(value);
      }
      return converted;
    });

    return {
      success: true,
      result: rows,
      columns,
      row_count: rows.length,
      execution_time_ms: Date.now() - startTime,
    };
  } catch (error) {
    return {
      success: false,
      error: errorMessage(error),
      execution_time_ms: Date.now() - startTime,
    };
  } finally {
    db.close();
  }
}
