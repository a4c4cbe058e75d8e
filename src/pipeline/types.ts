/**
 * In-memory table shapes shared by the integration pipeline
 */

export type CellValue = string | number | null;

export type Row = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: Row[];
}

export const KEY_COLUMNS = ['Year', 'State', 'District'] as const;

export const RAINFALL_OUTPUT_COLUMN = 'Total_Annual_Rainfall_mm';
export const SOIL_OUTPUT_COLUMN = 'Mean_Annual_Soil_Moisture';

export interface SkippedRow {
  line: number;
  reason: string;
}

export interface LoadedSource {
  id: string;
  path: string;
  table: Table;
  /** Data rows read from the file, skipped ones included */
  rawRowCount: number;
  skipped: SkippedRow[];
}

export interface SourceDescriptor {
  id: string;
  path: string;
  requiredColumns: string[];
  /** Header renames applied before required columns are checked */
  renameColumns?: Record<string, string>;
}
