/**
 * Master Table Store
 * Owns the immutable, versioned snapshot of the merged table. A reload builds
 * a new snapshot and swaps it in; requests keep whichever snapshot they took.
 */

import { DataUnavailableError, ServiceError, errorMessage } from './errors.js';
import { runPipeline, sampleCompleteRows, type PipelineResult, type SourceDiagnostics, type SourcePaths } from './pipeline/index.js';
import { RAINFALL_OUTPUT_COLUMN, SOIL_OUTPUT_COLUMN, type Table } from './pipeline/types.js';
import { getTableSchema, type TableSchema } from './tools/schema-tool.js';
import { createTableImage } from './tools/sql-executor-tool.js';

export interface MasterSnapshot {
  readonly version: number;
  readonly builtAt: Date;
  readonly table: Table;
  readonly columns: readonly string[];
  readonly rowCount: number;
  readonly schema: TableSchema;
  /** Serialized SQLite database each query execution copies from */
  readonly image: Buffer;
  readonly diagnostics: readonly SourceDiagnostics[];
}

export type MasterTableState =
  | { status: 'ready'; snapshot: MasterSnapshot }
  | { status: 'unavailable'; reason: string; code?: string };

export type PipelineRunner = (paths: SourcePaths) => Promise<PipelineResult>;

function freezeTable(table: Table): Table {
  table.rows.forEach(row => Object.freeze(row));
  Object.freeze(table.rows);
  Object.freeze(table.columns);
  return Object.freeze(table);
}

export class MasterTableStore {
  private state: MasterTableState = { status: 'unavailable', reason: 'Data has not been loaded yet' };
  private version = 0;
  private pending: Promise<MasterTableState> | null = null;

  constructor(
    private readonly paths: SourcePaths,
    private readonly runner: PipelineRunner = runPipeline
  ) {}

  getState(): MasterTableState {
    return this.state;
  }

  current(): MasterSnapshot | null {
    return this.state.status === 'ready' ? this.state.snapshot : null;
  }

  /**
   * The current snapshot, or DataUnavailableError.
   */
  require(): MasterSnapshot {
    if (this.state.status !== 'ready') {
      throw new DataUnavailableError(this.state.reason);
    }
    return this.state.snapshot;
  }

  /**
   * Build a new snapshot. Concurrent calls share one build. A failed build
   * leaves the store unavailable until a later load succeeds.
   */
  load(): Promise<MasterTableState> {
    if (!this.pending) {
      this.pending = this.build().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async build(): Promise<MasterTableState> {
    try {
      const result = await this.runner(this.paths);
      const table = freezeTable(result.table);
      const schema = getTableSchema(table);
      const snapshot: MasterSnapshot = Object.freeze({
        version: this.version + 1,
        builtAt: new Date(),
        table,
        columns: table.columns,
        rowCount: result.rowCount,
        schema,
        image: createTableImage(table, schema),
        diagnostics: Object.freeze(result.diagnostics),
      });

      this.version = snapshot.version;
      this.state = { status: 'ready', snapshot };
      logSnapshot(snapshot);
    } catch (error) {
      const reason = errorMessage(error);
      console.error('\n🚨 Data integration failed:', reason);
      this.state = {
        status: 'unavailable',
        reason,
        code: error instanceof ServiceError ? error.code : undefined,
      };
    }
    return this.state;
  }
}

function logSnapshot(snapshot: MasterSnapshot): void {
  console.log(`\n✅ Data integration complete (v${snapshot.version}). Master table has ${snapshot.rowCount} rows.`);

  const sample = sampleCompleteRows(snapshot.table).map(row => ({
    Year: row.Year,
    State: row.State,
    District: row.District,
    [RAINFALL_OUTPUT_COLUMN]: row[RAINFALL_OUTPUT_COLUMN],
    [SOIL_OUTPUT_COLUMN]: row[SOIL_OUTPUT_COLUMN],
  }));
  if (sample.length > 0) {
    console.log('Sample of merged data:');
    console.table(sample);
  }
  console.log(`Columns available for queries: ${JSON.stringify(snapshot.columns)}`);
}
