/**
 * Data integration pipeline: crop statistics + daily rainfall + daily soil
 * moisture -> one master table keyed by (Year, State, District)
 */

import { loadCsvSource } from './csv-loader.js';
import { normalizeKeys } from './key-normalizer.js';
import { mergeSources } from './merge-engine.js';
import { aggregateDaily, type ReducerName } from './temporal-aggregator.js';
import { RAINFALL_OUTPUT_COLUMN, SOIL_OUTPUT_COLUMN, type LoadedSource, type Row, type Table } from './types.js';

export interface SourcePaths {
  crop: string;
  rainfall: string;
  soil: string;
}

export interface SourceDiagnostics {
  id: string;
  path: string;
  rawRows: number;
  skippedRows: number;
  droppedRows: number;
}

export interface PipelineResult {
  table: Table;
  columns: string[];
  rowCount: number;
  diagnostics: SourceDiagnostics[];
}

interface DailySource {
  id: 'rainfall' | 'soil';
  measureColumn: string;
  outputColumn: string;
  reducer: ReducerName;
}

const RAINFALL: DailySource = {
  id: 'rainfall',
  measureColumn: 'Avg_rainfall',
  outputColumn: RAINFALL_OUTPUT_COLUMN,
  reducer: 'sum',
};

const SOIL: DailySource = {
  id: 'soil',
  measureColumn: 'Avg_smlvl_at15cm',
  outputColumn: SOIL_OUTPUT_COLUMN,
  reducer: 'mean',
};

const CROP_COLUMN_RENAMES: Record<string, string> = {
  'State Name': 'State',
  'Dist Name': 'District',
};

function aggregateSource(loaded: LoadedSource, source: DailySource): { table: Table; dropped: number } {
  console.log(`\n📊 [Aggregate: ${source.id}] ${source.reducer.toUpperCase()} of ${source.measureColumn} per year...`);

  // Place names first, so differently formatted spellings fall into one group
  const places = normalizeKeys(loaded.table, { includeYear: false });
  const aggregate = aggregateDaily(places.table, {
    measureColumn: source.measureColumn,
    outputColumn: source.outputColumn,
    reducer: source.reducer,
  });

  if (aggregate.unusableYearRows > 0) {
    console.warn(`  ⚠️ Dropped ${aggregate.unusableYearRows} row(s) with neither a parseable Date nor Year`);
  }
  if (aggregate.missingMeasureRows > 0) {
    console.warn(`  ⚠️ Dropped ${aggregate.missingMeasureRows} row(s) without a numeric ${source.measureColumn}`);
  }
  console.log(`  ✓ ${aggregate.table.rows.length} annual rows`);

  return {
    table: aggregate.table,
    dropped: aggregate.unusableYearRows + aggregate.missingMeasureRows,
  };
}

function diagnosticsFor(loaded: LoadedSource, droppedRows: number): SourceDiagnostics {
  return {
    id: loaded.id,
    path: loaded.path,
    rawRows: loaded.rawRowCount,
    skippedRows: loaded.skipped.length,
    droppedRows,
  };
}

/**
 * Merged rows that matched both weather aggregates, for the startup log.
 */
export function sampleCompleteRows(table: Table, limit = 5): Row[] {
  return table.rows
    .filter(row => row[RAINFALL_OUTPUT_COLUMN] != null && row[SOIL_OUTPUT_COLUMN] != null)
    .slice(0, limit);
}

/**
 * Load, aggregate, normalize and merge the three sources. Any load failure
 * rejects the whole build; no partial master table is produced.
 */
export async function runPipeline(paths: SourcePaths): Promise<PipelineResult> {
  console.log('Starting data integration...');

  const [crop, rainfall, soil] = await Promise.all([
    loadCsvSource({
      id: 'crop',
      path: paths.crop,
      requiredColumns: ['Year', 'State', 'District'],
      renameColumns: CROP_COLUMN_RENAMES,
    }),
    loadCsvSource({
      id: RAINFALL.id,
      path: paths.rainfall,
      requiredColumns: ['State', 'District', 'Date', 'Year', RAINFALL.measureColumn],
    }),
    loadCsvSource({
      id: SOIL.id,
      path: paths.soil,
      requiredColumns: ['State', 'District', 'Date', 'Year', SOIL.measureColumn],
    }),
  ]);

  const rainfallAnnual = aggregateSource(rainfall, RAINFALL);
  const soilAnnual = aggregateSource(soil, SOIL);

  const cropKeys = normalizeKeys(crop.table);
  const rainfallKeys = normalizeKeys(rainfallAnnual.table);
  const soilKeys = normalizeKeys(soilAnnual.table);
  if (cropKeys.droppedRows > 0) {
    console.warn(`  ⚠️ Dropped ${cropKeys.droppedRows} crop row(s) with an unparseable Year`);
  }

  const merged = mergeSources(cropKeys.table, rainfallKeys.table, soilKeys.table);

  return {
    ...merged,
    diagnostics: [
      diagnosticsFor(crop, cropKeys.droppedRows),
      diagnosticsFor(rainfall, rainfallAnnual.dropped + rainfallKeys.droppedRows),
      diagnosticsFor(soil, soilAnnual.dropped + soilKeys.droppedRows),
    ],
  };
}
