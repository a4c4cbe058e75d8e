import { describe, it, expect } from 'vitest';
import { leftJoin, mergeSources } from '../pipeline/merge-engine.js';
import type { Table } from '../pipeline/types.js';

const crop: Table = {
  columns: ['Year', 'State', 'District', 'RICE PRODUCTION (1000 tons)'],
  rows: [
    { Year: 2010, State: 'Maharashtra', District: 'Pune', 'RICE PRODUCTION (1000 tons)': 120.5 },
    { Year: 2010, State: 'Maharashtra', District: 'Nashik', 'RICE PRODUCTION (1000 tons)': 80 },
    { Year: 2011, State: 'Maharashtra', District: 'Pune', 'RICE PRODUCTION (1000 tons)': 110 },
  ],
};

const rainfall: Table = {
  columns: ['Year', 'State', 'District', 'Total_Annual_Rainfall_mm'],
  rows: [
    { Year: 2010, State: 'Maharashtra', District: 'Pune', Total_Annual_Rainfall_mm: 36 },
    { Year: 2011, State: 'Maharashtra', District: 'Pune', Total_Annual_Rainfall_mm: 12.5 },
    { Year: 2015, State: 'Punjab', District: 'Ludhiana', Total_Annual_Rainfall_mm: 99 },
  ],
};

const soil: Table = {
  columns: ['Year', 'State', 'District', 'Mean_Annual_Soil_Moisture'],
  rows: [{ Year: 2011, State: 'Maharashtra', District: 'Pune', Mean_Annual_Soil_Moisture: 25 }],
};

describe('mergeSources', () => {
  it('keeps every crop row exactly once and fills unmatched weather with null', () => {
    const result = mergeSources(crop, rainfall, soil);

    expect(result.rowCount).toBe(3);
    expect(result.table.rows).toEqual([
      {
        Year: 2010,
        State: 'Maharashtra',
        District: 'Pune',
        'RICE PRODUCTION (1000 tons)': 120.5,
        Total_Annual_Rainfall_mm: 36,
        Mean_Annual_Soil_Moisture: null,
      },
      {
        Year: 2010,
        State: 'Maharashtra',
        District: 'Nashik',
        'RICE PRODUCTION (1000 tons)': 80,
        Total_Annual_Rainfall_mm: null,
        Mean_Annual_Soil_Moisture: null,
      },
      {
        Year: 2011,
        State: 'Maharashtra',
        District: 'Pune',
        'RICE PRODUCTION (1000 tons)': 110,
        Total_Annual_Rainfall_mm: 12.5,
        Mean_Annual_Soil_Moisture: 25,
      },
    ]);
  });

  it('records the merged column list', () => {
    const result = mergeSources(crop, rainfall, soil);

    expect(result.columns).toEqual([
      'Year',
      'State',
      'District',
      'RICE PRODUCTION (1000 tons)',
      'Total_Annual_Rainfall_mm',
      'Mean_Annual_Soil_Moisture',
    ]);
  });

  it('keeps crop rows when a weather table is empty', () => {
    const emptySoil: Table = { columns: soil.columns, rows: [] };

    const result = mergeSources(crop, rainfall, emptySoil);

    expect(result.rowCount).toBe(crop.rows.length);
    expect(result.table.rows.every(row => row.Mean_Annual_Soil_Moisture === null)).toBe(true);
  });
});

describe('leftJoin', () => {
  it('does not match keys that differ only by year type', () => {
    const left: Table = { columns: ['Year', 'State', 'District'], rows: [{ Year: '2010', State: 'A', District: 'B' }] };
    const right: Table = {
      columns: ['Year', 'State', 'District', 'X'],
      rows: [{ Year: 2010, State: 'A', District: 'B', X: 1 }],
    };

    expect(leftJoin(left, right).rows[0].X).toBeNull();
  });

  it('refuses a right-hand table with duplicate keys', () => {
    const duplicated: Table = {
      columns: rainfall.columns,
      rows: [rainfall.rows[0], rainfall.rows[0]],
    };

    expect(() => leftJoin(crop, duplicated)).toThrow('more than one row');
  });
});
