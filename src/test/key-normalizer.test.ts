import { describe, it, expect } from 'vitest';
import { normalizeKeys, normalizePlaceName, normalizeYear } from '../pipeline/key-normalizer.js';
import type { Table } from '../pipeline/types.js';

describe('normalizePlaceName', () => {
  it('trims and title-cases', () => {
    expect(normalizePlaceName('  andhra PRADESH ')).toBe('Andhra Pradesh');
    expect(normalizePlaceName('pune ')).toBe('Pune');
    expect(normalizePlaceName(' Maharashtra')).toBe('Maharashtra');
  });

  it('starts a new word after any non-letter', () => {
    expect(normalizePlaceName('jammu & kashmir')).toBe('Jammu & Kashmir');
    expect(normalizePlaceName('north-east delhi')).toBe('North-East Delhi');
  });

  it('maps blank values to null', () => {
    expect(normalizePlaceName('   ')).toBeNull();
    expect(normalizePlaceName(null)).toBeNull();
  });
});

describe('normalizeYear', () => {
  it('coerces and truncates', () => {
    expect(normalizeYear('2010')).toBe(2010);
    expect(normalizeYear(' 2011 ')).toBe(2011);
    expect(normalizeYear('2012.0')).toBe(2012);
    expect(normalizeYear(2013.7)).toBe(2013);
  });

  it('rejects values that are not numbers', () => {
    expect(normalizeYear('abc')).toBeNull();
    expect(normalizeYear('')).toBeNull();
    expect(normalizeYear(null)).toBeNull();
  });
});

describe('normalizeKeys', () => {
  const table: Table = {
    columns: ['Year', 'State', 'District', 'Value'],
    rows: [
      { Year: '2010', State: ' maharashtra', District: 'PUNE ', Value: 1 },
      { Year: 'n/a', State: 'Punjab', District: 'Ludhiana', Value: 2 },
      { Year: 2011.0, State: 'Punjab ', District: ' ludhiana', Value: 3 },
    ],
  };

  it('normalizes every key column and drops rows with an unusable year', () => {
    const result = normalizeKeys(table);

    expect(result.droppedRows).toBe(1);
    expect(result.table.rows).toEqual([
      { Year: 2010, State: 'Maharashtra', District: 'Pune', Value: 1 },
      { Year: 2011, State: 'Punjab', District: 'Ludhiana', Value: 3 },
    ]);
  });

  it('is idempotent', () => {
    const once = normalizeKeys(table).table;
    const twice = normalizeKeys(once);

    expect(twice.droppedRows).toBe(0);
    expect(twice.table).toEqual(once);
  });

  it('can leave Year untouched', () => {
    const result = normalizeKeys(table, { includeYear: false });

    expect(result.droppedRows).toBe(0);
    expect(result.table.rows.map(row => row.Year)).toEqual(['2010', 'n/a', 2011]);
  });

  it('does not modify the input table', () => {
    normalizeKeys(table);
    expect(table.rows[0].State).toBe(' maharashtra');
  });
});
