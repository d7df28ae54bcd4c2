/**
 * 와이드 프레임 정규화 / outer join 병합 테스트
 */

import { describe, it, expect } from 'vitest';
import {
  createTable,
  frameSchemaForYears,
  mergeIndicator,
  normalize,
  parseTimeColumn,
  TableSchemaError,
  timeColumnName,
} from '../lib/table-normalizer.js';
import type { WideFrame } from '../lib/types.js';

function frame(rows: WideFrame['rows'], years = [2010, 2011]): WideFrame {
  return { schema: frameSchemaForYears(years), rows };
}

describe('time columns', () => {
  it('should convert between year and column name', () => {
    expect(timeColumnName(2015)).toBe('YR2015');
    expect(parseTimeColumn('YR2015')).toBe(2015);
    expect(parseTimeColumn('economy')).toBeNull();
    expect(parseTimeColumn('YR15')).toBeNull();
  });

  it('should build a schema with economy as the identifier', () => {
    expect(frameSchemaForYears([2020, 2021])).toEqual({
      identifierColumns: ['economy'],
      timeColumns: [
        { column: 'YR2020', year: 2020 },
        { column: 'YR2021', year: 2021 },
      ],
    });
  });
});

describe('normalize', () => {
  it('should unpivot year columns into long rows', () => {
    const rows = normalize(
      frame([
        { economy: 'USA', YR2010: 48000, YR2011: 50000 },
        { economy: 'FRA', YR2010: 40000, YR2011: null },
      ])
    );

    expect(rows).toEqual([
      { economy: 'USA', year: 2010, value: 48000 },
      { economy: 'USA', year: 2011, value: 50000 },
      { economy: 'FRA', year: 2010, value: 40000 },
      { economy: 'FRA', year: 2011, value: null },
    ]);
  });

  it('should coerce numeric strings and treat missing cells as null', () => {
    const rows = normalize(frame([{ economy: 'DEU', YR2010: '41.5' }]));

    expect(rows).toEqual([
      { economy: 'DEU', year: 2010, value: 41.5 },
      { economy: 'DEU', year: 2011, value: null },
    ]);
  });

  it('should fail with MISSING_ECONOMY_COLUMN when the identifier is not declared', () => {
    const input: WideFrame = {
      schema: { identifierColumns: ['country'], timeColumns: [{ column: 'YR2010', year: 2010 }] },
      rows: [{ country: 'USA', YR2010: 1 }],
    };

    try {
      normalize(input);
      expect.fail('Should have thrown TableSchemaError');
    } catch (error) {
      expect(error).toBeInstanceOf(TableSchemaError);
      if (error instanceof TableSchemaError) {
        expect(error.code).toBe('MISSING_ECONOMY_COLUMN');
      }
    }
  });

  it('should fail with MISSING_ECONOMY_COLUMN when a row has no economy value', () => {
    expect(() => normalize(frame([{ economy: null, YR2010: 1, YR2011: 2 }]))).toThrow(TableSchemaError);
  });

  it('should fail deterministically on already-long data without time columns', () => {
    const longData: WideFrame = {
      schema: { identifierColumns: ['economy', 'Year'], timeColumns: [] },
      rows: [{ economy: 'USA', Year: 2010, 'GDP per Capita': 48000 }],
    };

    for (let i = 0; i < 2; i++) {
      try {
        normalize(longData);
        expect.fail('Should have thrown TableSchemaError');
      } catch (error) {
        expect(error).toBeInstanceOf(TableSchemaError);
        if (error instanceof TableSchemaError) {
          expect(error.code).toBe('NO_TIME_COLUMNS');
        }
      }
    }
  });

  it('should return no rows for an empty frame', () => {
    expect(normalize(frame([]))).toEqual([]);
  });
});

describe('mergeIndicator', () => {
  it('should outer join and keep keys present in only one indicator', () => {
    let table = createTable();
    table = mergeIndicator(table, 'GDP per Capita', [
      { economy: 'USA', year: 2010, value: 48000 },
      { economy: 'FRA', year: 2010, value: 40000 },
    ]);
    table = mergeIndicator(table, 'Population', [
      { economy: 'USA', year: 2010, value: 309 },
      { economy: 'DEU', year: 2011, value: 80 },
    ]);

    expect(table.columns).toEqual(['GDP per Capita', 'Population']);
    expect(table.rows).toEqual([
      { economy: 'DEU', year: 2011, values: { 'GDP per Capita': null, Population: 80 } },
      { economy: 'FRA', year: 2010, values: { 'GDP per Capita': 40000, Population: null } },
      { economy: 'USA', year: 2010, values: { 'GDP per Capita': 48000, Population: 309 } },
    ]);
  });

  it('should preserve every (economy, year) pair across three indicators', () => {
    const inputs: Array<[string, Array<[string, number]>]> = [
      ['A', [['USA', 2010], ['USA', 2011]]],
      ['B', [['FRA', 2010]]],
      ['C', [['USA', 2011], ['JPN', 2012]]],
    ];

    let table = createTable();
    for (const [name, keys] of inputs) {
      table = mergeIndicator(
        table,
        name,
        keys.map(([economy, year]) => ({ economy, year, value: 1 }))
      );
    }

    const keys = table.rows.map(r => `${r.economy}:${r.year}`);
    expect(keys).toEqual(['FRA:2010', 'JPN:2012', 'USA:2010', 'USA:2011']);
    for (const row of table.rows) {
      expect(Object.keys(row.values).sort()).toEqual(['A', 'B', 'C']);
    }
  });

  it('should not mutate the input table', () => {
    const first = mergeIndicator(createTable(), 'A', [{ economy: 'USA', year: 2010, value: 1 }]);
    mergeIndicator(first, 'B', [{ economy: 'USA', year: 2010, value: 2 }]);

    expect(first.columns).toEqual(['A']);
    expect(first.rows[0].values).toEqual({ A: 1 });
  });
});
