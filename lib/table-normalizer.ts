/**
 * 와이드 프레임 → 롱 포맷 변환과 지표 테이블 병합
 */

import type { FrameSchema, IndicatorTable, Observation, TableRow, WideFrame } from './types.js';

export const ECONOMY_COLUMN = 'economy';
export const TIME_COLUMN_PREFIX = 'YR';

export type TableSchemaErrorCode = 'MISSING_ECONOMY_COLUMN' | 'NO_TIME_COLUMNS';

export class TableSchemaError extends Error {
  constructor(
    public code: TableSchemaErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'TableSchemaError';
  }
}

export function timeColumnName(year: number): string {
  return `${TIME_COLUMN_PREFIX}${year}`;
}

/**
 * "YR2015" → 2015, 연도 컬럼이 아니면 null
 */
export function parseTimeColumn(column: string): number | null {
  const match = new RegExp(`^${TIME_COLUMN_PREFIX}(\\d{4})$`).exec(column);
  return match ? Number(match[1]) : null;
}

export function frameSchemaForYears(years: number[]): FrameSchema {
  return {
    identifierColumns: [ECONOMY_COLUMN],
    timeColumns: years.map(year => ({ column: timeColumnName(year), year })),
  };
}

function toNumberOrNull(cell: unknown): number | null {
  if (typeof cell === 'number') {
    return Number.isFinite(cell) ? cell : null;
  }
  if (typeof cell === 'string' && cell.trim() !== '') {
    const n = Number(cell);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

/**
 * 연도 컬럼을 (economy, year, value) 행으로 언피벗
 * @throws TableSchemaError 경제 식별자 컬럼이 없거나 연도 컬럼이 하나도 없을 때
 */
export function normalize(frame: WideFrame): Observation[] {
  const { schema, rows } = frame;

  if (!schema.identifierColumns.includes(ECONOMY_COLUMN)) {
    throw new TableSchemaError(
      'MISSING_ECONOMY_COLUMN',
      `Frame has no '${ECONOMY_COLUMN}' identifier column (identifiers: ${schema.identifierColumns.join(', ') || 'none'})`
    );
  }
  if (schema.timeColumns.length === 0) {
    throw new TableSchemaError('NO_TIME_COLUMNS', 'Frame schema declares no time columns to unpivot');
  }

  const observations: Observation[] = [];
  for (const row of rows) {
    const economy = row[ECONOMY_COLUMN];
    if (typeof economy !== 'string' || economy === '') {
      throw new TableSchemaError('MISSING_ECONOMY_COLUMN', `Frame row is missing its '${ECONOMY_COLUMN}' value`);
    }
    for (const { column, year } of schema.timeColumns) {
      observations.push({ economy, year, value: toNumberOrNull(row[column]) });
    }
  }
  return observations;
}

export function createTable(): IndicatorTable {
  return { columns: [], rows: [] };
}

function rowKey(economy: string, year: number): string {
  return `${economy}|${year}`;
}

export function compareRows(a: { economy: string; year: number }, b: { economy: string; year: number }): number {
  if (a.economy !== b.economy) return a.economy < b.economy ? -1 : 1;
  return a.year - b.year;
}

/**
 * (economy, year) 기준 outer join
 * 한쪽에만 있는 행도 유지하고, 없는 쪽 값은 null로 채운다
 */
export function mergeIndicator(table: IndicatorTable, name: string, observations: Observation[]): IndicatorTable {
  const columns = table.columns.includes(name) ? [...table.columns] : [...table.columns, name];
  const byKey = new Map<string, TableRow>();

  for (const row of table.rows) {
    byKey.set(rowKey(row.economy, row.year), {
      economy: row.economy,
      year: row.year,
      values: { ...row.values, [name]: row.values[name] ?? null },
    });
  }

  for (const obs of observations) {
    const key = rowKey(obs.economy, obs.year);
    let row = byKey.get(key);
    if (!row) {
      row = { economy: obs.economy, year: obs.year, values: {} };
      for (const column of columns) {
        row.values[column] = null;
      }
      byKey.set(key, row);
    }
    // 중복 관측치는 null이 아닌 값을 우선
    if (obs.value !== null) {
      row.values[name] = obs.value;
    }
  }

  const rows = [...byKey.values()].sort(compareRows);
  return { columns, rows };
}
