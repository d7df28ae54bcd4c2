/**
 * 지표 테이블 파일 캐시
 * 정규화된 테이블을 CSV로 저장하고, 다음 실행에서 네트워크 수집 없이 불러옵니다.
 * 기본 정책은 만료 없음 (파일을 직접 지우기 전까지 계속 사용).
 */

import { promises as fs } from "fs";
import { dirname } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { INDICATORS } from "../lib/indicators.js";
import { compareRows } from "../lib/table-normalizer.js";
import type { IndicatorTable, TableRow } from "../lib/types.js";

export const ECONOMY_HEADER = "economy";
export const YEAR_HEADER = "Year";

export class CacheFormatError extends Error {
  constructor(message: string, public path: string) {
    super(message);
    this.name = "CacheFormatError";
  }
}

const CsvRecordsSchema = z.array(z.array(z.string()));

// 지표 컬럼만 숫자로 읽는다. 그 밖의 식별자 컬럼(Country 등)은 무시
const INDICATOR_COLUMNS: ReadonlySet<string> = new Set(INDICATORS.map(i => i.name));

export type CacheOptions = {
  maxAgeMs?: number; // 미지정이면 만료 없음
};

function parseCell(cell: string, path: string, line: number, column: string): number | null {
  if (cell.trim() === "") {
    return null;
  }
  const value = Number(cell);
  if (!Number.isFinite(value)) {
    throw new CacheFormatError(`Invalid number '${cell}' in column '${column}' at line ${line}`, path);
  }
  return value;
}

export function parseTableCsv(content: string, path: string): IndicatorTable {
  const records = CsvRecordsSchema.parse(parse(content, { bom: true, skip_empty_lines: true }));
  if (records.length === 0) {
    throw new CacheFormatError("Cache file is empty", path);
  }

  const [header, ...body] = records;
  const economyIndex = header.indexOf(ECONOMY_HEADER);
  const yearIndex = header.indexOf(YEAR_HEADER);
  if (economyIndex === -1 || yearIndex === -1) {
    throw new CacheFormatError(`Cache header must contain '${ECONOMY_HEADER}' and '${YEAR_HEADER}'`, path);
  }

  const valueColumns = header
    .map((name, index) => ({ name, index }))
    .filter(c => INDICATOR_COLUMNS.has(c.name));
  if (valueColumns.length === 0) {
    throw new CacheFormatError("Cache header has no indicator columns", path);
  }

  const rows: TableRow[] = body.map((record, i) => {
    const line = i + 2;
    const year = Number(record[yearIndex]);
    if (!Number.isInteger(year)) {
      throw new CacheFormatError(`Invalid year '${record[yearIndex]}' at line ${line}`, path);
    }
    const values: Record<string, number | null> = {};
    for (const column of valueColumns) {
      values[column.name] = parseCell(record[column.index], path, line, column.name);
    }
    return { economy: record[economyIndex], year, values };
  });

  return { columns: valueColumns.map(c => c.name), rows: rows.sort(compareRows) };
}

export function formatTableCsv(table: IndicatorTable): string {
  const header = [ECONOMY_HEADER, YEAR_HEADER, ...table.columns];
  const body = table.rows.map(row => [
    row.economy,
    String(row.year),
    ...table.columns.map(column => {
      const value = row.values[column] ?? null;
      return value === null ? "" : String(value);
    }),
  ]);
  return stringify([header, ...body]);
}

async function isExpired(path: string, maxAgeMs: number | undefined): Promise<boolean> {
  if (maxAgeMs === undefined) {
    return false;
  }
  const stat = await fs.stat(path);
  return Date.now() - stat.mtimeMs > maxAgeMs;
}

/**
 * 캐시 파일 불러오기
 * 파일이 없거나, 만료됐거나, 읽을 수 없거나, 행이 없으면 null
 */
export async function loadTable(path: string, options: CacheOptions = {}): Promise<IndicatorTable | null> {
  let content: string;
  try {
    if (await isExpired(path, options.maxAgeMs)) {
      console.log(`[Cache] Expired: ${path}`);
      return null;
    }
    content = await fs.readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    console.warn(`[Cache] Failed to read ${path}:`, error instanceof Error ? error.message : error);
    return null;
  }

  try {
    const table = parseTableCsv(content, path);
    if (table.rows.length === 0) {
      console.warn(`[Cache] ${path} has no rows, ignoring`);
      return null;
    }
    return table;
  } catch (error) {
    console.warn(`[Cache] Ignoring unreadable cache ${path}:`, error instanceof Error ? error.message : error);
    return null;
  }
}

export async function saveTable(path: string, table: IndicatorTable): Promise<void> {
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.writeFile(path, formatTableCsv(table), "utf-8");
}

/**
 * 캐시 우선 테이블 로더
 * Hit이면 그대로 반환, Miss면 fetchFn 실행 후 비어 있지 않은 결과만 저장
 */
export async function cachedTable(
  path: string,
  fetchFn: () => Promise<IndicatorTable>,
  options: CacheOptions = {}
): Promise<{ table: IndicatorTable; source: "cache" | "api" }> {
  const cached = await loadTable(path, options);
  if (cached) {
    console.log(`[Cache] Hit: loading data from cache (${path})`);
    return { table: cached, source: "cache" };
  }

  console.log(`[Cache] Miss: ${path}, fetching...`);
  const table = await fetchFn();

  if (table.rows.length > 0) {
    console.log(`[Cache] Saving data to cache (${path})...`);
    try {
      await saveTable(path, table);
    } catch (error) {
      console.warn(`[Cache] Failed to write ${path}:`, error instanceof Error ? error.message : error);
    }
  }

  return { table, source: "api" };
}
