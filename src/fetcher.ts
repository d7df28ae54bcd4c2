/**
 * 지표 수집 모듈
 * 구간 일괄 요청이 실패하면 연도별 요청으로 대체하고, 지표들을 순차 수집해 하나의 테이블로 병합합니다.
 */

import { createTable, mergeIndicator, normalize, TableSchemaError } from "../lib/table-normalizer.js";
import type { IndicatorDef, IndicatorTable, Observation } from "../lib/types.js";
import { fetchIndicatorFrame, WorldBankError, yearsInRange, type WorldBankClientOptions } from "./worldbank.js";

export type YearFetchResult =
  | { ok: true; year: number; rows: Observation[] }
  | { ok: false; year: number; reason: string };

export function describeError(error: unknown): string {
  if (error instanceof WorldBankError || error instanceof TableSchemaError) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

async function fetchObservations(
  code: string,
  startYear: number,
  endYear: number,
  options: WorldBankClientOptions
): Promise<Observation[]> {
  const frame = await fetchIndicatorFrame(code, startYear, endYear, options);
  return normalize(frame).filter(o => o.year >= startYear && o.year <= endYear);
}

export async function fetchYear(code: string, year: number, options: WorldBankClientOptions): Promise<YearFetchResult> {
  try {
    const rows = await fetchObservations(code, year, year, options);
    return { ok: true, year, rows };
  } catch (error) {
    return { ok: false, year, reason: describeError(error) };
  }
}

/**
 * 연도별 결과를 한 줄 요약으로
 */
export function summarizeYearResults(name: string, results: YearFetchResult[]): string {
  const succeeded = results.filter(r => r.ok).length;
  const failures = results.flatMap(r => (r.ok ? [] : [`${r.year} (${r.reason})`]));
  const base = `${name}: fallback recovered ${succeeded}/${results.length} years`;
  return failures.length > 0 ? `${base}; failed: ${failures.join(", ")}` : base;
}

/**
 * 지표 하나의 [startYear, endYear] 관측치 수집
 * 일괄 요청 실패 시에만 연도별로 한 번씩 요청하며, 실패한 연도는 결과에서 빠진다.
 * 모든 연도가 실패하면 빈 배열을 반환한다 (예외를 던지지 않음).
 */
export async function fetchIndicator(
  indicator: IndicatorDef,
  startYear: number,
  endYear: number,
  options: WorldBankClientOptions
): Promise<Observation[]> {
  try {
    const rows = await fetchObservations(indicator.code, startYear, endYear, options);
    console.log(`[Fetcher] ${indicator.name}: ${rows.length} observations`);
    return rows;
  } catch (error) {
    console.warn(`[Fetcher] Error fetching ${indicator.name} (${indicator.code}): ${describeError(error)}`);
    console.log(`[Fetcher] Attempting year-by-year fallback for ${indicator.name}...`);
  }

  const results: YearFetchResult[] = [];
  for (const year of yearsInRange(startYear, endYear)) {
    results.push(await fetchYear(indicator.code, year, options));
  }

  const summary = summarizeYearResults(indicator.name, results);
  if (!results.some(r => r.ok)) {
    console.warn(`[Fetcher] Fallback failed for ${indicator.name}, skipping. ${summary}`);
    return [];
  }

  console.log(`[Fetcher] ${summary}`);
  return results.flatMap(r => (r.ok ? r.rows : []));
}

/**
 * 지표들을 순차적으로 수집하여 (economy, year) 기준 outer join
 * 관측치가 없는 지표는 건너뛴다
 */
export async function fetchIndicatorTable(
  indicators: readonly IndicatorDef[],
  startYear: number,
  endYear: number,
  options: WorldBankClientOptions
): Promise<IndicatorTable> {
  console.log("[Fetcher] Fetching data from World Bank API...");

  let table = createTable();
  for (const indicator of indicators) {
    console.log(`[Fetcher] Fetching ${indicator.name} (${indicator.code})...`);
    const rows = await fetchIndicator(indicator, startYear, endYear, options);
    if (rows.length === 0) {
      console.warn(`[Fetcher] No observations for ${indicator.name}, skipping`);
      continue;
    }
    table = mergeIndicator(table, indicator.name, rows);
  }

  return table;
}
