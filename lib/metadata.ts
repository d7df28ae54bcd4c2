/**
 * 국가/지역 메타데이터 보강
 * 국가명, 지역 코드, 지역명 부착 → 집계(aggregate) 행 제외 → 결측치 채우기 → 소득 구간 분류
 */

import { categorize } from './categorize.js';
import { GDP_PER_CAPITA } from './indicators.js';
import type { CountryMetadata, EnrichedRow, FillScope, IndicatorTable, TableRow } from './types.js';

/**
 * 모든 메타데이터 필드에 동일하게 적용하는 fallback 조회
 */
export function lookupWithDefault<K, V, D>(key: K, map: ReadonlyMap<K, V>, fallback: D): V | D {
  const value = map.get(key);
  return value === undefined ? fallback : value;
}

/**
 * 컬럼별 forward-fill 후 backward-fill
 * scope='economy'면 경제권 단위로만 채우고, 'table'이면 행 순서 전체에 걸쳐 채운다
 */
export function fillMissing<T extends TableRow>(rows: T[], columns: string[], scope: FillScope): T[] {
  const filled = rows.map(row => ({ ...row, values: { ...row.values } }));

  const groups: T[][] = [];
  if (scope === 'table') {
    groups.push(filled);
  } else {
    let current: T[] = [];
    for (const row of filled) {
      if (current.length > 0 && current[current.length - 1].economy !== row.economy) {
        groups.push(current);
        current = [];
      }
      current.push(row);
    }
    if (current.length > 0) groups.push(current);
  }

  for (const group of groups) {
    for (const column of columns) {
      let last: number | null = null;
      for (const row of group) {
        const value = row.values[column] ?? null;
        if (value === null) {
          row.values[column] = last;
        } else {
          last = value;
        }
      }
      let next: number | null = null;
      for (let i = group.length - 1; i >= 0; i--) {
        const value = group[i].values[column] ?? null;
        if (value === null) {
          group[i].values[column] = next;
        } else {
          next = value;
        }
      }
    }
  }

  return filled;
}

/**
 * 어떤 지표에도 유효값이 없는 경제권 제거
 */
export function dropEmptyEconomies<T extends TableRow>(rows: T[], columns: string[]): T[] {
  const withData = new Set<string>();
  for (const row of rows) {
    if (columns.some(c => row.values[c] !== null && row.values[c] !== undefined)) {
      withData.add(row.economy);
    }
  }
  return rows.filter(row => withData.has(row.economy));
}

/**
 * 채운 뒤에도 1인당 GDP가 없는 행 제거 (경제권 단위 채우기에서 GDP 시계열이 통째로 없는 경우)
 * GDP 컬럼 자체가 수집되지 않았으면 그대로 둔다
 */
export function withGdpPerCapita<T extends TableRow>(rows: T[], columns: string[]): T[] {
  if (!columns.includes(GDP_PER_CAPITA)) {
    return rows;
  }
  const dropped = new Set<string>();
  const kept = rows.filter(row => {
    const hasGdp = (row.values[GDP_PER_CAPITA] ?? null) !== null;
    if (!hasGdp) dropped.add(row.economy);
    return hasGdp;
  });
  if (dropped.size > 0) {
    console.warn(`[Metadata] Dropping ${dropped.size} economies without ${GDP_PER_CAPITA}: ${[...dropped].join(', ')}`);
  }
  return kept;
}

export interface EnrichOptions {
  fillScope: FillScope;
}

export function enrichTable(
  table: IndicatorTable,
  countries: CountryMetadata[],
  regionNames: ReadonlyMap<string, string>,
  options: EnrichOptions
): EnrichedRow[] {
  const countryNames = new Map<string, string>();
  const regionCodes = new Map<string, string>();
  for (const country of countries) {
    countryNames.set(country.economy, country.name);
    if (country.regionCode) {
      regionCodes.set(country.economy, country.regionCode);
    }
  }

  const labelled = table.rows.map(row => {
    const regionCode = lookupWithDefault(row.economy, regionCodes, null);
    return {
      economy: row.economy,
      year: row.year,
      values: { ...row.values },
      countryName: lookupWithDefault(row.economy, countryNames, row.economy),
      regionCode,
      region: regionCode === null ? null : lookupWithDefault(regionCode, regionNames, regionCode),
      gdpCategory: null,
    } satisfies EnrichedRow;
  });

  let selected: EnrichedRow[] = labelled;
  if (countries.length > 0) {
    const realCountries = new Set(countries.filter(c => !c.isAggregate).map(c => c.economy));
    const countriesOnly = labelled.filter(row => realCountries.has(row.economy));
    if (countriesOnly.length === 0) {
      console.warn('[Metadata] No valid country data found after filtering aggregates. Using raw data.');
    } else {
      selected = countriesOnly;
    }
  } else {
    console.warn('[Metadata] Country metadata unavailable, showing economy codes and skipping aggregate filter');
  }

  const nonEmpty = dropEmptyEconomies(selected, table.columns);
  const filled = withGdpPerCapita(fillMissing(nonEmpty, table.columns, options.fillScope), table.columns);

  return filled.map(row => ({
    ...row,
    gdpCategory: categorize(row.values[GDP_PER_CAPITA] ?? null),
  }));
}
