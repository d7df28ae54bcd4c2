/**
 * 대시보드 데이터 파이프라인
 * 캐시/수집 → 메타데이터 → 보강 → 소득 분류를 시작 시 한 번 실행하여 읽기 전용 상태를 만든다.
 */

import { INDICATORS } from "../lib/indicators.js";
import { enrichTable } from "../lib/metadata.js";
import type { CountryMetadata, EnrichedRow, IndicatorDef } from "../lib/types.js";
import { cachedTable } from "./cache.js";
import type { AppConfig } from "./config.js";
import { describeError, fetchIndicatorTable } from "./fetcher.js";
import { fetchCountryMetadata, fetchRegionNames, type WorldBankClientOptions } from "./worldbank.js";

export class DataUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataUnavailableError";
  }
}

export type DashboardState = {
  readonly rows: readonly EnrichedRow[];
  readonly indicators: readonly IndicatorDef[];
  readonly yearRange: { readonly min: number; readonly max: number };
  readonly countries: readonly string[];
  readonly regionCount: number;
  readonly source: "cache" | "api";
};

export type MetadataSources = {
  countries: CountryMetadata[];
  regionNames: Map<string, string>;
};

/**
 * 국가/지역 메타데이터를 각각 독립적으로 수집
 * 실패한 쪽은 빈 값으로 대체 (보강 단계에서 코드로 표시)
 */
export async function loadMetadata(options: WorldBankClientOptions): Promise<MetadataSources> {
  let countries: CountryMetadata[] = [];
  try {
    countries = await fetchCountryMetadata(options);
    console.log(`[Metadata] ${countries.length} economies loaded`);
  } catch (error) {
    console.warn(`[Metadata] Country metadata unavailable: ${describeError(error)}`);
  }

  let regionNames = new Map<string, string>();
  if (countries.length > 0) {
    try {
      regionNames = await fetchRegionNames(options);
      console.log(`[Metadata] ${regionNames.size} regions loaded`);
    } catch (error) {
      console.warn(`[Metadata] Region metadata unavailable: ${describeError(error)}`);
    }
  }

  return { countries, regionNames };
}

export function createDashboardState(rows: EnrichedRow[], source: "cache" | "api"): DashboardState {
  if (rows.length === 0) {
    throw new DataUnavailableError("No observations remain after enrichment");
  }

  let min = Infinity;
  let max = -Infinity;
  const countries = new Set<string>();
  const regions = new Set<string>();
  for (const row of rows) {
    min = Math.min(min, row.year);
    max = Math.max(max, row.year);
    countries.add(row.countryName);
    if (row.region !== null) regions.add(row.region);
  }

  return Object.freeze({
    rows: Object.freeze(rows.map(row => Object.freeze({ ...row, values: Object.freeze({ ...row.values }) }))),
    indicators: INDICATORS,
    yearRange: Object.freeze({ min, max }),
    countries: Object.freeze([...countries].sort((a, b) => a.localeCompare(b))),
    regionCount: regions.size,
    source,
  });
}

export async function buildDashboardState(config: AppConfig): Promise<DashboardState> {
  const client: WorldBankClientOptions = {
    baseUrl: config.apiBaseUrl,
    timeoutMs: config.requestTimeoutMs,
  };

  const { table, source } = await cachedTable(
    config.cacheFile,
    () => fetchIndicatorTable(INDICATORS, config.startYear, config.endYear, client),
    { maxAgeMs: config.cacheMaxAgeMs }
  );

  if (table.rows.length === 0) {
    throw new DataUnavailableError(
      "Failed to fetch data. Please check your internet connection or indicator codes."
    );
  }

  const { countries, regionNames } = await loadMetadata(client);
  const rows = enrichTable(table, countries, regionNames, { fillScope: config.fillScope });
  const state = createDashboardState(rows, source);

  console.log(`[Pipeline] Data loaded: ${state.rows.length} country-year observations (${state.source})`);
  console.log(`[Pipeline] Year range: ${state.yearRange.min} - ${state.yearRange.max}`);
  console.log(`[Pipeline] Indicators: ${state.indicators.length}`);
  console.log(`[Pipeline] Regions loaded: ${state.regionCount}`);

  return state;
}
