/**
 * 지표 수집 / 연도별 fallback 테스트
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { fetchIndicator, fetchIndicatorTable, summarizeYearResults, type YearFetchResult } from '../src/fetcher.js';
import { httpError, jsonResponse, observation, page, type MockResponse } from './helpers/world-bank.js';

const options = { baseUrl: 'https://wb.test/v2', timeoutMs: 1000 };
const GDP = { code: 'NY.GDP.PCAP.CD', name: 'GDP per Capita' };
const POP = { code: 'SP.POP.TOTL', name: 'Population' };
const LIFE = { code: 'SP.DYN.LE00.IN', name: 'Life Expectancy' };

const mockFetch = vi.fn();

function route(handler: (code: string, date: string) => MockResponse): void {
  mockFetch.mockImplementation(async (input: unknown) => {
    const url = new URL(String(input));
    const code = url.pathname.split('/').pop() ?? '';
    return handler(code, url.searchParams.get('date') ?? '');
  });
}

function requestedDates(): string[] {
  return mockFetch.mock.calls.map(call => new URL(String(call[0])).searchParams.get('date') ?? '');
}

describe('fetchIndicator', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should return rows within the requested range from the batch request', async () => {
    route(() =>
      jsonResponse(
        page([
          observation('USA', 2010, 48000),
          observation('USA', 2011, 50000),
          observation('USA', 2013, 55000),
          observation('FRA', 2010, 40000),
        ])
      )
    );

    const rows = await fetchIndicator(GDP, 2010, 2012, options);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(rows).toEqual([
      { economy: 'USA', year: 2010, value: 48000 },
      { economy: 'USA', year: 2011, value: 50000 },
      { economy: 'USA', year: 2012, value: null },
      { economy: 'FRA', year: 2010, value: 40000 },
      { economy: 'FRA', year: 2011, value: null },
      { economy: 'FRA', year: 2012, value: null },
    ]);
    for (const row of rows) {
      expect(row.year).toBeGreaterThanOrEqual(2010);
      expect(row.year).toBeLessThanOrEqual(2012);
      expect(row.value === null || typeof row.value === 'number').toBe(true);
    }
  });

  it('should fall back to per-year requests and keep the years that succeed', async () => {
    route((_code, date) => {
      if (date === '2010:2012' || date === '2011') return httpError(500);
      return jsonResponse(page([observation('USA', Number(date), Number(date) * 10)]));
    });

    const rows = await fetchIndicator(GDP, 2010, 2012, options);

    expect(requestedDates()).toEqual(['2010:2012', '2010', '2011', '2012']);
    expect(rows).toEqual([
      { economy: 'USA', year: 2010, value: 20100 },
      { economy: 'USA', year: 2012, value: 20120 },
    ]);
    expect(console.log).toHaveBeenCalledWith(
      '[Fetcher] GDP per Capita: fallback recovered 2/3 years; failed: 2011 (HTTP_ERROR_500: HTTP 500 Error)'
    );
  });

  it('should treat a missing economy identifier as a batch failure', async () => {
    route((_code, date) => {
      if (date === '2010:2011') {
        return jsonResponse(
          page([{ ...observation('USA', 2010, 1), countryiso3code: '', country: { id: '', value: '' } }])
        );
      }
      return jsonResponse(page([observation('FRA', Number(date), 7)]));
    });

    const rows = await fetchIndicator(GDP, 2010, 2011, options);

    expect(rows).toEqual([
      { economy: 'FRA', year: 2010, value: 7 },
      { economy: 'FRA', year: 2011, value: 7 },
    ]);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining('[Fetcher] Error fetching GDP per Capita (NY.GDP.PCAP.CD): MISSING_ECONOMY_COLUMN')
    );
  });

  it('should drop the indicator when every year fails', async () => {
    route(() => httpError(502, 'Bad Gateway'));

    const rows = await fetchIndicator(GDP, 2010, 2011, options);

    expect(rows).toEqual([]);
    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(console.warn).toHaveBeenLastCalledWith(
      '[Fetcher] Fallback failed for GDP per Capita, skipping. GDP per Capita: fallback recovered 0/2 years; ' +
        'failed: 2010 (HTTP_ERROR_502: HTTP 502 Bad Gateway), 2011 (HTTP_ERROR_502: HTTP 502 Bad Gateway)'
    );
  });
});

describe('summarizeYearResults', () => {
  it('should report recovered and failed years in one line', () => {
    const results: YearFetchResult[] = [
      { ok: true, year: 2010, rows: [] },
      { ok: false, year: 2011, reason: 'TIMEOUT: Request timed out after 1000ms' },
    ];

    expect(summarizeYearResults('Population', results)).toBe(
      'Population: fallback recovered 1/2 years; failed: 2011 (TIMEOUT: Request timed out after 1000ms)'
    );
    expect(summarizeYearResults('Population', [{ ok: true, year: 2010, rows: [] }])).toBe(
      'Population: fallback recovered 1/1 years'
    );
  });
});

describe('fetchIndicatorTable', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('should fetch sequentially, skip empty indicators and outer join the rest', async () => {
    route(code => {
      if (code === POP.code) return jsonResponse([{ page: 1, pages: 0, per_page: 20000, total: 0 }, null]);
      if (code === GDP.code) return jsonResponse(page([observation('USA', 2010, 48000)]));
      return jsonResponse(page([observation('FRA', 2010, 82.5)]));
    });

    const table = await fetchIndicatorTable([GDP, POP, LIFE], 2010, 2010, options);

    const codes = mockFetch.mock.calls.map(call => new URL(String(call[0])).pathname.split('/').pop());
    expect(codes).toEqual([GDP.code, POP.code, LIFE.code]);
    expect(table.columns).toEqual(['GDP per Capita', 'Life Expectancy']);
    expect(table.rows).toEqual([
      { economy: 'FRA', year: 2010, values: { 'GDP per Capita': null, 'Life Expectancy': 82.5 } },
      { economy: 'USA', year: 2010, values: { 'GDP per Capita': 48000, 'Life Expectancy': null } },
    ]);
  });

  it('should return an empty table when nothing can be fetched', async () => {
    route(() => httpError(500));

    const table = await fetchIndicatorTable([GDP, POP], 2010, 2010, options);

    expect(table).toEqual({ columns: [], rows: [] });
  });
});
