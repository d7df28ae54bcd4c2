/**
 * 대시보드 차트 스펙 생성
 * 보강된 테이블과 현재 선택(지표, 연도, 국가)으로 Plotly figure JSON 5종을 만든다.
 */

import { GDP_CATEGORY_LABELS } from './categorize.js';
import { findIndicator, GDP_PER_CAPITA, LIFE_EXPECTANCY, POPULATION } from './indicators.js';
import type { EnrichedRow } from './types.js';

export interface DashboardSelection {
  indicatorCode: string;
  year: number;
  country: string | null; // null이면 전체 국가
}

export type PlotlyTrace = { type: string; name?: string } & Record<string, unknown>;

export interface PlotlyFigure {
  data: PlotlyTrace[];
  layout: Record<string, unknown>;
}

export interface DashboardFigures {
  map: PlotlyFigure;
  trend: PlotlyFigure;
  bubble: PlotlyFigure;
  ranking: PlotlyFigure;
  regional: PlotlyFigure;
}

export const THEME = {
  background: '#0f172a',
  text: '#e2e8f0',
  primary: '#3b82f6',
  secondary: '#8b5cf6',
  grid: 'rgba(255,255,255,0.1)',
} as const;

// 범주형 팔레트 (Set2, Prism)
const SET2 = ['#66c2a5', '#fc8d62', '#8da0cb', '#e78ac3', '#a6d854', '#ffd92f', '#e5c494', '#b3b3b3'];
const PRISM = [
  '#5f4690', '#1d6996', '#38a6a5', '#0f8554', '#73af48', '#edad08',
  '#e17c05', '#cc503e', '#94346e', '#6f4070', '#994e95', '#666666',
];

export const TREND_TOP_N = 10;
export const RANKING_TOP_N = 20;
const BUBBLE_SIZE_MAX = 60;
const UNKNOWN_REGION = 'Region unavailable';

const gridAxis = { showgrid: true, gridcolor: THEME.grid };

function baseLayout(title: string): Record<string, unknown> {
  return {
    title: { text: title },
    plot_bgcolor: THEME.background,
    paper_bgcolor: THEME.background,
    font: { color: THEME.text },
  };
}

function valueOf(row: EnrichedRow, column: string): number | null {
  return row.values[column] ?? null;
}

export function indicatorColumn(code: string): string {
  return findIndicator(code)?.name ?? GDP_PER_CAPITA;
}

/**
 * 지표 값 기준 상위 n개 (null 제외, 동률은 원래 순서 유지)
 */
export function topByValue(rows: readonly EnrichedRow[], column: string, n: number): EnrichedRow[] {
  return rows
    .filter(row => valueOf(row, column) !== null)
    .sort((a, b) => (valueOf(b, column) ?? 0) - (valueOf(a, column) ?? 0))
    .slice(0, n);
}

/**
 * 선택 연도(및 선택 국가)의 행
 */
export function rowsForSelection(rows: readonly EnrichedRow[], selection: DashboardSelection): EnrichedRow[] {
  return rows.filter(
    row => row.year === selection.year && (selection.country === null || row.countryName === selection.country)
  );
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function buildMapFigure(yearRows: readonly EnrichedRow[], column: string, year: number): PlotlyFigure {
  const rows = yearRows.filter(row => valueOf(row, column) !== null);
  return {
    data: [
      {
        type: 'choropleth',
        locations: rows.map(row => row.economy),
        z: rows.map(row => valueOf(row, column)),
        text: rows.map(row => row.countryName),
        customdata: rows.map(row => [
          row.region ?? '',
          valueOf(row, GDP_PER_CAPITA),
          valueOf(row, POPULATION),
          valueOf(row, LIFE_EXPECTANCY),
        ]),
        hovertemplate:
          '<b>%{text}</b><br>Region: %{customdata[0]}<br>' +
          `${column}: %{z:.2f}<br>` +
          'GDP per Capita: %{customdata[1]:.0f}<br>Population: %{customdata[2]:.0f}<br>' +
          'Life Expectancy: %{customdata[3]:.1f}<extra></extra>',
        colorscale: 'Plasma',
        colorbar: { title: { text: column } },
      },
    ],
    layout: {
      ...baseLayout(''),
      title: { text: `${column} by Country (${year})`, font: { size: 16 } },
      geo: {
        showframe: false,
        showcoastlines: true,
        projection: { type: 'natural earth' },
        bgcolor: THEME.background,
      },
      margin: { l: 0, r: 0, t: 30, b: 0 },
    },
  };
}

/**
 * 국가를 선택하면 그 국가의 전체 연도 시계열, 아니면 선택 연도 상위 10개국의 시계열
 */
export function buildTrendFigure(
  rows: readonly EnrichedRow[],
  yearRows: readonly EnrichedRow[],
  column: string,
  country: string | null
): PlotlyFigure {
  let economies: string[];
  let title: string;
  if (country !== null) {
    economies = [...new Set(rows.filter(row => row.countryName === country).map(row => row.economy))];
    title = `Trend: ${country} (${column})`;
  } else {
    economies = topByValue(yearRows, column, TREND_TOP_N).map(row => row.economy);
    title = `Trend: Top ${TREND_TOP_N} Countries (${column})`;
  }

  const series = groupBy(
    rows
      .filter(row => economies.includes(row.economy) && valueOf(row, column) !== null)
      .sort((a, b) => a.year - b.year),
    row => row.economy
  );

  const data: PlotlyTrace[] = [];
  for (const economy of economies) {
    const points = series.get(economy);
    if (!points) continue;
    data.push({
      type: 'scatter',
      mode: 'lines+markers',
      name: points[0].countryName,
      x: points.map(row => row.year),
      y: points.map(row => valueOf(row, column)),
      customdata: points.map(row => row.region ?? ''),
      hovertemplate: `%{x}: %{y}<br>Region: %{customdata}<extra>${points[0].countryName}</extra>`,
    });
  }

  return {
    data,
    layout: {
      ...baseLayout(title),
      xaxis: { ...gridAxis, title: { text: 'Year' } },
      yaxis: { ...gridAxis, title: { text: column } },
      legend: { orientation: 'v', x: 1.02, y: 1 },
    },
  };
}

/**
 * 1인당 GDP × 기대수명 버블 (크기 = 인구, 색 = 소득 구간)
 */
export function buildBubbleFigure(yearRows: readonly EnrichedRow[], year: number): PlotlyFigure {
  const rows = yearRows.filter(
    row =>
      valueOf(row, GDP_PER_CAPITA) !== null &&
      valueOf(row, LIFE_EXPECTANCY) !== null &&
      valueOf(row, POPULATION) !== null &&
      row.gdpCategory !== null
  );

  const maxPopulation = Math.max(0, ...rows.map(row => valueOf(row, POPULATION) ?? 0));
  const sizeref = maxPopulation > 0 ? (2 * maxPopulation) / BUBBLE_SIZE_MAX ** 2 : 1;

  const data: PlotlyTrace[] = [];
  GDP_CATEGORY_LABELS.forEach((label, index) => {
    const points = rows.filter(row => row.gdpCategory === label);
    if (points.length === 0) return;
    data.push({
      type: 'scatter',
      mode: 'markers',
      name: label,
      x: points.map(row => valueOf(row, GDP_PER_CAPITA)),
      y: points.map(row => valueOf(row, LIFE_EXPECTANCY)),
      text: points.map(row => row.countryName),
      customdata: points.map(row => row.region ?? ''),
      marker: {
        size: points.map(row => valueOf(row, POPULATION)),
        sizemode: 'area',
        sizeref,
        color: SET2[index % SET2.length],
      },
      hovertemplate: '<b>%{text}</b><br>Region: %{customdata}<br>GDP per Capita: %{x:.0f}<br>Life Expectancy: %{y:.1f}<extra></extra>',
    });
  });

  return {
    data,
    layout: {
      ...baseLayout(`GDP per Capita vs Life Expectancy (${year})`),
      xaxis: { ...gridAxis, type: 'log', title: { text: GDP_PER_CAPITA } },
      yaxis: { ...gridAxis, title: { text: LIFE_EXPECTANCY } },
    },
  };
}

/**
 * 상위 20개국 가로 막대 (가장 큰 값이 위)
 */
export function buildRankingFigure(yearRows: readonly EnrichedRow[], column: string, year: number): PlotlyFigure {
  const top = topByValue(yearRows, column, RANKING_TOP_N).reverse();
  const byRegion = groupBy(top, row => row.region ?? UNKNOWN_REGION);

  const data: PlotlyTrace[] = [...byRegion.entries()].map(([region, points], index) => ({
    type: 'bar',
    orientation: 'h',
    name: region,
    x: points.map(row => valueOf(row, column)),
    y: points.map(row => row.countryName),
    text: points.map(row => valueOf(row, column)),
    texttemplate: '%{text:.2s}',
    textposition: 'outside',
    marker: { color: PRISM[index % PRISM.length] },
  }));

  return {
    data,
    layout: {
      ...baseLayout(`Top ${RANKING_TOP_N} Countries: ${column} (${year})`),
      xaxis: gridAxis,
      yaxis: {
        title: { text: 'Country' },
        tickfont: { size: 10 },
        categoryorder: 'array',
        categoryarray: top.map(row => row.countryName),
      },
      margin: { l: 10, r: 10, t: 40, b: 10 },
    },
  };
}

/**
 * 지역별 분포 박스 플롯. 지역 정보가 전혀 없으면 빈 figure
 */
export function buildRegionalFigure(yearRows: readonly EnrichedRow[], column: string, year: number): PlotlyFigure {
  const rows = yearRows.filter(row => row.region !== null && valueOf(row, column) !== null);
  if (!yearRows.some(row => row.region !== null)) {
    return { data: [], layout: baseLayout('Region Data Unavailable') };
  }

  const byRegion = groupBy(rows, row => row.region ?? UNKNOWN_REGION);
  const regions = [...byRegion.keys()].sort((a, b) => a.localeCompare(b));

  return {
    data: regions.map((region, index) => {
      const points = byRegion.get(region) ?? [];
      return {
        type: 'box',
        name: region,
        y: points.map(row => valueOf(row, column)),
        text: points.map(row => row.countryName),
        boxpoints: 'all',
        jitter: 0.3,
        marker: { color: PRISM[index % PRISM.length] },
        hovertemplate: `<b>%{text}</b><br>${column}: %{y}<extra>${region}</extra>`,
      };
    }),
    layout: {
      ...baseLayout(`${column} Distribution by Region (${year})`),
      xaxis: { showgrid: false, title: { text: 'Region' }, tickangle: -45 },
      yaxis: gridAxis,
      showlegend: false,
    },
  };
}

export function buildDashboardFigures(rows: readonly EnrichedRow[], selection: DashboardSelection): DashboardFigures {
  const column = indicatorColumn(selection.indicatorCode);
  const yearRows = rowsForSelection(rows, selection);

  return {
    map: buildMapFigure(yearRows, column, selection.year),
    trend: buildTrendFigure(rows, yearRows, column, selection.country),
    bubble: buildBubbleFigure(yearRows, selection.year),
    ranking: buildRankingFigure(yearRows, column, selection.year),
    regional: buildRegionalFigure(yearRows, column, selection.year),
  };
}
