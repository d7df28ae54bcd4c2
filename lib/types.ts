/**
 * 지표 테이블 공통 스키마
 * 수집 → 정규화 → 캐시 → 메타데이터 보강 단계가 공유하는 타입
 */

export interface IndicatorDef {
  code: string; // World Bank 지표 코드 (예: NY.GDP.PCAP.CD)
  name: string; // 표시 이름이자 테이블 컬럼명
}

/**
 * 원본 응답의 와이드 프레임 스키마
 * 식별자 컬럼과 연도 컬럼을 명시적으로 구분한다
 */
export interface FrameSchema {
  identifierColumns: string[];
  timeColumns: Array<{ column: string; year: number }>;
}

export type FrameCell = string | number | null;

export interface WideFrame {
  schema: FrameSchema;
  rows: Array<Record<string, FrameCell>>;
}

/** (economy, year, value) 롱 포맷 관측치 */
export interface Observation {
  economy: string;
  year: number;
  value: number | null;
}

export interface TableRow {
  economy: string;
  year: number;
  values: Record<string, number | null>;
}

/** (economy, year) 키의 와이드 테이블. 모든 행이 모든 컬럼을 가진다 */
export interface IndicatorTable {
  columns: string[];
  rows: TableRow[];
}

export interface CountryMetadata {
  economy: string;
  name: string;
  regionCode: string | null;
  isAggregate: boolean;
}

export type GdpCategory =
  | 'Low Income'
  | 'Lower Middle'
  | 'Upper Middle'
  | 'High Income'
  | 'Very High Income';

export interface EnrichedRow extends TableRow {
  countryName: string;
  regionCode: string | null;
  region: string | null;
  gdpCategory: GdpCategory | null;
}

export type FillScope = 'economy' | 'table';
