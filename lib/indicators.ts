/**
 * 대시보드 지표 레지스트리
 */

import type { IndicatorDef } from './types.js';

export const INDICATORS: readonly IndicatorDef[] = Object.freeze([
  { code: 'NY.GDP.PCAP.CD', name: 'GDP per Capita' },
  { code: 'SP.POP.TOTL', name: 'Population' },
  { code: 'SP.DYN.LE00.IN', name: 'Life Expectancy' },
  { code: 'SE.XPD.TOTL.GD.ZS', name: 'Education Expenditure (% GDP)' },
  { code: 'SH.XPD.CHEX.GD.ZS', name: 'Health Expenditure (% GDP)' },
  { code: 'NY.GDP.MKTP.KD.ZG', name: 'GDP Growth Rate' },
]);

export const DEFAULT_INDICATOR_CODE = 'NY.GDP.PCAP.CD';

// 버블 차트와 소득 분류가 참조하는 컬럼
export const GDP_PER_CAPITA = 'GDP per Capita';
export const POPULATION = 'Population';
export const LIFE_EXPECTANCY = 'Life Expectancy';

export function findIndicator(code: string): IndicatorDef | undefined {
  return INDICATORS.find(i => i.code === code);
}

export function isIndicatorCode(code: string): boolean {
  return findIndicator(code) !== undefined;
}
