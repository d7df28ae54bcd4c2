/**
 * 대시보드 쿼리 파라미터 → 선택 상태
 * 잘못된 값은 오류 대신 기본값(지표, 최신 연도) 또는 빈 차트가 되도록 처리한다.
 */

import { z } from "zod";
import type { DashboardSelection } from "../lib/charts.js";
import { DEFAULT_INDICATOR_CODE, isIndicatorCode } from "../lib/indicators.js";

// 같은 키가 여러 번 오면 첫 번째 값 사용
const QueryValue = z
  .preprocess(v => (Array.isArray(v) ? v[0] : v), z.string().optional())
  .catch(undefined);

const SelectionQuerySchema = z
  .object({
    indicator: QueryValue,
    year: QueryValue,
    country: QueryValue,
  })
  .catch({ indicator: undefined, year: undefined, country: undefined });

export const ALL_COUNTRIES = "all";

export function parseSelection(query: unknown, latestYear: number): DashboardSelection {
  const q = SelectionQuerySchema.parse(query ?? {});

  const indicatorCode = q.indicator && isIndicatorCode(q.indicator) ? q.indicator : DEFAULT_INDICATOR_CODE;

  const year = q.year === undefined || q.year.trim() === "" ? NaN : Number(q.year);

  const country = q.country === undefined || q.country === "" || q.country === ALL_COUNTRIES ? null : q.country;

  return {
    indicatorCode,
    year: Number.isInteger(year) ? year : latestYear,
    country,
  };
}
