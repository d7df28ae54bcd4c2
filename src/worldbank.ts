/**
 * World Bank API v2 클라이언트
 * 지표 시계열과 국가/지역 메타데이터를 가져와 검증된 형태로 반환합니다.
 */

import { z } from "zod";
import { ECONOMY_COLUMN, frameSchemaForYears, timeColumnName } from "../lib/table-normalizer.js";
import type { CountryMetadata, FrameCell, WideFrame } from "../lib/types.js";

export type WorldBankErrorCode =
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "INVALID_RESPONSE"
  | "API_MESSAGE"
  | `HTTP_ERROR_${number}`;

export class WorldBankError extends Error {
  constructor(
    public code: WorldBankErrorCode,
    message: string,
    public url?: string,
    public status?: number
  ) {
    super(message);
    this.name = "WorldBankError";
  }
}

export type WorldBankClientOptions = {
  baseUrl: string;
  timeoutMs: number;
};

// 페이지 메타 (엔드포인트에 따라 per_page가 문자열로 오기도 함)
const PageMetaSchema = z.object({
  page: z.coerce.number().int(),
  pages: z.coerce.number().int(),
  total: z.coerce.number().int(),
});

const ApiMessageSchema = z.tuple([
  z.object({
    message: z.array(z.object({ id: z.string(), key: z.string(), value: z.string() })),
  }),
]);

const ObservationSchema = z.object({
  country: z.object({ id: z.string(), value: z.string() }),
  countryiso3code: z.string().optional(),
  date: z.string(),
  value: z.number().nullable(),
});

const CountrySchema = z.object({
  id: z.string(),
  name: z.string(),
  region: z.object({ id: z.string(), value: z.string() }),
});

const RegionSchema = z.object({
  code: z.string(),
  name: z.string(),
});

const AGGREGATE_REGION_ID = "NA";

async function getJson(url: string, timeoutMs: number): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    if (error instanceof Error && error.name === "TimeoutError") {
      throw new WorldBankError("TIMEOUT", `Request timed out after ${timeoutMs}ms`, url);
    }
    throw new WorldBankError(
      "NETWORK_ERROR",
      `Request failed: ${error instanceof Error ? error.message : String(error)}`,
      url
    );
  }

  if (!response.ok) {
    throw new WorldBankError(
      `HTTP_ERROR_${response.status}`,
      `HTTP ${response.status} ${response.statusText}`,
      url,
      response.status
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new WorldBankError(
      "INVALID_RESPONSE",
      `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      url
    );
  }
}

/**
 * 페이지네이션을 따라가며 모든 항목을 수집
 * World Bank 응답 형식: [pageMeta, items[] | null]
 */
async function getAllPages<T>(
  path: string,
  params: Record<string, string>,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: WorldBankClientOptions
): Promise<T[]> {
  const envelope = z.tuple([PageMetaSchema, z.array(itemSchema).nullable()]);
  const items: T[] = [];

  for (let page = 1; ; page++) {
    const query = new URLSearchParams({ ...params, format: "json", page: String(page) });
    const url = `${options.baseUrl}${path}?${query}`;
    const json = await getJson(url, options.timeoutMs);

    const apiMessage = ApiMessageSchema.safeParse(json);
    if (apiMessage.success) {
      const detail = apiMessage.data[0].message.map(m => `${m.key}: ${m.value}`).join("; ");
      throw new WorldBankError("API_MESSAGE", `World Bank API error (${detail})`, url);
    }

    const parsed = envelope.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new WorldBankError(
        "INVALID_RESPONSE",
        `Unexpected response shape at ${issue ? issue.path.join(".") || "<root>" : "<root>"}: ${issue?.message ?? "unknown"}`,
        url
      );
    }

    const [meta, pageItems] = parsed.data;
    items.push(...(pageItems ?? []));
    if (meta.pages <= page) {
      break;
    }
  }

  return items;
}

export function yearsInRange(startYear: number, endYear: number): number[] {
  const years: number[] = [];
  for (let year = startYear; year <= endYear; year++) {
    years.push(year);
  }
  return years;
}

/**
 * 지표 하나의 [startYear, endYear] 구간을 와이드 프레임으로 수집
 * 경제권당 한 행, 연도당 한 컬럼(YR2015 …). 범위를 벗어난 관측치는 버린다.
 */
export async function fetchIndicatorFrame(
  code: string,
  startYear: number,
  endYear: number,
  options: WorldBankClientOptions
): Promise<WideFrame> {
  const date = startYear === endYear ? String(startYear) : `${startYear}:${endYear}`;
  const observations = await getAllPages(
    `/country/all/indicator/${encodeURIComponent(code)}`,
    { date, per_page: "20000" },
    ObservationSchema,
    options
  );

  const years = yearsInRange(startYear, endYear);
  const schema = frameSchemaForYears(years);
  const rows = new Map<string, Record<string, FrameCell>>();

  for (const obs of observations) {
    const year = Number(obs.date);
    if (!Number.isInteger(year) || year < startYear || year > endYear) {
      continue;
    }

    const economy = obs.countryiso3code || obs.country.id;
    let row = rows.get(economy);
    if (!row) {
      row = { [ECONOMY_COLUMN]: economy === "" ? null : economy };
      for (const y of years) {
        row[timeColumnName(y)] = null;
      }
      rows.set(economy, row);
    }
    row[timeColumnName(year)] = obs.value;
  }

  return { schema, rows: [...rows.values()] };
}

export async function fetchCountryMetadata(options: WorldBankClientOptions): Promise<CountryMetadata[]> {
  const countries = await getAllPages("/country", { per_page: "400" }, CountrySchema, options);

  return countries.map(c => {
    const regionId = c.region.id.trim();
    const isAggregate = regionId === AGGREGATE_REGION_ID;
    return {
      economy: c.id,
      name: c.name.trim(),
      regionCode: regionId === "" || isAggregate ? null : regionId,
      isAggregate,
    };
  });
}

export async function fetchRegionNames(options: WorldBankClientOptions): Promise<Map<string, string>> {
  const regions = await getAllPages("/region", { per_page: "100" }, RegionSchema, options);

  const names = new Map<string, string>();
  for (const region of regions) {
    if (region.code) {
      names.set(region.code, region.name.trim());
    }
  }
  return names;
}
