/**
 * 환경 변수 설정
 */

import type { FillScope } from "../lib/types.js";

export type AppConfig = {
  port: number;
  cacheFile: string;
  cacheMaxAgeMs?: number; // 미지정이면 캐시 만료 없음
  startYear: number;
  endYear: number;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  fillScope: FillScope;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    console.warn(`[Config] Invalid ${key}=${raw}, using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const startYear = readInt(env, "START_YEAR", 2010);
  const endYear = readInt(env, "END_YEAR", 2022);
  if (startYear > endYear) {
    throw new ConfigError(`START_YEAR (${startYear}) must not be after END_YEAR (${endYear})`);
  }

  let fillScope: FillScope = "economy";
  if (env.FILL_SCOPE === "table" || env.FILL_SCOPE === "economy") {
    fillScope = env.FILL_SCOPE;
  } else if (env.FILL_SCOPE) {
    console.warn(`[Config] Unknown FILL_SCOPE=${env.FILL_SCOPE}, using economy`);
  }

  const maxAgeHours = env.CACHE_MAX_AGE_HOURS ? Number(env.CACHE_MAX_AGE_HOURS) : undefined;
  let cacheMaxAgeMs: number | undefined;
  if (maxAgeHours !== undefined) {
    if (Number.isFinite(maxAgeHours) && maxAgeHours > 0) {
      cacheMaxAgeMs = maxAgeHours * 3600000;
    } else {
      console.warn(`[Config] Invalid CACHE_MAX_AGE_HOURS=${env.CACHE_MAX_AGE_HOURS}, cache never expires`);
    }
  }

  return {
    port: readInt(env, "PORT", 8050),
    cacheFile: env.CACHE_FILE || "world_bank_data_v3.csv",
    cacheMaxAgeMs,
    startYear,
    endYear,
    apiBaseUrl: (env.WB_API_BASE || "https://api.worldbank.org/v2").replace(/\/+$/, ""),
    requestTimeoutMs: readInt(env, "WB_REQUEST_TIMEOUT_MS", 30000),
    fillScope,
  };
}
