/**
 * 대시보드 HTTP 서버 (Express)
 * 시작 시 만든 읽기 전용 상태를 받아 요청마다 차트 스펙을 다시 계산한다.
 */

import { createServer, type Server } from "http";
import express from "express";
import { stringify } from "csv-stringify/sync";
import { buildDashboardFigures } from "../lib/charts.js";
import { renderDashboardPage } from "./dashboard-page.js";
import type { DashboardState } from "./pipeline.js";
import { parseSelection } from "./selection.js";

export function formatEnrichedCsv(state: DashboardState): string {
  const columns = state.indicators.map(i => i.name);
  const header = ["economy", "Country Name", "Region_Code", "Region", "Year", ...columns, "GDP Category"];
  const body = state.rows.map(row => [
    row.economy,
    row.countryName,
    row.regionCode ?? "",
    row.region ?? "",
    String(row.year),
    ...columns.map(column => {
      const value = row.values[column] ?? null;
      return value === null ? "" : String(value);
    }),
    row.gdpCategory ?? "",
  ]);
  return stringify([header, ...body]);
}

export function createApp(state: DashboardState): express.Express {
  const app = express();

  // UI: 대시보드
  app.get("/", (req, res) => {
    try {
      const selection = parseSelection(req.query, state.yearRange.max);
      res.setHeader("content-type", "text/html; charset=utf-8");
      res.send(renderDashboardPage(state, selection));
    } catch (e: unknown) {
      console.error("[Server] Failed to render dashboard:", e);
      res.status(500).send(e instanceof Error ? e.message : String(e));
    }
  });

  // API: 차트 스펙 5종
  app.get("/api/dashboard", (req, res) => {
    try {
      const selection = parseSelection(req.query, state.yearRange.max);
      const figures = buildDashboardFigures(state.rows, selection);
      res.setHeader("Cache-Control", "no-store");
      res.json({ selection, figures });
    } catch (e: unknown) {
      console.error("[Server] Failed to build figures:", e);
      res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
    }
  });

  // API: 보강된 테이블 CSV 내보내기
  app.get("/api/data.csv", (_req, res) => {
    try {
      res.setHeader("content-type", "text/csv; charset=utf-8");
      res.setHeader("content-disposition", 'attachment; filename="world_bank_dashboard.csv"');
      res.send(formatEnrichedCsv(state));
    } catch (e: unknown) {
      res.status(500).json({ error: e instanceof Error ? e.message : String(e) });
    }
  });

  app.get("/api/health", (_req, res) => {
    res.json({
      status: "ok",
      rows: state.rows.length,
      source: state.source,
      yearRange: state.yearRange,
      regions: state.regionCount,
    });
  });

  return app;
}

/**
 * 포트에 바인딩될 때 resolve, 바인딩 실패(EADDRINUSE 등)는 reject
 */
export function startServer(app: express.Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = createServer(app);
    server.once("error", reject);
    server.listen({ port, host }, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
