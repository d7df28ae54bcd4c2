/**
 * 대시보드 HTML 렌더링
 * 컨트롤 3개(연도, 국가, 지표)와 차트 패널 5개. 차트는 /api/dashboard 응답으로 Plotly가 그린다.
 */

import { THEME } from "../lib/charts.js";
import type { DashboardSelection } from "../lib/charts.js";
import type { DashboardState } from "./pipeline.js";

const PLOTLY_CDN = "https://cdn.plot.ly/plotly-2.35.2.min.js";

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/**
 * 브라우저 갱신 스크립트
 * 컨트롤이 바뀔 때마다 /api/dashboard를 다시 요청한다. 새 요청은 이전 요청을 취소하고,
 * 마지막 요청의 응답만 그린다.
 */
export const DASHBOARD_CLIENT_SCRIPT = `
    const panels = {
      map: "world-map",
      bubble: "bubble-chart",
      trend: "time-series",
      ranking: "ranking-chart",
      regional: "regional-comparison",
    };
    const yearSlider = document.getElementById("year-slider");
    const countryFilter = document.getElementById("country-filter");
    const indicatorSelect = document.getElementById("map-indicator");
    let inflight = null;

    async function refresh() {
      document.getElementById("year-value").textContent = yearSlider.value;
      if (inflight) inflight.abort();
      const controller = new AbortController();
      inflight = controller;

      const params = new URLSearchParams({
        indicator: indicatorSelect.value,
        year: yearSlider.value,
        country: countryFilter.value,
      });
      try {
        const response = await fetch("/api/dashboard?" + params.toString(), { signal: controller.signal });
        if (!response.ok) {
          console.error("Dashboard update failed", response.status);
          return;
        }
        const { figures } = await response.json();
        if (controller !== inflight) return;
        for (const [key, id] of Object.entries(panels)) {
          const figure = figures[key];
          Plotly.react(id, figure.data, { ...figure.layout, autosize: true }, { responsive: true });
        }
      } catch (error) {
        if (controller.signal.aborted) return;
        console.error("Dashboard update failed", error);
      }
    }

    yearSlider.addEventListener("input", refresh);
    countryFilter.addEventListener("change", refresh);
    indicatorSelect.addEventListener("change", refresh);
    refresh();
`;

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (m) => HTML_ENTITIES[m] ?? m);
}

export function renderDashboardPage(state: DashboardState, selection: DashboardSelection): string {
  const indicatorOptions = state.indicators
    .map(i => `<option value="${escapeHtml(i.code)}"${i.code === selection.indicatorCode ? " selected" : ""}>${escapeHtml(i.name)}</option>`)
    .join("");

  const countryOptions = state.countries
    .map(c => `<option value="${escapeHtml(c)}"${c === selection.country ? " selected" : ""}>${escapeHtml(c)}</option>`)
    .join("");

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>World Bank Dashboard</title>
  <script src="${PLOTLY_CDN}"></script>
  <style>
    * { box-sizing: border-box; }
    body { margin: 0; font-family: system-ui, -apple-system, sans-serif; background: ${THEME.background}; color: ${THEME.text}; }
    .page { height: 100vh; padding: 10px; display: flex; flex-direction: column; }
    .header { display: flex; align-items: center; justify-content: space-between; margin-bottom: 10px; flex: 0 0 auto; }
    .header h1 { font-size: 24px; margin: 0; white-space: nowrap; }
    .controls { display: flex; align-items: center; gap: 20px; }
    .control { display: flex; align-items: center; gap: 6px; }
    .control label { font-weight: bold; }
    .control select { color: #000; }
    #year-slider { width: 300px; }
    .row-top { display: flex; flex: 0 0 50%; gap: 10px; margin-bottom: 10px; }
    .row-bottom { display: flex; flex: 0 0 40%; gap: 10px; }
    .panel { flex: 1; min-width: 0; }
    .panel-narrow { flex: 0 0 35%; }
    .footer { text-align: center; font-size: 12px; opacity: 0.7; margin: 5px; }
  </style>
</head>
<body>
  <div class="page">
    <div class="header">
      <h1>World Bank Dashboard</h1>
      <div class="controls">
        <div class="control">
          <label for="year-slider">Year: <span id="year-value">${selection.year}</span></label>
          <input id="year-slider" type="range" min="${state.yearRange.min}" max="${state.yearRange.max}" step="1" value="${selection.year}">
        </div>
        <div class="control">
          <label for="country-filter">Country:</label>
          <select id="country-filter">
            <option value="">All Countries</option>
            ${countryOptions}
          </select>
        </div>
        <div class="control">
          <label for="map-indicator">Indicator:</label>
          <select id="map-indicator">${indicatorOptions}</select>
        </div>
      </div>
    </div>
    <div class="row-top">
      <div class="panel" id="world-map"></div>
      <div class="panel panel-narrow" id="bubble-chart"></div>
    </div>
    <div class="row-bottom">
      <div class="panel" id="time-series"></div>
      <div class="panel" id="ranking-chart"></div>
      <div class="panel" id="regional-comparison"></div>
    </div>
    <p class="footer">Data Source: World Bank</p>
  </div>
  <script>
${DASHBOARD_CLIENT_SCRIPT}
  </script>
</body>
</html>`;
}
