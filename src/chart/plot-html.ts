import type { CycleReport, PairStatus, SpikeIndex, SpikeMarker } from '../contracts';
import { clockStr, stampStr } from '../utils/toolkit';
import { fmtPct, fmtPrice, slashPair } from '../ui/format';

export const PLOTLY_CDN = 'https://cdn.plot.ly/plotly-2.30.0.min.js';
export const CHART_FILE = 'fx-dashboard.html';

const LEVEL_COLOR = { minor: '#ff9f1c', major: '#d62728' } as const;
const LINE_COLOR = '#1f77b4';

export interface PlotTrace {
  x: string[];
  y: number[];
  name: string;
  xaxis: string;
  yaxis: string;
  mode: 'lines' | 'markers';
  line?: { width: number; color: string };
  marker?: { size: number; color: string | string[]; symbol: string };
  hovertext?: string[];
  hoverinfo?: 'text' | 'x+y';
  showlegend: boolean;
}

/** Hover tooltip for one spike marker. */
export function markerHoverText(m: SpikeMarker): string {
  return [
    `<b>${slashPair(m.pair)}</b>`,
    `time ${clockStr(new Date(m.ts))}`,
    `price ${fmtPrice(m.price)}`,
    `move ${fmtPct(m.pct)} over ${m.lookback}m`,
    `level ${m.level}`,
  ].join('<br>');
}

function axisSuffix(i: number): string { return i === 0 ? '' : String(i + 1); }

/** Close line plus spike markers for one subplot row. */
export function pairTraces(s: PairStatus, markers: SpikeMarker[], row: number): PlotTrace[] {
  const sfx = axisSuffix(row);
  const iso = (ts: number) => new Date(ts).toISOString();
  const traces: PlotTrace[] = [{
    x: s.series.bars.map(b => iso(b.ts)),
    y: s.series.bars.map(b => b.close),
    name: slashPair(s.pair),
    xaxis: `x${sfx}`,
    yaxis: `y${sfx}`,
    mode: 'lines',
    line: { width: 1.5, color: LINE_COLOR },
    hoverinfo: 'x+y',
    showlegend: false,
  }];
  if (markers.length) {
    traces.push({
      x: markers.map(m => iso(m.ts)),
      y: markers.map(m => m.price),
      name: `${slashPair(s.pair)} spikes`,
      xaxis: `x${sfx}`,
      yaxis: `y${sfx}`,
      mode: 'markers',
      marker: { size: 9, color: markers.map(m => LEVEL_COLOR[m.level]), symbol: 'diamond' },
      hovertext: markers.map(markerHoverText),
      hoverinfo: 'text',
      showlegend: false,
    });
  }
  return traces;
}

export function buildFigure(report: CycleReport, spikes: SpikeIndex) {
  const traces: PlotTrace[] = [];
  const layout: Record<string, unknown> = {
    title: { text: `FX Live Volatility (updated ${stampStr(new Date(report.at))})` },
    grid: { rows: Math.max(1, report.statuses.length), columns: 1, pattern: 'independent' },
    hovermode: 'closest',
    height: Math.max(320, 260 * report.statuses.length),
    margin: { t: 60, b: 40, l: 80, r: 30 },
  };
  report.statuses.forEach((s, row) => {
    traces.push(...pairTraces(s, spikes.markers(s.pair), row));
    const sfx = axisSuffix(row);
    layout[`yaxis${sfx}`] = { title: { text: `${slashPair(s.pair)} ${fmtPct(s.change)}` }, tickformat: '.5f' };
    layout[`xaxis${sfx}`] = { type: 'date', showspikes: true, spikemode: 'across', spikethickness: 1 };
  });
  return { traces, layout };
}

/** Makes JSON safe to inline inside a <script> element. */
export function scriptJson(v: unknown): string {
  return JSON.stringify(v).replace(/</g, '\\u003c').replace(/\u2028/g, '\\u2028').replace(/\u2029/g, '\\u2029');
}

function escapeHtml(s: string): string {
  return s.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

/**
 * Self-contained page: one subplot per pair, spike markers with hover tooltips,
 * reloaded by the browser every refresh interval. Pairs without data are listed under the chart.
 */
export function generateHTML(report: CycleReport, spikes: SpikeIndex, refreshSec: number): string {
  const { traces, layout } = buildFigure(report, spikes);
  const missing = report.missing.length
    ? `<p class="missing">No data: ${escapeHtml(report.missing.map(slashPair).join(', '))}</p>`
    : '';
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8" />
<meta http-equiv="refresh" content="${Math.max(1, Math.floor(refreshSec))}" />
<title>FX Live Volatility</title>
<script src="${PLOTLY_CDN}"></script>
<style>body{font-family:sans-serif;margin:0}.missing{color:#b36b00;padding:0 16px}</style>
</head>
<body>
<div id="chart" style="width:100%;"></div>
${missing}
<script>
  const traces = ${scriptJson(traces)};
  const layout = ${scriptJson(layout)};
  Plotly.newPlot("chart", traces, layout, { responsive: true });
</script>
</body>
</html>
`;
}
