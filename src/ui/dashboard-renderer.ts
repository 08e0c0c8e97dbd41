import type { CycleReport, PairStatus, RenderContext, Renderer, SpikeMarker } from '../contracts';
import { clockStr } from '../utils/toolkit';
import { buildSparkline, colorFns, displayPair, fmtPct, fmtPrice, levelLabel, padVisible, sparkPositions } from './format';

export const CARD_WIDTH = 18;
export const DEFAULT_SPARK_WIDTH = 60;

export interface FrameOptions {
  columns?: number;
  sparkWidth?: number;
}

/** Row under a sparkline with `^` (minor) / `!` (major) at marked bars. */
export function markerRow(status: PairStatus, markers: SpikeMarker[], width: number): string {
  const ts = status.series.bars.map(b => b.ts);
  const visible = Math.min(width, ts.length);
  const cells: string[] = Array.from({ length: visible }, () => ' ');
  const pos = sparkPositions(ts, markers.map(m => m.ts), width);
  pos.forEach((p, i) => {
    if (p < 0) return;
    cells[p] = markers[i].level === 'major' ? '!' : '^';
  });
  return cells.join('').replace(/\s+$/, '');
}

function cardLines(report: CycleReport): string[][] {
  const c = colorFns();
  const byPair = new Map(report.statuses.map(s => [s.pair, s]));
  return report.pairs.map(pair => {
    const s = byPair.get(pair);
    if (!s) return [c.bold(displayPair(pair)), c.yellow('No data'), ''];
    const delta = s.change >= 0 ? c.green(fmtPct(s.change)) : c.red(fmtPct(s.change));
    return [c.bold(displayPair(pair)), fmtPrice(s.price), delta];
  });
}

/**
 * Whole-screen frame: metric cards, the alerts section, and one sparkline
 * subplot per pair with its spike markers underneath.
 */
export function buildDashboardFrame(report: CycleReport, ctx: RenderContext, opts: FrameOptions = {}): string[] {
  const c = colorFns();
  const columns = Math.max(CARD_WIDTH, opts.columns ?? 100);
  const sparkWidth = opts.sparkWidth ?? DEFAULT_SPARK_WIDTH;
  const out: string[] = [];
  out.push(c.bold('FX Live Volatility Dashboard'));
  out.push(`Live FX Prices (Updated ${clockStr(new Date(report.at))})  lookback=${ctx.lookback}m refresh=${ctx.refreshSec}s`);
  out.push('');

  const cards = cardLines(report);
  const perRow = Math.max(1, Math.floor(columns / CARD_WIDTH));
  for (let i = 0; i < cards.length; i += perRow) {
    const row = cards.slice(i, i + perRow);
    for (let line = 0; line < 3; line++) {
      out.push(row.map(card => padVisible(card[line], CARD_WIDTH)).join('').replace(/\s+$/, ''));
    }
    out.push('');
  }

  out.push('─'.repeat(Math.min(columns, 60)));
  out.push(c.bold('Alerts'));
  if (report.alerts.length === 0) {
    out.push(c.green('No alerts triggered'));
  } else {
    for (const a of report.alerts) {
      if (!a.level) continue;
      const paint = a.level === 'major' ? c.red : c.yellow;
      out.push(paint(`${levelLabel(a.level)} – ${displayPair(a.pair)}  Price: ${fmtPrice(a.price)}  Move: ${fmtPct(a.change)}`));
    }
  }
  out.push('─'.repeat(Math.min(columns, 60)));

  out.push(c.bold('Price Charts'));
  for (const s of report.statuses) {
    const closes = s.series.bars.map(b => b.close);
    const window = closes.slice(-sparkWidth);
    const lo = Math.min(...window);
    const hi = Math.max(...window);
    out.push(`${displayPair(s.pair)}  low ${fmtPrice(lo)}  high ${fmtPrice(hi)}`);
    out.push(`  ${buildSparkline(closes, sparkWidth)}`);
    const marks = markerRow(s, ctx.spikes.markers(s.pair), sparkWidth);
    if (marks) out.push(`  ${marks}`);
  }
  return out;
}

export type FrameSink = (lines: string[]) => void;

export function screenSink(lines: string[]) {
  console.clear();
  console.log(lines.join('\n'));
}

/** Subplot dashboard, redrawn in place every cycle. */
export class DashboardRenderer implements Renderer {
  readonly name = 'dashboard';

  constructor(private readonly sink: FrameSink = screenSink, private readonly frame: FrameOptions = {}) {}

  render(report: CycleReport, ctx: RenderContext) {
    const columns = this.frame.columns ?? process.stdout.columns ?? 100;
    this.sink(buildDashboardFrame(report, ctx, { ...this.frame, columns }));
  }
}
