import type { CycleReport, MonitorSummary, PairStatus, RenderContext, Renderer, SpikeMarker } from '../contracts';
import { clockStr } from '../utils/toolkit';
import { buildSparkline, colorFns, displayPair, fmtPct, fmtPrice, slashPair } from './format';
import { markerRow, screenSink, type FrameSink } from './dashboard-renderer';

export type FocusKey = 'left' | 'right' | 'up' | 'down' | 'quit' | 'other';

export function decodeKey(chunk: Buffer | string): FocusKey {
  const str = chunk.toString();
  if (str === 'q' || str === 'Q' || str === '\u0003') return 'quit';
  if (str === '\u001b[A' || str === 'k') return 'up';
  if (str === '\u001b[B' || str === 'j') return 'down';
  if (str === '\u001b[C' || str === 'l') return 'right';
  if (str === '\u001b[D' || str === 'h') return 'left';
  return 'other';
}

/**
 * Which pair is shown and which of its markers is selected.
 * The selection is the marker's bar time, so it survives ring eviction and late inserts;
 * null means "no marker selected". ↑ starts at the newest marker and walks back.
 */
export class FocusState {
  pairIndex = 0;
  selected: number | null = null;

  constructor(private pairs: string[]) {}

  get pair(): string { return this.pairs[this.pairIndex]; }

  setPairs(pairs: string[]) {
    const current = this.pair;
    this.pairs = pairs;
    const i = pairs.indexOf(current);
    this.pairIndex = i >= 0 ? i : 0;
    if (i < 0) this.selected = null;
  }

  /** Applies a key against the pair's marker times (ascending); returns false for keys that change nothing. */
  apply(key: FocusKey, markerTs: readonly number[]): boolean {
    const at = this.selected === null ? -1 : markerTs.indexOf(this.selected);
    switch (key) {
      case 'left':
      case 'right': {
        if (this.pairs.length < 2) return false;
        const step = key === 'right' ? 1 : -1;
        this.pairIndex = (this.pairIndex + step + this.pairs.length) % this.pairs.length;
        this.selected = null;
        return true;
      }
      case 'up': {
        if (markerTs.length === 0) return false;
        if (at === 0) return false;
        this.selected = at < 0 ? markerTs[markerTs.length - 1] : markerTs[at - 1];
        return true;
      }
      case 'down': {
        if (this.selected === null) return false;
        this.selected = at < 0 || at + 1 >= markerTs.length ? null : markerTs[at + 1];
        return true;
      }
      default:
        return false;
    }
  }
}

export function formatTooltip(m: SpikeMarker): string {
  return `◆ ${clockStr(new Date(m.ts))}  price ${fmtPrice(m.price)}  move ${fmtPct(m.pct)}  ${m.level} (${m.lookback}m lookback)`;
}

function pairPane(s: PairStatus | undefined, pair: string, ctx: RenderContext, selected: number | null, sparkWidth: number): string[] {
  const c = colorFns();
  const out: string[] = [];
  if (!s) {
    out.push(c.yellow(`${displayPair(pair)}: No data`));
    return out;
  }
  const delta = s.change >= 0 ? c.green(fmtPct(s.change)) : c.red(fmtPct(s.change));
  const tag = s.level === 'major' ? c.red(' MAJOR') : s.level === 'minor' ? c.yellow(' MINOR') : '';
  out.push(`${c.bold(slashPair(pair))}  ${fmtPrice(s.price)}  ${delta}${tag}`);
  out.push(`  ${buildSparkline(s.series.bars.map(b => b.close), sparkWidth)}`);
  const markers = ctx.spikes.markers(pair);
  const row = markerRow(s, markers, sparkWidth);
  if (row) out.push(`  ${row}`);
  out.push('');
  if (!markers.length) {
    out.push(c.dim('no spikes recorded'));
  } else {
    out.push(`spikes: ${markers.length}`);
    const m = selected !== null ? ctx.spikes.lookup(pair, selected, 0) : null;
    out.push(m ? c.inverse(formatTooltip(m)) : c.dim('↑/↓ to inspect spikes'));
  }
  return out;
}

export function buildFocusFrame(report: CycleReport, ctx: RenderContext, state: FocusState, sparkWidth = 60): string[] {
  const c = colorFns();
  const pair = state.pair;
  const s = report.statuses.find(x => x.pair === pair);
  const tabs = report.pairs.map(p => p === pair ? c.inverse(` ${displayPair(p)} `) : ` ${displayPair(p)} `).join('');
  return [
    `Updated ${clockStr(new Date(report.at))}  cycle ${report.cycle}`,
    '(←/→ pair, ↑/↓ spikes, q quit)',
    tabs,
    '',
    ...pairPane(s, pair, ctx, state.selected, sparkWidth),
  ];
}

export interface KeySource {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  off(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
}

export interface FocusOptions {
  input?: KeySource;
  sink?: FrameSink;
  onQuit?: () => void;
  sparkWidth?: number;
}

/**
 * Single-pane dashboard with keyboard navigation.
 * Without a TTY there is nothing to navigate, so every pair is printed in turn.
 */
export class FocusRenderer implements Renderer {
  readonly name = 'focus';
  private state: FocusState | null = null;
  private last: { report: CycleReport; ctx: RenderContext } | null = null;
  private readonly input: KeySource;
  private readonly sink: FrameSink;
  private readonly onKey = (chunk: Buffer | string) => this.handleKey(decodeKey(chunk));

  constructor(private readonly opts: FocusOptions = {}) {
    this.input = opts.input ?? process.stdin;
    this.sink = opts.sink ?? screenSink;
  }

  get interactive(): boolean { return !!this.input.isTTY; }

  start(pairs: string[]) {
    this.state = new FocusState(pairs);
    if (!this.interactive) return;
    this.input.setRawMode?.(true);
    this.input.resume();
    this.input.on('data', this.onKey);
  }

  handleKey(key: FocusKey) {
    if (key === 'quit') { this.opts.onQuit?.(); return; }
    if (!this.state || !this.last) return;
    const ts = this.last.ctx.spikes.markers(this.state.pair).map(m => m.ts);
    if (this.state.apply(key, ts)) this.redraw();
  }

  private redraw() {
    if (!this.state || !this.last) return;
    const { report, ctx } = this.last;
    if (this.interactive) {
      this.sink(buildFocusFrame(report, ctx, this.state, this.opts.sparkWidth));
      return;
    }
    const lines: string[] = [`Updated ${clockStr(new Date(report.at))}  cycle ${report.cycle}`];
    for (const p of report.pairs) {
      const s = report.statuses.find(x => x.pair === p);
      lines.push(...pairPane(s, p, ctx, null, this.opts.sparkWidth ?? 60), '');
    }
    this.sink(lines);
  }

  render(report: CycleReport, ctx: RenderContext) {
    if (!this.state) this.state = new FocusState(report.pairs);
    else this.state.setPairs(report.pairs);
    this.last = { report, ctx };
    // the selected marker may have been evicted since the last cycle
    if (this.state.selected !== null && !ctx.spikes.lookup(this.state.pair, this.state.selected, 0)) this.state.selected = null;
    this.redraw();
  }

  stop(_summary: MonitorSummary) {
    if (!this.interactive) return;
    this.input.off('data', this.onKey);
    this.input.setRawMode?.(false);
    this.input.pause();
  }
}
