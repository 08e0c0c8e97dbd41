// Shared contracts between the feed, the monitor loop and the renderers

/** One intraday bar. `ts` is epoch ms of the bar open. */
export interface Bar {
  ts: number;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number;
  volume: number | null;
}

export interface PriceSeries {
  symbol: string;
  currency?: string;
  bars: Bar[];
}

export type AlertLevel = 'minor' | 'major';
export type Direction = 'up' | 'down';

export interface PairStatus {
  pair: string;
  price: number;
  change: number;
  level: AlertLevel | null;
  /** Terminal semantics: |change| at or above the alert threshold. */
  alerted: boolean;
  lookback: number;
  /** Timestamp of the last bar. */
  ts: number;
  series: PriceSeries;
}

export interface CycleReport {
  cycle: number;
  at: number;
  pairs: string[];
  statuses: PairStatus[];
  missing: string[];
  alerts: PairStatus[];
}

export interface SpikeMarker {
  id: string;
  pair: string;
  ts: number;
  price: number;
  pct: number;
  level: AlertLevel;
  lookback: number;
}

export interface MonitorSummary {
  cycles: number;
  startedAt: number;
  stoppedAt: number;
  alerts: number;
  /** Feed requests sent over the run; the public feed has a daily quota. */
  requests?: number;
}

/** Read side of the spike ring, as seen by renderers. */
export interface SpikeIndex {
  markers(pair: string): SpikeMarker[];
  lookup(pair: string, ts: number, toleranceMs?: number): SpikeMarker | null;
  at(pair: string, index: number): SpikeMarker | null;
}

export interface RenderContext {
  refreshSec: number;
  lookback: number;
  spikes: SpikeIndex;
}

export interface Renderer {
  readonly name: string;
  start?(pairs: string[], ctx: RenderContext): void;
  render(report: CycleReport, ctx: RenderContext): void | Promise<void>;
  stop?(summary: MonitorSummary): void;
}

export type MonitorMode = 'terminal' | 'dashboard' | 'focus' | 'chart';
