import type { CycleReport, MonitorSummary, PairStatus, PriceSeries, RenderContext, Renderer } from "../contracts";
import { getEventBus, type EventBus } from "../application/events/bus";
import { registerSpikeSubscriber } from "../application/events/subscribers/spike-subscriber";
import { errorMessage } from "../application/errors";
import { log } from "../utils/logger";
import { sleep } from "../utils/toolkit";
import { SpikeTracker } from "./spike-tracker";
import { calculatePercentChange, classifyAlert, shouldAlert, DEFAULT_LOOKBACK } from "./volatility";

export interface SeriesSource {
  fetchSeries(pair: string, signal?: AbortSignal): Promise<PriceSeries>;
  /** Feed requests sent so far, when the source counts them. */
  requestCount?(): number;
}

export interface PairDeps {
  market: SeriesSource;
  lookback?: number;
  cycle?: number;
  bus?: EventBus;
  signal?: AbortSignal;
}

/**
 * Checks one pair. Returns null when the feed had nothing for it.
 * Publishes EVENT/QUOTE, and EVENT/ALERT when the move classifies, synchronously
 * so subscribers have run before the caller renders.
 */
export async function monitorPair(pair: string, deps: PairDeps): Promise<PairStatus | null> {
  const lookback = deps.lookback ?? DEFAULT_LOOKBACK;
  const bus = deps.bus ?? getEventBus();
  const series = await deps.market.fetchSeries(pair, deps.signal);
  if (series.bars.length === 0) return null;

  const closes = series.bars.map(b => b.close);
  const change = calculatePercentChange(closes, lookback);
  const last = series.bars[series.bars.length - 1];
  const level = classifyAlert(change);
  const status: PairStatus = {
    pair,
    price: last.close,
    change,
    level,
    alerted: shouldAlert(change),
    lookback,
    ts: last.ts,
    series,
  };

  bus.publish({ type: 'EVENT/QUOTE', ts: last.ts, pair, price: last.close, change, level, lookback }, { async: false });
  if (level) {
    bus.publish({ type: 'EVENT/ALERT', ts: last.ts, pair, price: last.close, change, level, lookback, cycle: deps.cycle ?? 0 }, { async: false });
  }
  return status;
}

/** One pass over every pair, one after another. Pairs not reached before an abort are reported missing. */
export async function runCycle(pairs: string[], cycle: number, deps: PairDeps & { now?: () => number }): Promise<CycleReport> {
  const bus = deps.bus ?? getEventBus();
  const at = (deps.now ?? Date.now)();
  const statuses: PairStatus[] = [];
  const missing: string[] = [];
  for (const pair of pairs) {
    if (deps.signal?.aborted) { missing.push(pair); continue; }
    const status = await monitorPair(pair, { ...deps, cycle, bus });
    if (status) statuses.push(status);
    else missing.push(pair);
  }
  const alerts = statuses.filter(s => s.level !== null);
  bus.publish({ type: 'EVENT/CYCLE', ts: at, cycle, checked: statuses.length, total: pairs.length, alerts: alerts.length, missing }, { async: false });
  return { cycle, at, pairs: [...pairs], statuses, missing, alerts };
}

export interface FxMonitorOptions {
  pairs: string[];
  market: SeriesSource;
  renderers: Renderer[];
  lookback?: number;
  refreshSec?: number;
  spikes?: SpikeTracker;
  bus?: EventBus;
  /** Stop after this many cycles (used by one-shot tools and tests). */
  maxCycles?: number;
  now?: () => number;
}

/**
 * fetch → compute → classify → render → sleep, until stop() or maxCycles.
 * Renderer failures are logged and do not end the loop.
 */
export class FxMonitor {
  readonly spikes: SpikeTracker;
  private readonly bus: EventBus;
  private readonly now: () => number;
  private abort: AbortController | null = null;
  private cycle = 0;
  private alertCount = 0;

  constructor(private readonly opts: FxMonitorOptions) {
    if (opts.pairs.length === 0) throw new RangeError('at least one pair is required');
    this.spikes = opts.spikes ?? new SpikeTracker();
    this.bus = opts.bus ?? getEventBus();
    this.now = opts.now ?? Date.now;
  }

  get running(): boolean { return this.abort !== null && !this.abort.signal.aborted; }
  get cycles(): number { return this.cycle; }

  context(): RenderContext {
    return { refreshSec: this.opts.refreshSec ?? 60, lookback: this.opts.lookback ?? DEFAULT_LOOKBACK, spikes: this.spikes };
  }

  async start(): Promise<MonitorSummary> {
    if (this.abort) throw new Error('monitor already started');
    const abort = new AbortController();
    this.abort = abort;
    const startedAt = this.now();
    const ctx = this.context();
    const offSpikes = registerSpikeSubscriber(this.spikes, this.bus);
    for (const r of this.opts.renderers) r.start?.(this.opts.pairs, ctx);
    try {
      while (!abort.signal.aborted) {
        this.cycle++;
        const report = await runCycle(this.opts.pairs, this.cycle, {
          market: this.opts.market,
          lookback: ctx.lookback,
          bus: this.bus,
          now: this.now,
          signal: abort.signal,
        });
        this.alertCount += report.alerts.length;
        for (const r of this.opts.renderers) {
          try {
            await r.render(report, ctx);
          } catch (err) {
            log('ERROR', 'RENDER', `${r.name} failed`, { cycle: report.cycle, error: errorMessage(err) });
          }
        }
        if (this.opts.maxCycles !== undefined && this.cycle >= this.opts.maxCycles) break;
        await sleep(ctx.refreshSec * 1000, abort.signal);
      }
    } finally {
      offSpikes();
      this.abort = null;
    }
    const summary: MonitorSummary = { cycles: this.cycle, startedAt, stoppedAt: this.now(), alerts: this.alertCount };
    const requests = this.opts.market.requestCount?.();
    if (requests !== undefined) summary.requests = requests;
    for (const r of this.opts.renderers) r.stop?.(summary);
    return summary;
  }

  /** Interrupts the current sleep and cancels the fetch in flight; the cycle is still rendered. */
  stop() { this.abort?.abort(); }
}
