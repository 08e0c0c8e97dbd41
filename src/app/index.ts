// One-time wiring of config, feed, services and renderers for the entry points.
import type { Renderer } from '../contracts';
import type { AppConfig } from '../utils/config';
import { YahooChartPublic } from '../api/public';
import { MarketService } from '../adapters/market-service';
import { FxMonitor, type SeriesSource } from '../core/monitor';
import { SpikeTracker } from '../core/spike-tracker';
import { TerminalRenderer } from '../ui/terminal-renderer';
import { DashboardRenderer } from '../ui/dashboard-renderer';
import { FocusRenderer } from '../ui/focus-renderer';
import { ChartRenderer } from '../chart/chart-renderer';
import { getEventBus, type EventBus } from '../application/events/bus';
import { log } from '../utils/logger';

export interface RendererHooks {
  onQuit?: () => void;
}

export function buildRenderers(cfg: AppConfig, hooks: RendererHooks = {}): Renderer[] {
  const out: Renderer[] = [];
  switch (cfg.mode) {
    case 'terminal': out.push(new TerminalRenderer()); break;
    case 'dashboard': out.push(new DashboardRenderer()); break;
    case 'focus': out.push(new FocusRenderer({ onQuit: hooks.onQuit })); break;
    case 'chart': out.push(new TerminalRenderer()); break;
  }
  if (cfg.chartEnabled) out.push(new ChartRenderer(cfg.chartDir));
  return out;
}

export function buildMarketService(cfg: AppConfig, bus: EventBus = getEventBus()): MarketService {
  return new MarketService({
    bus,
    feed: new YahooChartPublic({ baseUrl: cfg.yahooBaseUrl, timeoutMs: cfg.httpTimeoutMs }),
    query: { range: cfg.range, interval: cfg.interval },
    cacheTtlMs: cfg.cacheTtlMs,
  });
}

export interface CreateMonitorOptions {
  renderers?: Renderer[];
  market?: SeriesSource;
  maxCycles?: number;
  bus?: EventBus;
}

export function createMonitor(cfg: AppConfig, opts: CreateMonitorOptions = {}): FxMonitor {
  let monitor: FxMonitor | null = null;
  const bus = opts.bus ?? getEventBus();
  const renderers = opts.renderers ?? buildRenderers(cfg, { onQuit: () => monitor?.stop() });
  monitor = new FxMonitor({
    pairs: cfg.pairs,
    market: opts.market ?? buildMarketService(cfg, bus),
    bus,
    renderers,
    lookback: cfg.lookback,
    refreshSec: cfg.refreshSec,
    spikes: new SpikeTracker(cfg.spikeMarkersMax),
    maxCycles: opts.maxCycles,
  });
  return monitor;
}

export type SignalName = 'SIGINT' | 'SIGTERM';

export interface SignalTarget {
  on(signal: SignalName, listener: () => void): unknown;
  off(signal: SignalName, listener: () => void): unknown;
}

/**
 * First SIGINT/SIGTERM stops the monitor (the fetch in flight is cancelled);
 * a second one exits right away with 130. Returns the unbind function.
 */
export function bindStopSignals(
  monitor: { stop(): void },
  target: SignalTarget = process,
  exit: (code: number) => void = (code) => process.exit(code),
): () => void {
  let received = 0;
  const onSig = () => {
    received++;
    if (received === 1) {
      log('INFO', 'CYCLE', 'stopping, press Ctrl+C again to exit now');
      monitor.stop();
      return;
    }
    exit(130);
  };
  const signals: SignalName[] = ['SIGINT', 'SIGTERM'];
  for (const s of signals) target.on(s, onSig);
  return () => { for (const s of signals) target.off(s, onSig); };
}
