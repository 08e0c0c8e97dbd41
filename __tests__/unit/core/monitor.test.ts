import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FxMonitor, monitorPair, runCycle } from '../../../src/core/monitor';
import { InMemoryEventBus } from '../../../src/application/events/bus';
import type { AppEvent } from '../../../src/application/events/types';
import type { CycleReport, Renderer } from '../../../src/contracts';
import { fakeMarket, T0, MINUTE } from '../../helpers/series';

const SPIKY = [1, 1, 1, 1, 1.01];
const FLAT = [150, 150, 150, 150, 150];

function collect(bus: InMemoryEventBus): AppEvent[] {
  const seen: AppEvent[] = [];
  bus.subscribe('EVENT/QUOTE', (e) => { seen.push(e); });
  bus.subscribe('EVENT/ALERT', (e) => { seen.push(e); });
  bus.subscribe('EVENT/CYCLE', (e) => { seen.push(e); });
  return seen;
}

function recorder(): Renderer & { reports: CycleReport[]; started: string[][]; stopped: number[] } {
  const reports: CycleReport[] = [];
  const started: string[][] = [];
  const stopped: number[] = [];
  return {
    name: 'rec',
    reports,
    started,
    stopped,
    start: (pairs) => { started.push(pairs); },
    render: (r) => { reports.push(r); },
    stop: (s) => { stopped.push(s.cycles); },
  };
}

describe('core/monitor monitorPair', () => {
  it('returns null and publishes nothing for a pair without data', async () => {
    const bus = new InMemoryEventBus();
    const seen = collect(bus);
    const res = await monitorPair('USDCHF=X', { market: fakeMarket({}), bus });
    expect(res).toBeNull();
    expect(seen).toEqual([]);
  });

  it('builds the status and publishes quote then alert synchronously', async () => {
    const bus = new InMemoryEventBus();
    const seen = collect(bus);
    const s = await monitorPair('EURUSD=X', { market: fakeMarket({ 'EURUSD=X': SPIKY }), bus, lookback: 5, cycle: 3 });
    expect(s).not.toBeNull();
    if (!s) return;
    expect(s.price).toBe(1.01);
    expect(s.change).toBeCloseTo(1, 10);
    expect(s.level).toBe('major');
    expect(s.alerted).toBe(true);
    expect(s.ts).toBe(T0 + 4 * MINUTE);
    expect(seen.map(e => e.type)).toEqual(['EVENT/QUOTE', 'EVENT/ALERT']);
    const alert = seen[1];
    expect(alert.type === 'EVENT/ALERT' && alert.cycle).toBe(3);
  });

  it('publishes only a quote for a quiet pair', async () => {
    const bus = new InMemoryEventBus();
    const seen = collect(bus);
    const s = await monitorPair('USDJPY=X', { market: fakeMarket({ 'USDJPY=X': FLAT }), bus });
    expect(s?.level).toBeNull();
    expect(s?.alerted).toBe(false);
    expect(seen.map(e => e.type)).toEqual(['EVENT/QUOTE']);
  });
});

describe('core/monitor runCycle', () => {
  it('visits pairs in order and reports the missing ones', async () => {
    const bus = new InMemoryEventBus();
    const seen = collect(bus);
    const market = fakeMarket({ 'EURUSD=X': SPIKY, 'USDJPY=X': FLAT });
    const report = await runCycle(['EURUSD=X', 'USDCHF=X', 'USDJPY=X'], 7, { market, bus, now: () => T0 });
    expect(market.calls).toEqual(['EURUSD=X', 'USDCHF=X', 'USDJPY=X']);
    expect(report.cycle).toBe(7);
    expect(report.at).toBe(T0);
    expect(report.statuses.map(s => s.pair)).toEqual(['EURUSD=X', 'USDJPY=X']);
    expect(report.missing).toEqual(['USDCHF=X']);
    expect(report.alerts.map(s => s.pair)).toEqual(['EURUSD=X']);
    const cycle = seen[seen.length - 1];
    expect(cycle).toMatchObject({ type: 'EVENT/CYCLE', cycle: 7, checked: 2, total: 3, alerts: 1, missing: ['USDCHF=X'] });
  });
});

describe('core/monitor FxMonitor', () => {
  beforeEach(() => { process.env.FAST_CI = '1'; });

  it('rejects an empty pair list', () => {
    expect(() => new FxMonitor({ pairs: [], market: fakeMarket({}), renderers: [] })).toThrow(RangeError);
  });

  it('runs maxCycles cycles and marks each spiking bar once', async () => {
    const bus = new InMemoryEventBus();
    const rec = recorder();
    const mon = new FxMonitor({ pairs: ['EURUSD=X', 'USDJPY=X'], market: fakeMarket({ 'EURUSD=X': SPIKY, 'USDJPY=X': FLAT }), renderers: [rec], bus, maxCycles: 2, refreshSec: 10 });
    const summary = await mon.start();
    expect(summary.cycles).toBe(2);
    expect(summary.alerts).toBe(2);
    expect(rec.started).toEqual([['EURUSD=X', 'USDJPY=X']]);
    expect(rec.reports.map(r => r.cycle)).toEqual([1, 2]);
    expect(rec.stopped).toEqual([2]);
    expect(mon.spikes.size('EURUSD=X')).toBe(1);
    expect(mon.spikes.size('USDJPY=X')).toBe(0);
    expect(mon.running).toBe(false);
    // subscriber removed once the loop ends
    expect(bus.has('EVENT/ALERT')).toBe(false);
  });

  it('stops after the cycle in flight when stop() is called', async () => {
    const bus = new InMemoryEventBus();
    const reports: number[] = [];
    const mon: FxMonitor = new FxMonitor({
      pairs: ['EURUSD=X'],
      market: fakeMarket({ 'EURUSD=X': FLAT }),
      bus,
      renderers: [{ name: 'stopper', render: (r) => { reports.push(r.cycle); mon.stop(); } }],
    });
    const summary = await mon.start();
    expect(reports).toEqual([1]);
    expect(summary.cycles).toBe(1);
  });

  it('logs a failing renderer and keeps rendering the others', async () => {
    process.env.TEST_MODE = '0';
    process.env.LOG_LEVEL = 'ERROR';
    const err = vi.spyOn(console, 'error').mockImplementation(() => {});
    const rec = recorder();
    const bad: Renderer = { name: 'bad', render: () => { throw new Error('boom'); } };
    const mon = new FxMonitor({ pairs: ['EURUSD=X'], market: fakeMarket({ 'EURUSD=X': FLAT }), renderers: [bad, rec], bus: new InMemoryEventBus(), maxCycles: 2 });
    await mon.start();
    expect(rec.reports).toHaveLength(2);
    expect(err).toHaveBeenCalledWith('[ERROR][RENDER] bad failed', { cycle: 1, error: 'boom' });
  });

  it('cancels the fetch in flight and reports the unreached pairs missing', async () => {
    const market = fakeMarket({ 'EURUSD=X': FLAT, 'USDJPY=X': FLAT, 'GBPUSD=X': FLAT });
    const signals: Array<AbortSignal | undefined> = [];
    const rec = recorder();
    const mon: FxMonitor = new FxMonitor({
      pairs: ['EURUSD=X', 'USDJPY=X', 'GBPUSD=X'],
      market: {
        fetchSeries: (pair, signal) => {
          signals.push(signal);
          mon.stop();
          return market.fetchSeries(pair);
        },
      },
      renderers: [rec],
      bus: new InMemoryEventBus(),
    });
    const summary = await mon.start();
    expect(market.calls).toEqual(['EURUSD=X']);
    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
    expect(rec.reports.map(r => r.missing)).toEqual([['USDJPY=X', 'GBPUSD=X']]);
    expect(summary.cycles).toBe(1);
  });

  it('reports the feed request count in the summary when the source keeps one', async () => {
    const market = fakeMarket({ 'EURUSD=X': FLAT });
    const mon = new FxMonitor({
      pairs: ['EURUSD=X'],
      market: { fetchSeries: (p) => market.fetchSeries(p), requestCount: () => market.calls.length },
      renderers: [],
      bus: new InMemoryEventBus(),
      maxCycles: 2,
    });
    expect((await mon.start()).requests).toBe(2);
    const plain = new FxMonitor({ pairs: ['EURUSD=X'], market: fakeMarket({ 'EURUSD=X': FLAT }), renderers: [], bus: new InMemoryEventBus(), maxCycles: 1 });
    expect((await plain.start()).requests).toBeUndefined();
  });

  it('refuses a second start while running', async () => {
    const mon = new FxMonitor({ pairs: ['EURUSD=X'], market: fakeMarket({ 'EURUSD=X': FLAT }), renderers: [], bus: new InMemoryEventBus(), maxCycles: 3 });
    const first = mon.start();
    await expect(mon.start()).rejects.toThrow('monitor already started');
    mon.stop();
    const summary = await first;
    expect(summary.cycles).toBeGreaterThanOrEqual(1);
  });

  it('exposes the render context', () => {
    const mon = new FxMonitor({ pairs: ['EURUSD=X'], market: fakeMarket({}), renderers: [], lookback: 3, refreshSec: 30 });
    const ctx = mon.context();
    expect(ctx.lookback).toBe(3);
    expect(ctx.refreshSec).toBe(30);
    expect(ctx.spikes).toBe(mon.spikes);
  });
});
