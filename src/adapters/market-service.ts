import type { BaseMarketDataPublic, SeriesQuery } from "../api/base-public";
import { YahooChartPublic } from "../api/public";
import type { PriceSeries } from "../contracts";
import { buildErrorEventMeta, errorMessage } from "../application/errors";
import { getEventBus, type EventBus } from "../application/events/bus";
import { cacheHit, cacheMiss, cacheStale } from "../utils/cache-metrics";
import BaseService from "./base-service";

type CacheEntry = { at: number; val: PriceSeries };

export interface MarketServiceOptions {
  feed?: BaseMarketDataPublic;
  query?: SeriesQuery;
  /** 0 disables caching. */
  cacheTtlMs?: number;
  slowMs?: number;
  now?: () => number;
  /** Where EVENT/ERROR goes; defaults to the process-wide bus. */
  bus?: EventBus;
}

const __IS_TEST__ = (process.env.TEST_MODE === '1') || !!process.env.VITEST_WORKER_ID;

/**
 * "Get live FX": one series per pair, cached briefly so a renderer that reads a
 * pair twice in a cycle costs one request. Failures never escape; they are logged,
 * published as EVENT/ERROR and returned as an empty series.
 */
export class MarketService extends BaseService {
  private cache = new Map<string, CacheEntry>();
  private readonly feed: BaseMarketDataPublic;
  private readonly query: SeriesQuery;
  private readonly ttlMs: number;
  private readonly slowMs: number;
  private readonly now: () => number;
  private readonly bus: EventBus;
  private requests = 0;

  constructor(opts: MarketServiceOptions = {}) {
    super();
    this.feed = opts.feed ?? new YahooChartPublic();
    this.query = opts.query ?? { range: '1d', interval: '1m' };
    this.ttlMs = Math.max(0, opts.cacheTtlMs ?? (__IS_TEST__ ? 0 : 30000));
    this.slowMs = opts.slowMs ?? 800;
    this.now = opts.now ?? Date.now;
    this.bus = opts.bus ?? getEventBus();
  }

  private isFresh(entryAt: number): boolean { return this.ttlMs > 0 && (this.now() - entryAt) <= this.ttlMs; }

  /** Requests sent to the feed since start; the public feed has a small daily quota. */
  requestCount(): number { return this.requests; }

  async fetchSeries(pair: string, signal?: AbortSignal): Promise<PriceSeries> {
    const hit = this.cache.get(pair);
    if (hit) {
      if (this.isFresh(hit.at)) { this.clog('CACHE', 'DEBUG', 'hit series', { pair }); cacheHit('market:series'); return hit.val; }
      cacheStale('market:series');
    } else {
      cacheMiss('market:series');
    }
    const t0 = this.now();
    this.requests++;
    try {
      const v = await this.feed.getIntradaySeries(pair, this.query, signal);
      const dt = this.now() - t0;
      if (dt > this.slowMs) this.clog('FEED', 'WARN', 'slow public API', { pair, elapsedMs: dt });
      if (v.bars.length === 0) {
        this.clog('FEED', 'WARN', 'no data', { pair });
        this.cache.delete(pair);
        return v;
      }
      this.cache.set(pair, { at: this.now(), val: v });
      return v;
    } catch (err) {
      this.cache.delete(pair);
      if (signal?.aborted) {
        this.clog('FEED', 'DEBUG', 'fetch cancelled', { pair });
        return { symbol: pair, bars: [] };
      }
      this.clog('FEED', 'ERROR', `error fetching ${pair}`, { pair, error: errorMessage(err) });
      this.bus.publish({ type: 'EVENT/ERROR', ts: this.now(), ...buildErrorEventMeta(pair, err) });
      return { symbol: pair, bars: [] };
    }
  }

  invalidate(pair?: string) {
    if (pair !== undefined) this.cache.delete(pair);
    else this.cache.clear();
  }
}

export default MarketService;
