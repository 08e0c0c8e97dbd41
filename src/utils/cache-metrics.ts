import { log } from './logger';

type Counter = { hits: number; misses: number; stale: number };
export type CacheCounter = Counter & { hitRate: number };

const counters: Record<string, Counter> = {};
let lastEmit = Date.now();
let intervalMs = Math.max(0, Number(process.env.CACHE_METRICS_INTERVAL_MS ?? 300000));

function get(key: string): Counter {
  if (!counters[key]) counters[key] = { hits: 0, misses: 0, stale: 0 };
  return counters[key];
}

export function cacheHit(name: string) {
  get(name).hits++;
  maybeEmit();
}

export function cacheMiss(name: string) {
  get(name).misses++;
  maybeEmit();
}

export function cacheStale(name: string) {
  get(name).stale++;
  maybeEmit();
}

export function setCacheMetricsInterval(ms: number) { intervalMs = Math.max(0, ms); }

/** Counters with hit rate (hits over all lookups, stale included), rounded to 3 dp. */
export function cacheMetricsSnapshot(): Record<string, CacheCounter> {
  const payload: Record<string, CacheCounter> = {};
  for (const [k, v] of Object.entries(counters)) {
    const total = v.hits + v.misses + v.stale;
    payload[k] = { ...v, hitRate: Number((total ? v.hits / total : 0).toFixed(3)) };
  }
  return payload;
}

function maybeEmit() {
  if (intervalMs <= 0) return;
  const now = Date.now();
  if (now - lastEmit < intervalMs) return;
  lastEmit = now;
  log('INFO', 'CACHE', 'metrics', cacheMetricsSnapshot());
}

// test helper
export function __resetCacheMetrics() { for (const k of Object.keys(counters)) delete counters[k]; lastEmit = Date.now(); }
