import { z } from "zod";
import { ConfigError } from "../application/errors";
import type { MonitorMode } from "../contracts";

export interface AppConfig {
    mode: MonitorMode;
    pairs: string[];
    lookback: number;
    refreshSec: number;
    range: string;
    interval: string;
    chartDir: string;
    chartEnabled: boolean;
    spikeMarkersMax: number;
    yahooBaseUrl: string;
    httpTimeoutMs: number;
    cacheTtlMs: number;
}

/** Five most traded pairs, Yahoo ticker format. */
export const TOP_5_PAIRS = ["EURUSD=X", "USDJPY=X", "GBPUSD=X", "AUDUSD=X", "USDCAD=X"];
/** Dashboard set: the top five plus USD/CHF, in the order the dashboard lays them out. */
export const DASHBOARD_PAIRS = ["EURUSD=X", "USDJPY=X", "GBPUSD=X", "USDCHF=X", "USDCAD=X", "AUDUSD=X"];

export const LOOKBACK_RANGE = { min: 1, max: 30, def: 5 } as const;
export const REFRESH_RANGE = { min: 10, max: 120, def: 60 } as const;

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

function intIn(min: number, max: number, def: number) {
    return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(def));
}

function truthy(val: string): boolean {
    return ["1", "true", "yes", "on"].includes(val.trim().toLowerCase());
}

// Zod schema for environment validation
const envSchema = z.object({
    FX_MODE: z.preprocess(
        v => typeof v === 'string' ? v.trim().toLowerCase() || undefined : v,
        z.enum(["terminal", "dashboard", "focus", "chart"]).default("terminal"),
    ),
    FX_PAIRS: z.string().optional(),
    LOOKBACK_MIN: intIn(LOOKBACK_RANGE.min, LOOKBACK_RANGE.max, LOOKBACK_RANGE.def),
    REFRESH_SEC: intIn(REFRESH_RANGE.min, REFRESH_RANGE.max, REFRESH_RANGE.def),
    FX_RANGE: z.preprocess(blankToUndefined, z.string().default("1d")),
    FX_INTERVAL: z.preprocess(blankToUndefined, z.string().default("1m")),
    CHART_DIR: z.preprocess(blankToUndefined, z.string().default("charts")),
    CHART_ENABLED: z.string().optional(),
    SPIKE_MARKERS_MAX: intIn(1, 1000, 50),
    YAHOO_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default("https://query1.finance.yahoo.com")),
    HTTP_TIMEOUT_MS: intIn(100, 120000, 10000),
    MARKET_CACHE_TTL_MS: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional()),
});

/**
 * Normalises user-typed pairs to Yahoo tickers:
 * `EUR/USD`, `eur_usd`, `eurusd` -> `EURUSD=X`. Anything that is not a
 * six-letter currency pair is passed through upper-cased.
 */
export function normalizePair(raw: string): string {
    const s = raw.trim().toUpperCase();
    if (s.endsWith("=X")) return s;
    const compact = s.replace(/[/_\-\s]/g, "");
    if (/^[A-Z]{6}$/.test(compact)) return `${compact}=X`;
    return s;
}

export function parsePairs(list: string): string[] {
    const out: string[] = [];
    for (const p of list.split(",")) {
        if (!p.trim()) continue;
        const n = normalizePair(p);
        if (!out.includes(n)) out.push(n);
    }
    return out;
}

export function defaultPairs(mode: MonitorMode): string[] {
    return mode === "terminal" ? [...TOP_5_PAIRS] : [...DASHBOARD_PAIRS];
}

let __cachedAppConfig: AppConfig | null = null;

/**
 * Validates the environment once and caches the result.
 * Throws ConfigError listing every offending variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    if (__cachedAppConfig) return __cachedAppConfig;
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
        throw new ConfigError(`invalid configuration (${issues.join("; ")})`, issues);
    }
    const e = parsed.data;
    const pairs = e.FX_PAIRS ? parsePairs(e.FX_PAIRS) : defaultPairs(e.FX_MODE);
    if (pairs.length === 0) throw new ConfigError("FX_PAIRS is set but lists no pairs", ["FX_PAIRS: empty"]);
    __cachedAppConfig = {
        mode: e.FX_MODE,
        pairs,
        lookback: e.LOOKBACK_MIN,
        refreshSec: e.REFRESH_SEC,
        range: e.FX_RANGE,
        interval: e.FX_INTERVAL,
        chartDir: e.CHART_DIR,
        chartEnabled: e.CHART_ENABLED !== undefined ? truthy(e.CHART_ENABLED) : e.FX_MODE === "chart",
        spikeMarkersMax: e.SPIKE_MARKERS_MAX,
        yahooBaseUrl: e.YAHOO_BASE_URL.replace(/\/+$/, ""),
        httpTimeoutMs: e.HTTP_TIMEOUT_MS,
        cacheTtlMs: e.MARKET_CACHE_TTL_MS ?? Math.floor((e.REFRESH_SEC * 1000) / 2),
    };
    return __cachedAppConfig;
}

/**
 * Test helper: reset cached app config so subsequent calls re-read env.
 */
export function resetConfigCache() {
    __cachedAppConfig = null;
}
