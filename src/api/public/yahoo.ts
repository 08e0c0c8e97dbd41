import axios from 'axios';
import { z } from 'zod';
import { BaseMarketDataPublic, type SeriesQuery } from '../base-public';
import { FeedError, normalizeErrorCode, errorMessage } from '../../application/errors';
import type { Bar, PriceSeries } from '../../contracts';

export const YAHOO_BASE = 'https://query1.finance.yahoo.com';
// The chart endpoint rejects requests without a browser-like agent.
const USER_AGENT = 'Mozilla/5.0 (compatible; fx-volatility-watch/0.1)';

const num = z.number().nullable();
const quoteSchema = z.object({
  open: z.array(num).optional(),
  high: z.array(num).optional(),
  low: z.array(num).optional(),
  close: z.array(num).optional(),
  volume: z.array(num).optional(),
});

const chartErrorSchema = z.object({ code: z.string(), description: z.string().nullish() });

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(z.object({
      meta: z.object({
        symbol: z.string(),
        currency: z.string().nullish(),
      }).passthrough(),
      timestamp: z.array(z.number()).optional(),
      indicators: z.object({ quote: z.array(quoteSchema) }),
    })).nullable(),
    error: chartErrorSchema.nullable(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;

export interface YahooOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

function finiteOrNull(v: number | null | undefined): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? v : null;
}

/**
 * Converts a validated chart payload to ascending bars.
 * Rows whose close is missing are dropped, matching how the feed pads
 * minutes with no trades.
 */
export function toPriceSeries(symbol: string, body: ChartResponse): PriceSeries {
  const result = body.chart.result?.[0];
  if (!result) return { symbol, bars: [] };
  const ts = result.timestamp ?? [];
  const q: z.infer<typeof quoteSchema> = result.indicators.quote[0] ?? {};
  const bars: Bar[] = [];
  for (let i = 0; i < ts.length; i++) {
    const close = finiteOrNull(q.close?.[i]);
    if (close === null) continue;
    bars.push({
      ts: ts[i] * 1000,
      open: finiteOrNull(q.open?.[i]),
      high: finiteOrNull(q.high?.[i]),
      low: finiteOrNull(q.low?.[i]),
      close,
      volume: finiteOrNull(q.volume?.[i]),
    });
  }
  bars.sort((a, b) => a.ts - b.ts);
  return { symbol: result.meta.symbol || symbol, currency: result.meta.currency ?? undefined, bars };
}

function describeRemoteError(data: unknown): string | null {
  const parsed = z.object({ chart: z.object({ error: chartErrorSchema.nullable() }) }).safeParse(data);
  const e = parsed.success ? parsed.data.chart.error : null;
  return e ? `${e.code}: ${e.description ?? ''}`.trim() : null;
}

export class YahooChartPublic extends BaseMarketDataPublic {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(opts: YahooOptions = {}) {
    super();
    this.baseUrl = (opts.baseUrl ?? YAHOO_BASE).replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 10000;
  }

  async getIntradaySeries(symbol: string, query: SeriesQuery, signal?: AbortSignal): Promise<PriceSeries> {
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}`;
    let data: unknown;
    try {
      const r = await axios.get(url, {
        params: { range: query.range, interval: query.interval },
        timeout: this.timeoutMs,
        signal,
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      });
      data = r.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response) {
        const remote = describeRemoteError(err.response.data);
        throw new FeedError('HTTP', symbol, `${symbol}: HTTP ${err.response.status}${remote ? ` (${remote})` : ''}`, { cause: err, status: err.response.status });
      }
      throw new FeedError(normalizeErrorCode(err), symbol, `${symbol}: ${errorMessage(err)}`, { cause: err });
    }
    const parsed = chartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new FeedError('BAD_PAYLOAD', symbol, `${symbol}: unexpected chart payload`, { cause: parsed.error });
    }
    if (parsed.data.chart.error) {
      const e = parsed.data.chart.error;
      throw new FeedError('NO_DATA', symbol, `${symbol}: ${e.code}${e.description ? ` ${e.description}` : ''}`);
    }
    return toPriceSeries(symbol, parsed.data);
  }
}
